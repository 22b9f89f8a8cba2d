/**
 * @fileoverview MCP server for indesign-exec
 *
 * Exposes the Execution Envelope to MCP clients over stdio:
 * - tools: run_jsx, get_document_info, get_selection, eval_expression, undo
 * - resource: config://usage, the usage guide agents should read first
 * - scope-based authorization and an in-memory audit log
 *
 * Every tool call answers with one JSON text block. Failures come back as
 * `isError` results carrying `{ success: false, ... }`; nothing is thrown to
 * the transport.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  type CallToolResult,
  type ListResourcesResult,
  type ListToolsResult,
  type ReadResourceResult,
  type Resource,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import {
  loadConfigFromEnv,
  resolveConfig,
  type ExecServerConfig,
  type ExecServerConfigOverrides,
} from '../config/index.js';
import { encodeString } from '../encoding/encoder.js';
import { ExecutionEnvelope } from '../execution/envelope.js';
import type { ExecutionOutcome } from '../execution/types.js';
import { createHostBridge } from '../host/bridge_factory.js';
import { readAsset } from '../host/assets.js';
import type { HostBridge } from '../host/types.js';
import { Session } from '../session/session.js';
import { logError, logInfo, setLogLevel } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  EvalExpressionToolInputSchema,
  GetSelectionToolInputSchema,
  JSON_SCHEMAS,
  RunJsxToolInputSchema,
  UndoToolInputSchema,
  isToolName,
  validateToolInput,
  type ToolName,
} from './schema.js';
import { TOOL_AUTHORIZATION, type AuditLogEntry, type ToolFaultPayload } from './types.js';

export const USAGE_RESOURCE_URI = 'config://usage';

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  run_jsx:
    'Run ExtendScript in InDesign. Assign the value to return to __result. ' +
    'With undo_mode "entire" (default) every change is one Edit > Undo step named undo_name. ' +
    'Read config://usage first.',
  get_document_info:
    'Overview of the active document: page, item and style counts, preferences and selection. Read-only.',
  get_selection: 'Describe the current selection. detail_level "full" adds styles, colours and page. Read-only.',
  eval_expression:
    'Evaluate one ExtendScript expression (e.g. app.activeDocument.pages.length) and return its value. No undo step.',
  undo: 'Undo the most recent steps of the active document (1 to 50). Each grouped run_jsx call is one step.',
};

/** How a successful outcome is presented to the client. */
type ResultShape = 'wrapped' | 'flattened';

const MAX_AUDITED_SCRIPT_LENGTH = 500;

export interface ExecMCPServerDependencies {
  /** Transport to the host. Defaults to the platform bridge from config. */
  bridge?: HostBridge;
}

// ============================================================================
// SERVER IMPLEMENTATION
// ============================================================================

export class ExecMCPServer {
  private readonly server: Server;
  private readonly config: ExecServerConfig;
  private readonly bridge: HostBridge;
  private readonly session: Session;
  private readonly envelope: ExecutionEnvelope;
  private auditLog: AuditLogEntry[] = [];
  private transport: StdioServerTransport | null = null;

  constructor(config: ExecServerConfigOverrides = {}, deps: ExecMCPServerDependencies = {}) {
    this.config = resolveConfig(config);
    this.bridge = deps.bridge ?? createHostBridge(this.config);
    this.session = new Session(this.bridge, { slowCallWarningMs: this.config.session.slowCallWarningMs });
    this.envelope = new ExecutionEnvelope(this.session);

    this.server = new Server(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      return { tools: this.getAvailableTools() };
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async (): Promise<ListResourcesResult> => {
      return { resources: this.getAvailableResources() };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => {
      return this.readResource(request.params.uri);
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  // ==========================================================================
  // TOOLS
  // ==========================================================================

  /** Tools the enabled scopes allow. */
  getAvailableTools(): Tool[] {
    const tools: Tool[] = [];
    for (const [name, schema] of Object.entries(JSON_SCHEMAS)) {
      if (!isToolName(name) || !this.isAuthorized(name)) continue;
      tools.push({ name, description: TOOL_DESCRIPTIONS[name], inputSchema: { ...schema } });
    }
    return tools;
  }

  /**
   * Validate, authorize and run one tool call.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const startTime = Date.now();
    const entryId = this.generateId();
    const input = this.sanitizeInput(args);

    const validation = validateToolInput(name, args);
    if (!validation.valid || !isToolName(name)) {
      const error = `Invalid input: ${validation.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ')}`;
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'tool_call',
        name,
        input,
        status: 'failure',
        durationMs: Date.now() - startTime,
        error,
      });
      return faultResult({ success: false, kind: 'validation', error });
    }

    if (!this.isAuthorized(name)) {
      const error = `Authorization denied: ${name} requires scopes ${TOOL_AUTHORIZATION[name].requiredScopes.join(', ')}`;
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'authorization',
        name,
        input,
        status: 'denied',
        error,
      });
      return faultResult({ success: false, kind: 'denied', error });
    }

    try {
      const { outcome, shape } = await this.executeTool(name, validation.data);
      const result = renderOutcome(outcome, shape);
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'tool_call',
        name,
        input,
        status: outcome.status === 'success' ? 'success' : 'failure',
        durationMs: Date.now() - startTime,
        error: outcome.status === 'fault' ? outcome.faultDescription : undefined,
      });
      return result;
    } catch (error) {
      // Only asset loading can land here; the envelope never throws.
      const message = getErrorMessage(error);
      logError(`Tool ${name} failed`, { error: message });
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'tool_call',
        name,
        input,
        status: 'failure',
        durationMs: Date.now() - startTime,
        error: message,
      });
      return faultResult({ success: false, kind: 'internal', error: message });
    }
  }

  private async executeTool(
    name: ToolName,
    data: unknown
  ): Promise<{ outcome: ExecutionOutcome; shape: ResultShape }> {
    switch (name) {
      case 'run_jsx': {
        const input = RunJsxToolInputSchema.parse(data);
        const outcome = await this.envelope.submit({
          script: input.code,
          undoName: input.undo_name,
          undoMode: input.undo_mode,
          requireDocument: false,
        });
        return { outcome, shape: 'wrapped' };
      }
      case 'get_document_info': {
        const outcome = await this.envelope.submit({
          script: readAsset('scripts', 'document_info.jsx'),
          undoName: '',
          undoMode: 'none',
        });
        return { outcome, shape: 'flattened' };
      }
      case 'get_selection': {
        const input = GetSelectionToolInputSchema.parse(data);
        const outcome = await this.envelope.submit({
          script: `var __detail = ${encodeString(input.detail_level)};\n${readAsset('scripts', 'selection.jsx')}`,
          undoName: '',
          undoMode: 'none',
        });
        return { outcome, shape: 'flattened' };
      }
      case 'eval_expression': {
        const input = EvalExpressionToolInputSchema.parse(data);
        return { outcome: await this.envelope.evaluateExpression(input.expression), shape: 'wrapped' };
      }
      case 'undo': {
        const input = UndoToolInputSchema.parse(data);
        return { outcome: await this.envelope.rollback(input.steps), shape: 'flattened' };
      }
    }
  }

  private isAuthorized(name: ToolName): boolean {
    return TOOL_AUTHORIZATION[name].requiredScopes.every((scope) =>
      this.config.authorization.enabledScopes.includes(scope)
    );
  }

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  getAvailableResources(): Resource[] {
    return [
      {
        uri: USAGE_RESOURCE_URI,
        name: 'Usage guide',
        description: 'How to write scripts for run_jsx, read results and use undo. Read this first.',
        mimeType: 'text/markdown',
      },
    ];
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    const startTime = Date.now();
    const entryId = this.generateId();

    try {
      if (uri !== USAGE_RESOURCE_URI) {
        throw new Error(`Unknown resource: ${uri}`);
      }
      const text = readAsset('usage.md');
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'resource_read',
        name: uri,
        status: 'success',
        durationMs: Date.now() - startTime,
      });
      return { contents: [{ uri, mimeType: 'text/markdown', text }] };
    } catch (error) {
      this.logAudit({
        id: entryId,
        timestamp: new Date().toISOString(),
        operation: 'resource_read',
        name: uri,
        status: 'failure',
        durationMs: Date.now() - startTime,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  // ==========================================================================
  // AUDIT
  // ==========================================================================

  private generateId(): string {
    return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  /** Scripts can be long; the audit log keeps only their head. */
  private sanitizeInput(input: unknown): unknown {
    if (typeof input !== 'object' || input === null || Array.isArray(input)) return input;
    const sanitized: Record<string, unknown> = { ...input };
    for (const key of ['code', 'expression']) {
      const value = sanitized[key];
      if (typeof value === 'string' && value.length > MAX_AUDITED_SCRIPT_LENGTH) {
        sanitized[key] = `${value.slice(0, MAX_AUDITED_SCRIPT_LENGTH)}… (${value.length} chars)`;
      }
    }
    return sanitized;
  }

  private logAudit(entry: AuditLogEntry): void {
    if (!this.config.audit.enabled) return;
    this.auditLog.push(entry);
    if (this.auditLog.length > this.config.audit.maxEntries) {
      this.auditLog = this.auditLog.slice(-this.config.audit.maxEntries);
    }
  }

  /**
   * Get audit log entries, oldest first.
   */
  getAuditLog(options: { limit?: number; since?: string } = {}): AuditLogEntry[] {
    const { limit, since } = options;
    let entries = this.auditLog;
    if (since !== undefined) {
      entries = entries.filter((e) => e.timestamp >= since);
    }
    if (limit !== undefined) {
      entries = entries.slice(-limit);
    }
    return entries;
  }

  // ==========================================================================
  // SERVER LIFECYCLE
  // ==========================================================================

  /**
   * Start the server with stdio transport.
   */
  async start(): Promise<void> {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    logInfo(`MCP server started (${this.config.name} v${this.config.version})`, { bridge: this.bridge.kind });
  }

  async stop(): Promise<void> {
    this.session.disconnect();
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
    logInfo('MCP server stopped');
  }

  getServerInfo(): {
    name: string;
    version: string;
    bridge: string;
    connected: boolean;
    enabledScopes: string[];
    auditLogSize: number;
  } {
    return {
      name: this.config.name,
      version: this.config.version,
      bridge: this.bridge.kind,
      connected: this.session.isConnected(),
      enabledScopes: [...this.config.authorization.enabledScopes],
      auditLogSize: this.auditLog.length,
    };
  }
}

// ============================================================================
// RESULT RENDERING
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textResult(payload: object, isError: boolean): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function faultResult(payload: ToolFaultPayload): CallToolResult {
  return textResult(payload, true);
}

/**
 * Success becomes `{ success: true, result }`, or for flattened tools
 * `{ success: true, ...fields }` when the result is a record.
 */
export function renderOutcome(outcome: ExecutionOutcome, shape: ResultShape): CallToolResult {
  if (outcome.status === 'fault') {
    return faultResult({
      success: false,
      kind: outcome.kind,
      error: outcome.faultDescription,
      ...(outcome.errorName !== undefined ? { name: outcome.errorName } : {}),
      ...(outcome.line !== undefined ? { line: outcome.line } : {}),
      ...(outcome.reason !== undefined ? { reason: outcome.reason } : {}),
    });
  }

  const result: unknown = JSON.parse(outcome.encodedResult);
  if (shape === 'flattened' && isRecord(result)) {
    return textResult({ ...result, success: true }, false);
  }
  return textResult({ success: true, result }, false);
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createExecMCPServer(
  config?: ExecServerConfigOverrides,
  deps?: ExecMCPServerDependencies
): ExecMCPServer {
  return new ExecMCPServer(config, deps);
}

/**
 * Create and start a server with stdio transport.
 */
export async function startStdioServer(config?: ExecServerConfigOverrides): Promise<ExecMCPServer> {
  const server = createExecMCPServer(config);
  await server.start();
  return server;
}

/**
 * Serve over stdio with configuration from the environment until SIGINT/SIGTERM.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<ExecMCPServer> {
  const config = loadConfigFromEnv(env);
  setLogLevel(config.logLevel);
  const server = await startStdioServer(config);

  const shutdown = (): void => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}

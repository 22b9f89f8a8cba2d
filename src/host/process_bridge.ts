/**
 * @fileoverview Shared machinery for bridges that reach the host through a
 * short-lived scripting process (osascript on macOS, cscript on Windows).
 *
 * Each call spawns the platform driver from `assets/bridges/`. Script text is
 * staged in a temp file rather than passed on the command line, so quoting
 * and argument-length limits never apply. The driver's exit status and its
 * `HOST_ERROR` stderr line are turned into typed errors here.
 */

import { execa } from 'execa';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import {
  HostProtocolError,
  HostUnavailableError,
  ScriptFaultError,
  isHostUnavailableError,
  type ExecBridgeError,
} from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  buildRollbackScript,
  buildScriptWrapper,
  parseHostReply,
  parseRollbackReport,
} from './wrapper.js';
import type {
  HostApplication,
  HostBridge,
  HostReply,
  HostScriptRequest,
  HostStatus,
  RollbackReport,
} from './types.js';

// ============================================================================
// DRIVER PROTOCOL
// ============================================================================

export type DriverMode = 'ping' | 'run';

/** How one driver run is spawned. */
export interface DriverInvocation {
  command: string;
  args: string[];
  encoding?: 'utf8' | 'utf16le';
}

export interface DriverOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

const DRIVER_ERROR_PATTERN = /^HOST_ERROR\t(not_running|disconnected|script)\t(.*)$/m;

const HostStatusSchema = z.object({
  name: z.string(),
  version: z.string(),
  documentCount: z.number().int().min(0),
  activeDocument: z.string().optional(),
});

/**
 * Turn a failed driver run into the error the Session acts on.
 *
 * A tagged `HOST_ERROR` line wins. Without one, a run that printed nothing
 * means the driver itself could not start (wrong platform, missing binary).
 */
export function classifyDriverFailure(target: string, output: DriverOutput): ExecBridgeError {
  const match = DRIVER_ERROR_PATTERN.exec(output.stderr);
  if (match) {
    const [, reason, message] = match;
    if (reason === 'script') {
      return new ScriptFaultError(message, 'HostBridgeError');
    }
    return new HostUnavailableError(
      reason === 'disconnected' ? 'disconnected' : 'not_running',
      message,
      target
    );
  }

  const stderr = output.stderr.trim();
  if (stderr.length === 0) {
    return new HostUnavailableError(
      'not_running',
      `Scripting driver exited with code ${output.exitCode} and no output`,
      target
    );
  }
  return new HostProtocolError(`Scripting driver failed (exit ${output.exitCode}): ${stderr}`, stderr);
}

/** Message for a driver binary that never started (missing osascript/cscript). */
export function describeSpawnFailure(command: string, result: unknown): string {
  const code = result instanceof Error && 'code' in result && typeof result.code === 'string' ? ` (${result.code})` : '';
  return `Scripting driver ${command} could not be started${code}`;
}

export function parseHostStatus(raw: string): HostStatus {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    throw new HostProtocolError('Host status is not JSON', raw);
  }
  const status = HostStatusSchema.safeParse(parsed);
  if (!status.success) {
    throw new HostProtocolError('Host status has an unexpected shape', raw);
  }
  return status.data;
}

// ============================================================================
// BASE BRIDGE
// ============================================================================

export interface ProcessBridgeOptions {
  /** Application names or ProgIDs, tried in order. */
  targets: readonly string[];
}

export abstract class ProcessBridge implements HostBridge {
  abstract readonly kind: string;

  constructor(protected readonly options: ProcessBridgeOptions) {
    if (options.targets.length === 0) {
      throw new Error(`${new.target.name} needs at least one target`);
    }
  }

  /** Command line for one driver run against `target`. */
  protected abstract buildInvocation(target: string, mode: DriverMode, scriptPath?: string): DriverInvocation;

  async connect(): Promise<HostApplication> {
    let lastError: unknown;
    for (const target of this.options.targets) {
      try {
        const status = await this.ping(target);
        logDebug(`${this.kind}: attached to ${target}`, { version: status.version });
        return new ProcessHostApplication(this, target, status);
      } catch (error) {
        if (!isHostUnavailableError(error)) throw error;
        lastError = error;
      }
    }
    throw new HostUnavailableError(
      'not_running',
      `InDesign is not reachable through ${this.kind} (tried ${this.options.targets.join(', ')}): ${getErrorMessage(lastError)}`
    );
  }

  async ping(target: string): Promise<HostStatus> {
    return parseHostStatus(await this.runDriver(target, 'ping'));
  }

  /** Stage `source` in a temp file and have the host run it. Returns the host's reply string. */
  async runScript(target: string, source: string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'indesign-exec-'));
    const scriptPath = path.join(dir, 'request.jsx');
    try {
      await fs.writeFile(scriptPath, source, 'utf8');
      return await this.runDriver(target, 'run', scriptPath);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  private async runDriver(target: string, mode: DriverMode, scriptPath?: string): Promise<string> {
    const invocation = this.buildInvocation(target, mode, scriptPath);
    const result = await execa(invocation.command, invocation.args, {
      encoding: 'buffer',
      reject: false,
      windowsHide: true,
    });
    if (result.failed && typeof result.exitCode !== 'number') {
      throw new HostUnavailableError('not_running', describeSpawnFailure(invocation.command, result), target);
    }
    const encoding = invocation.encoding ?? 'utf8';
    const output: DriverOutput = {
      exitCode: result.exitCode,
      stdout: result.stdout.toString(encoding),
      stderr: result.stderr.toString(encoding),
    };
    if (output.exitCode !== 0) {
      throw classifyDriverFailure(target, output);
    }
    return output.stdout;
  }
}

// ============================================================================
// APPLICATION HANDLE
// ============================================================================

class ProcessHostApplication implements HostApplication {
  constructor(
    private readonly bridge: ProcessBridge,
    readonly target: string,
    readonly connectStatus: HostStatus
  ) {}

  ping(): Promise<HostStatus> {
    return this.bridge.ping(this.target);
  }

  async execute(request: HostScriptRequest): Promise<HostReply> {
    return parseHostReply(await this.bridge.runScript(this.target, buildScriptWrapper(request)));
  }

  async undo(steps: number): Promise<RollbackReport> {
    const reply = await this.execute({ script: buildRollbackScript(steps), undoMode: 'none' });
    if (!reply.ok) {
      throw new ScriptFaultError(reply.error, reply.errorName, reply.line);
    }
    return parseRollbackReport(reply.value);
  }
}

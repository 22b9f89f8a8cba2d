/**
 * @fileoverview indesign-exec - run ExtendScript in a live InDesign session
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ExecutionEnvelope, Session, createHostBridge, resolveConfig } from 'indesign-exec';
 *
 * const session = new Session(createHostBridge(resolveConfig()));
 * const envelope = new ExecutionEnvelope(session);
 *
 * const outcome = await envelope.submit({
 *   script: 'app.activeDocument.pages.add(); __result = app.activeDocument.pages.length;',
 *   undoName: 'Add page',
 *   undoMode: 'entire',
 * });
 * if (outcome.status === 'success') {
 *   console.log(outcome.encodedResult); // "5"
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ENCODING
// ============================================================================

export {
  encode,
  encodeString,
  classifyValue,
  attempt,
  isPlaceholder,
  MAX_DEPTH,
  PLACEHOLDERS,
  type Placeholder,
  type ValueKind,
} from './encoding/index.js';

// ============================================================================
// EXECUTION
// ============================================================================

export {
  ExecutionEnvelope,
  ExecutionRequestSchema,
  validateExecutionRequest,
  toFault,
  isExecutionSuccess,
  type ExecutionRequest,
  type ExecutionOutcome,
  type ExecutionSuccess,
  type ExecutionFault,
  type FaultKind,
} from './execution/index.js';

// ============================================================================
// SESSION AND HOST
// ============================================================================

export {
  Session,
  DEFAULT_SLOW_CALL_WARNING_MS,
  type SessionOptions,
  type EvaluateOptions,
} from './session/index.js';

export * from './host/index.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  DEFAULT_EXEC_CONFIG,
  EXEC_SERVER_VERSION,
  resolveConfig,
  loadConfigFromEnv,
  type ExecServerConfig,
  type ExecServerConfigOverrides,
  type BridgeKind,
  type AuthorizationScope,
} from './config/index.js';

// ============================================================================
// ERRORS AND LOGGING
// ============================================================================

export {
  ExecBridgeError,
  InputValidationError,
  HostUnavailableError,
  ScriptFaultError,
  HostProtocolError,
  isExecBridgeError,
  isHostUnavailableError,
  isScriptFaultError,
  type ErrorJSON,
  type ValidationIssue,
  type HostUnavailableReason,
} from './core/errors.js';

export { getErrorMessage } from './utils/errors.js';

export { logDebug, logInfo, logWarning, logError, setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

// ============================================================================
// MCP SERVER
// ============================================================================

export { ExecMCPServer, createExecMCPServer, startStdioServer, type ExecMCPServerDependencies } from './mcp/index.js';

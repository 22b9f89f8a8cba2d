/**
 * @fileoverview CLI error handling with structured envelopes
 *
 * Every failure leaves the CLI as an {@link ErrorEnvelope}: a machine-readable
 * code, whether retrying can help, recovery hints and an exit code. With
 * `--json` the envelope is printed as-is for agents; otherwise as text.
 */

import { isExecBridgeError, isHostUnavailableError, isScriptFaultError } from '../core/errors.js';
import type { ExecutionFault } from '../execution/types.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  EHOST_NOT_RUNNING: 'InDesign is not running or not reachable',
  EHOST_DISCONNECTED: 'The connection to InDesign was lost',
  ENO_DOCUMENT: 'No document is open in InDesign',
  ESCRIPT_FAULT: 'The script raised an error inside InDesign',
  EHOST_PROTOCOL: 'InDesign answered with something that is not a valid reply',
  EINVALID_ARGUMENT: 'A command-line argument is missing or invalid',
  ECONFIG_INVALID: 'An INDESIGN_EXEC_* environment variable is invalid',
  EFILE_NOT_FOUND: 'A script file could not be read',
  EUNKNOWN: 'An unexpected error occurred',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export interface ErrorCodeMetadata {
  retryable: boolean;
  recoveryHints: string[];
}

export const ErrorMetadata: Record<ErrorCode, ErrorCodeMetadata> = {
  EHOST_NOT_RUNNING: {
    retryable: true,
    recoveryHints: [
      'Start InDesign and wait until it has finished launching',
      'Set INDESIGN_EXEC_TARGETS if your InDesign version is not detected',
    ],
  },
  EHOST_DISCONNECTED: {
    retryable: true,
    recoveryHints: ['Retry the command; InDesign may have been restarted', 'Close any modal dialog in InDesign'],
  },
  ENO_DOCUMENT: {
    retryable: false,
    recoveryHints: ['Open or create a document in InDesign first'],
  },
  ESCRIPT_FAULT: {
    retryable: false,
    recoveryHints: ['Fix the script at the reported line', 'Use `indesign-exec undo` to revert partial changes'],
  },
  EHOST_PROTOCOL: {
    retryable: true,
    recoveryHints: ['Run `indesign-exec status` to check the connection', 'Run with INDESIGN_EXEC_LOG_LEVEL=debug'],
  },
  EINVALID_ARGUMENT: {
    retryable: false,
    recoveryHints: ['Run `indesign-exec help <command>` for usage information'],
  },
  ECONFIG_INVALID: {
    retryable: false,
    recoveryHints: ['Check the INDESIGN_EXEC_* variables listed in `indesign-exec help`'],
  },
  EFILE_NOT_FOUND: {
    retryable: false,
    recoveryHints: ['Check that the script path exists and is readable'],
  },
  EUNKNOWN: {
    retryable: true,
    recoveryHints: ['Retry the command', 'Run with INDESIGN_EXEC_LOG_LEVEL=debug for more detail'],
  },
};

/** Exit codes by family: host 10-19, script 20-29, input 50-59. */
export const ExitCodes: Partial<Record<ErrorCode, number>> = {
  EHOST_NOT_RUNNING: 10,
  EHOST_DISCONNECTED: 11,
  ENO_DOCUMENT: 12,
  EHOST_PROTOCOL: 13,
  ESCRIPT_FAULT: 20,
  EINVALID_ARGUMENT: 50,
  ECONFIG_INVALID: 51,
  EFILE_NOT_FOUND: 52,
};

// ============================================================================
// ENVELOPE
// ============================================================================

export interface ErrorEnvelope {
  code: string;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'retryable' | 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    context: { ...overrides.context, timestamp: new Date().toISOString() },
  };
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.code === 'string' &&
    typeof record.message === 'string' &&
    typeof record.retryable === 'boolean' &&
    Array.isArray(record.recoveryHints)
  );
}

// ============================================================================
// CLI ERROR
// ============================================================================

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }

  toEnvelope(): ErrorEnvelope {
    const hints = ErrorMetadata[this.code].recoveryHints;
    return createErrorEnvelope(this.code, this.message, {
      recoveryHints: this.suggestion ? [this.suggestion, ...hints] : [...hints],
      context: this.details,
    });
  }
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, undefined, details);
}

/** Turn a faulted execution outcome into a CliError. */
export function faultToError(fault: ExecutionFault): CliError {
  switch (fault.kind) {
    case 'validation':
      return createError('EINVALID_ARGUMENT', fault.faultDescription);
    case 'host_unreachable':
      return createError(
        fault.reason === 'no_document'
          ? 'ENO_DOCUMENT'
          : fault.reason === 'disconnected'
            ? 'EHOST_DISCONNECTED'
            : 'EHOST_NOT_RUNNING',
        fault.faultDescription,
        { reason: fault.reason },
      );
    case 'script':
      return createError('ESCRIPT_FAULT', fault.faultDescription, {
        errorName: fault.errorName,
        line: fault.line,
      });
    case 'internal':
      return createError('EUNKNOWN', fault.faultDescription);
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Convert anything thrown into an envelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) return error;
  if (error instanceof CliError) return error.toEnvelope();

  if (isHostUnavailableError(error)) {
    const code: ErrorCode =
      error.reason === 'no_document'
        ? 'ENO_DOCUMENT'
        : error.reason === 'disconnected'
          ? 'EHOST_DISCONNECTED'
          : 'EHOST_NOT_RUNNING';
    return createErrorEnvelope(code, error.message, { context: { reason: error.reason, target: error.target } });
  }
  if (isScriptFaultError(error)) {
    return createErrorEnvelope('ESCRIPT_FAULT', error.message, {
      context: { errorName: error.errorName, line: error.line },
    });
  }
  if (isExecBridgeError(error)) {
    const code: ErrorCode =
      error.code === 'VALIDATION_ERROR'
        ? error.message.startsWith('Invalid environment configuration')
          ? 'ECONFIG_INVALID'
          : 'EINVALID_ARGUMENT'
        : error.code === 'HOST_PROTOCOL_ERROR'
          ? 'EHOST_PROTOCOL'
          : 'EUNKNOWN';
    return createErrorEnvelope(code, error.message);
  }

  const message = getErrorMessage(error);
  if (message.includes('ENOENT')) {
    return createErrorEnvelope('EFILE_NOT_FOUND', message);
  }
  return createErrorEnvelope('EUNKNOWN', message);
}

export function isRetryableError(envelope: ErrorEnvelope): boolean {
  return envelope.retryable;
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return isErrorCode(envelope.code) ? (ExitCodes[envelope.code] ?? 1) : 1;
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatError(error: unknown): string {
  const envelope = classifyError(error);
  return `Error [${envelope.code}]: ${envelope.message}`;
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  const line = envelope.context?.line;
  if (typeof line === 'number' && line >= 0) {
    lines.push(`  at line ${line}`);
  }
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  if (envelope.retryable) {
    lines.push('', 'This error is retryable.');
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

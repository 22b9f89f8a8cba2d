/**
 * @fileoverview indesign-exec error hierarchy
 *
 * Every failure that can end an execution request is one of these typed
 * errors. Encoding problems are never errors: the encoder degrades to
 * placeholder text instead.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ExecBridgeError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// INPUT VALIDATION ERRORS
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

/** A malformed request, rejected before the host is contacted. */
export class InputValidationError extends ExecBridgeError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
    this.name = 'InputValidationError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues },
    };
  }
}

// ============================================================================
// HOST ERRORS
// ============================================================================

export type HostUnavailableReason = 'not_running' | 'disconnected' | 'no_document';

export class HostUnavailableError extends ExecBridgeError {
  readonly code = 'HOST_UNAVAILABLE';

  constructor(
    readonly reason: HostUnavailableReason,
    message: string,
    readonly target?: string,
  ) {
    super(message);
    this.name = 'HostUnavailableError';
  }

  /** Only a dropped connection is worth one re-acquisition. */
  get retryable(): boolean {
    return this.reason === 'disconnected';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        target: this.target,
      },
    };
  }
}

/** The submitted script raised while the host was running it. */
export class ScriptFaultError extends ExecBridgeError {
  readonly code = 'SCRIPT_FAULT';
  readonly retryable = false;

  constructor(
    message: string,
    readonly errorName: string = 'Error',
    readonly line: number = -1,
  ) {
    super(message);
    this.name = 'ScriptFaultError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        errorName: this.errorName,
        line: this.line,
      },
    };
  }
}

/** The host answered, but not with anything the bridge understands. */
export class HostProtocolError extends ExecBridgeError {
  readonly code = 'HOST_PROTOCOL_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly rawReply?: string,
  ) {
    super(message);
    this.name = 'HostProtocolError';
  }

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        rawReply: this.rawReply?.slice(0, 200),
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isExecBridgeError(error: unknown): error is ExecBridgeError {
  return error instanceof ExecBridgeError;
}

export function isHostUnavailableError(error: unknown): error is HostUnavailableError {
  return error instanceof HostUnavailableError;
}

export function isScriptFaultError(error: unknown): error is ScriptFaultError {
  return error instanceof ScriptFaultError;
}

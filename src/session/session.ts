/**
 * @fileoverview Session: the one owned connection to the host process
 *
 * The Session holds the live {@link HostApplication} handle. It is acquired
 * lazily, pinged before every call, dropped when the ping fails, and
 * re-acquired on the next call. A call that fails because the connection
 * went away mid-flight is replayed exactly once on a fresh handle.
 *
 * The host is single-threaded and has one active document, so every call is
 * queued: at most one is in flight, and they reach the host in call order.
 * That is what makes undo groups line up with submission order.
 *
 * There is no internal timeout. Calls slower than `slowCallWarningMs` are
 * logged, never cancelled.
 */

import { HostUnavailableError, ScriptFaultError, isHostUnavailableError } from '../core/errors.js';
import type {
  HostApplication,
  HostBridge,
  HostScriptRequest,
  HostStatus,
  RollbackReport,
} from '../host/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface SessionOptions {
  /** Log a warning for calls slower than this. Default 30 s. */
  slowCallWarningMs?: number;
}

export interface EvaluateOptions {
  /** Fail with `no_document` when nothing is open. Default true. */
  requireDocument?: boolean;
}

interface AttachedHost {
  app: HostApplication;
  status: HostStatus;
}

export const DEFAULT_SLOW_CALL_WARNING_MS = 30_000;

export class Session {
  private handle: HostApplication | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly slowCallWarningMs: number;

  constructor(
    private readonly bridge: HostBridge,
    options: SessionOptions = {}
  ) {
    this.slowCallWarningMs = options.slowCallWarningMs ?? DEFAULT_SLOW_CALL_WARNING_MS;
  }

  /**
   * Run one wrapped script and return the raw value it left in `__result`.
   * A script that raised inside the host surfaces as ScriptFaultError.
   */
  evaluate(request: HostScriptRequest, options: EvaluateOptions = {}): Promise<unknown> {
    const requireDocument = options.requireDocument ?? true;
    return this.enqueue('evaluate', async () => {
      const reply = await this.withHost(async ({ app, status }) => {
        if (requireDocument) assertDocument(app, status);
        return app.execute(request);
      });
      if (!reply.ok) {
        throw new ScriptFaultError(reply.error, reply.errorName, reply.line);
      }
      return reply.value;
    });
  }

  /** Undo up to `steps` history entries of the active document, most recent first. */
  rollback(steps: number): Promise<RollbackReport> {
    return this.enqueue('rollback', () =>
      this.withHost(({ app, status }) => {
        assertDocument(app, status);
        return app.undo(steps);
      })
    );
  }

  /** Application and document status as of a fresh ping. */
  status(): Promise<HostStatus> {
    return this.enqueue('status', () => this.withHost(async ({ status }) => status));
  }

  /** Forget the current handle; the next call reconnects. */
  disconnect(): void {
    if (this.handle) {
      logDebug('Session handle released', { target: this.handle.target });
    }
    this.handle = null;
  }

  isConnected(): boolean {
    return this.handle !== null;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private enqueue<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const started = Date.now();
      try {
        return await operation();
      } finally {
        const elapsedMs = Date.now() - started;
        if (elapsedMs > this.slowCallWarningMs) {
          logWarning(`Host ${label} call took ${elapsedMs} ms`, { thresholdMs: this.slowCallWarningMs });
        }
      }
    };
    const result = this.tail.then(run);
    // The queue advances whether the call succeeded or not.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async withHost<T>(operation: (host: AttachedHost) => Promise<T>): Promise<T> {
    const first = await this.acquire();
    try {
      return await operation(first);
    } catch (error) {
      if (!isHostUnavailableError(error) || error.reason !== 'disconnected') throw error;
      logWarning('Host connection lost; reconnecting once', {
        target: first.app.target,
        error: getErrorMessage(error),
      });
      this.handle = null;
      return operation(await this.acquire());
    }
  }

  private async acquire(): Promise<AttachedHost> {
    if (this.handle) {
      const app = this.handle;
      try {
        return { app, status: await app.ping() };
      } catch (error) {
        if (!isHostUnavailableError(error)) throw error;
        logDebug('Stale host handle dropped', { target: app.target, error: getErrorMessage(error) });
        this.handle = null;
      }
    }

    const app = await this.bridge.connect();
    const status = app.connectStatus ?? (await app.ping());
    this.handle = app;
    logDebug(`Connected to ${status.name} ${status.version}`, { bridge: this.bridge.kind, target: app.target });
    return { app, status };
  }
}

function assertDocument(app: HostApplication, status: HostStatus): void {
  if (status.documentCount === 0) {
    throw new HostUnavailableError('no_document', 'No document is open in InDesign', app.target);
  }
}

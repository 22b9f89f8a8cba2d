/**
 * @fileoverview Execution Envelope
 *
 * The single entry point for running agent-authored scripts. It validates the
 * request, hands it to the {@link Session}, and turns whatever happens into
 * one {@link ExecutionOutcome}: the encoded result, or a fault with text.
 * Nothing thrown below this layer escapes it.
 *
 * Rollback after a faulted script is left to the host: whatever the host's
 * undo group holds when the fault closes it stays there. The envelope never
 * undoes anything on its own.
 */

import { z } from 'zod';
import {
  InputValidationError,
  isExecBridgeError,
  isHostUnavailableError,
  isScriptFaultError,
  type ValidationIssue,
} from '../core/errors.js';
import { encode } from '../encoding/encoder.js';
import { RESULT_SLOT, UNDO_MODES } from '../host/types.js';
import { clampRollbackSteps } from '../host/wrapper.js';
import type { Session } from '../session/session.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { ExecutionFault, ExecutionOutcome, ExecutionRequest } from './types.js';

// ============================================================================
// VALIDATION
// ============================================================================

export const ExecutionRequestSchema = z
  .object({
    script: z.string(),
    undoName: z.string(),
    undoMode: z.enum(UNDO_MODES),
    requireDocument: z.boolean().optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    if (request.undoMode !== 'none' && request.undoName.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['undoName'],
        message: `undoName is required when undoMode is '${request.undoMode}'`,
      });
    }
  });

const ExpressionSchema = z.string().trim().min(1, 'expression must not be empty');

export function validateExecutionRequest(input: unknown): ExecutionRequest {
  const result = ExecutionRequestSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    throw new InputValidationError(issues.map((i) => i.message).join('; '), issues);
  }
  return result.data;
}

// ============================================================================
// ENVELOPE
// ============================================================================

export class ExecutionEnvelope {
  constructor(private readonly session: Session) {}

  /**
   * Validate and run one script. Validation faults never reach the Session.
   */
  async submit(request: ExecutionRequest): Promise<ExecutionOutcome> {
    let valid: ExecutionRequest;
    try {
      valid = validateExecutionRequest(request);
    } catch (error) {
      return toFault(error);
    }

    const started = performance.now();
    try {
      const raw = await this.session.evaluate(
        {
          script: valid.script,
          undoMode: valid.undoMode,
          undoName: valid.undoMode === 'none' ? undefined : valid.undoName,
        },
        { requireDocument: valid.requireDocument }
      );
      return success(raw, started);
    } catch (error) {
      return toFault(error);
    }
  }

  /**
   * Evaluate a single expression without undo grouping. Works with no
   * document open.
   */
  async evaluateExpression(expression: string): Promise<ExecutionOutcome> {
    const parsed = ExpressionSchema.safeParse(expression);
    if (!parsed.success) {
      return {
        status: 'fault',
        kind: 'validation',
        faultDescription: parsed.error.errors.map((e) => e.message).join('; '),
      };
    }
    // A trailing semicolon would end the statement inside the parentheses.
    const body = parsed.data.replace(/;+\s*$/, '');
    return this.submit({
      script: `${RESULT_SLOT} = (\n${body}\n);`,
      undoName: '',
      undoMode: 'none',
      requireDocument: false,
    });
  }

  /**
   * Undo the `steps` most recent history entries (clamped to 1..50). The
   * encoded result is `{"stepsUndone":n,"labels":[...]}`.
   */
  async rollback(steps: number): Promise<ExecutionOutcome> {
    const started = performance.now();
    try {
      const report = await this.session.rollback(clampRollbackSteps(steps));
      return success(report, started);
    } catch (error) {
      return toFault(error);
    }
  }
}

// ============================================================================
// OUTCOMES
// ============================================================================

function success(raw: unknown, started: number): ExecutionOutcome {
  return {
    status: 'success',
    encodedResult: encode(raw),
    elapsedMs: Math.round(performance.now() - started),
  };
}

/** Map anything thrown below the envelope onto a fault outcome. */
export function toFault(error: unknown): ExecutionFault {
  if (error instanceof InputValidationError) {
    logDebug('Execution request rejected', { issues: error.issues });
    return { status: 'fault', kind: 'validation', faultDescription: error.message };
  }
  if (isHostUnavailableError(error)) {
    logWarning('Host unreachable', { reason: error.reason, target: error.target });
    return {
      status: 'fault',
      kind: 'host_unreachable',
      faultDescription: error.message,
      reason: error.reason,
    };
  }
  if (isScriptFaultError(error)) {
    logDebug('Script raised in host', { errorName: error.errorName, line: error.line });
    return {
      status: 'fault',
      kind: 'script',
      faultDescription: error.message,
      errorName: error.errorName,
      line: error.line,
    };
  }
  const description = getErrorMessage(error);
  logError('Execution failed', {
    error: description,
    code: isExecBridgeError(error) ? error.code : undefined,
  });
  return { status: 'fault', kind: 'internal', faultDescription: description };
}

/**
 * @fileoverview Execution Envelope request and outcome types
 */

import type { HostUnavailableReason } from '../core/errors.js';
import type { UndoMode } from '../host/types.js';

export interface ExecutionRequest {
  /** Script body in the host dialect. Assigns its result to `__result`. */
  script: string;

  /** Label for the undo group. Must be non-blank unless `undoMode` is `none`. */
  undoName: string;

  undoMode: UndoMode;

  /** Fail with `no_document` when nothing is open. Default true. */
  requireDocument?: boolean;
}

export type FaultKind = 'validation' | 'host_unreachable' | 'script' | 'internal';

export interface ExecutionSuccess {
  status: 'success';

  /** Defensive Encoder output for the value the script left in `__result` */
  encodedResult: string;

  elapsedMs: number;
}

export interface ExecutionFault {
  status: 'fault';
  kind: FaultKind;
  faultDescription: string;

  /** Host error class name, for script faults */
  errorName?: string;

  /** Line in the submitted body, for script faults; -1 when the host gave none */
  line?: number;

  /** Set for host_unreachable faults */
  reason?: HostUnavailableReason;
}

/** Exactly one outcome per submission. */
export type ExecutionOutcome = ExecutionSuccess | ExecutionFault;

export function isExecutionSuccess(outcome: ExecutionOutcome): outcome is ExecutionSuccess {
  return outcome.status === 'success';
}

/**
 * @fileoverview Host bridge contracts
 *
 * A HostBridge finds a running InDesign instance and hands back a
 * HostApplication: the live handle the Session holds on to. Every call on the
 * handle is one round trip to the host process.
 *
 * @packageDocumentation
 */

// ============================================================================
// UNDO MODES
// ============================================================================

/**
 * How the host groups the mutations of one script.
 *
 * - `none`: no grouping (read-only scripts, rollback itself)
 * - `entire`: one undo step for the whole script
 * - `fast_entire_script`: as `entire`, with redraw/recalculation deferred
 *   until the step closes
 * - `auto`: the host records every action as its own undo step
 */
export const UNDO_MODES = ['none', 'entire', 'fast_entire_script', 'auto'] as const;

export type UndoMode = (typeof UNDO_MODES)[number];

/** `UndoModes` enumerator names in the host scripting DOM. */
export const HOST_UNDO_MODE_NAMES: Record<Exclude<UndoMode, 'none'>, string> = {
  entire: 'ENTIRE_SCRIPT',
  fast_entire_script: 'FAST_ENTIRE_SCRIPT',
  auto: 'SCRIPT_REQUEST',
};

/** Name of the variable a script assigns its result to. */
export const RESULT_SLOT = '__result';

// ============================================================================
// REQUESTS AND REPLIES
// ============================================================================

export interface HostScriptRequest {
  /** Script body in the host dialect; assigns its result to `__result`. */
  script: string;

  /** Undo grouping for the body. */
  undoMode: UndoMode;

  /** Label shown in the host's Edit > Undo menu. Required unless `undoMode` is `none`. */
  undoName?: string;
}

export type HostReply =
  | { ok: true; value: unknown }
  | { ok: false; error: string; errorName: string; line: number };

export interface HostStatus {
  /** Application name as reported by the host */
  name: string;

  /** Application version */
  version: string;

  /** Number of open documents */
  documentCount: number;

  /** Name of the active document, when there is one */
  activeDocument?: string;
}

export interface RollbackReport {
  /** Steps actually undone (may be fewer than requested) */
  stepsUndone: number;

  /** Undo labels, most recent first */
  labels: string[];
}

// ============================================================================
// BRIDGE CONTRACTS
// ============================================================================

/** A live handle to one host process. */
export interface HostApplication {
  /** App name or ProgID this handle is bound to */
  readonly target: string;

  /** Status reported while attaching, when `connect()` already pinged */
  readonly connectStatus?: HostStatus;

  /** Throws HostUnavailableError when the process is gone. */
  ping(): Promise<HostStatus>;

  /** Run a script body inside the result/undo wrapper. */
  execute(request: HostScriptRequest): Promise<HostReply>;

  /** Undo up to `steps` entries of the active document's history. */
  undo(steps: number): Promise<RollbackReport>;
}

export interface HostBridge {
  /** Transport name, for logs and status output */
  readonly kind: string;

  /**
   * Attach to a running host. Throws HostUnavailableError('not_running')
   * when no configured target answers.
   */
  connect(): Promise<HostApplication>;
}

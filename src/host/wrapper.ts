/**
 * @fileoverview Script wrapper and reply protocol
 *
 * Everything sent to the host is wrapped the same way, whatever the
 * transport:
 * - the host-side serializer (`assets/host/safe_stringify.jsx`) is prepended
 * - the body runs inside a function with its own `__result` slot
 * - faults raised by the body are caught and reported as data
 * - `userInteractionLevel` is forced to NEVER_INTERACT, then restored
 * - grouped modes run the body through `app.doScript(..., UndoModes.X, name)`
 *
 * The host replies with one JSON document; {@link parseHostReply} reads it.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { encode, encodeString } from '../encoding/encoder.js';
import { HostProtocolError } from '../core/errors.js';
import { readAsset } from './assets.js';
import {
  HOST_UNDO_MODE_NAMES,
  RESULT_SLOT,
  type HostReply,
  type HostScriptRequest,
  type RollbackReport,
} from './types.js';

export const HOST_SERIALIZER_ASSET = ['host', 'safe_stringify.jsx'] as const;

/** Upper bound for one rollback request. */
export const MAX_ROLLBACK_STEPS = 50;

// ============================================================================
// WRAPPER
// ============================================================================

/**
 * Build the complete ES3 source the host evaluates for one request.
 * The last expression is the reply string, which the host's `doScript`
 * hands back over the bridge.
 */
export function buildScriptWrapper(
  request: HostScriptRequest,
  serializer: string = readAsset(...HOST_SERIALIZER_ASSET)
): string {
  const invoke =
    request.undoMode === 'none'
      ? '__body();'
      : `app.doScript(__body, ScriptLanguage.JAVASCRIPT, undefined, UndoModes.${
          HOST_UNDO_MODE_NAMES[request.undoMode]
        }, ${encodeString(request.undoName ?? '')});`;

  const prelude = (bodyStart: number): string[] => [
    serializer,
    '(function () {',
    `    var __bodyStart = ${bodyStart}, __bodyEnd = ${bodyStart + countLines(request.script) - 1};`,
    '    var __value = null;',
    '    var __fault = null;',
    '    var __uilevel = app.scriptPreferences.userInteractionLevel;',
    '    function __body() {',
    `        var ${RESULT_SLOT};`,
    '        try {',
    '// ---- script body ----',
  ];
  // Host line numbers count from the top of the wrapper; faults report them
  // relative to the first line of the body.
  const bodyStart = countLines(prelude(0).join('\n')) + 1;

  return [
    ...prelude(bodyStart),
    request.script,
    '// ---- end of script body ----',
    `            __value = (typeof ${RESULT_SLOT} === 'undefined') ? null : ${RESULT_SLOT};`,
    '        } catch (__err) {',
    '            __fault = __describeFault(__err);',
    '        }',
    '    }',
    '    function __describeFault(e) {',
    "        var line = (e && typeof e.line === 'number') ? e.line : -1;",
    '        line = (line >= __bodyStart && line <= __bodyEnd) ? line - __bodyStart + 1 : -1;',
    "        return { success: false, error: (e && e.message) || String(e), name: (e && e.name) || 'Error', line: line };",
    '    }',
    '    app.scriptPreferences.userInteractionLevel = UserInteractionLevels.NEVER_INTERACT;',
    '    try {',
    `        ${invoke}`,
    '    } catch (__outer) {',
    '        __fault = __describeFault(__outer);',
    '    } finally {',
    '        app.scriptPreferences.userInteractionLevel = __uilevel;',
    '    }',
    '    if (__fault !== null) return __execStringify(__fault);',
    `    return '{"success":true,"result":' + __execStringify(__value) + '}';`,
    '})();',
    '',
  ].join('\n');
}

function countLines(text: string): number {
  return text.split('\n').length;
}

/**
 * Script body that undoes up to `steps` history entries of the active
 * document, most recent first, stopping early when the history runs out.
 */
export function buildRollbackScript(steps: number): string {
  const count = clampRollbackSteps(steps);
  return [
    'var doc = app.activeDocument;',
    'var labels = [];',
    `for (var i = 0; i < ${count}; i++) {`,
    '    if (doc.undoHistory.length === 0) break;',
    '    var label = String(doc.undoHistory[0]);',
    '    try { doc.undo(); } catch (undoErr) { break; }',
    '    labels.push(label);',
    '}',
    `${RESULT_SLOT} = { stepsUndone: labels.length, labels: labels };`,
  ].join('\n');
}

export function clampRollbackSteps(steps: number): number {
  if (!Number.isFinite(steps)) return 1;
  return Math.max(1, Math.min(Math.trunc(steps), MAX_ROLLBACK_STEPS));
}

// ============================================================================
// REPLY PARSING
// ============================================================================

const HostReplySchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), result: z.unknown() }),
  z.object({
    success: z.literal(false),
    error: z.string(),
    name: z.string().optional(),
    line: z.number().optional(),
  }),
]);

const RollbackReportSchema = z.object({
  stepsUndone: z.number().int().min(0),
  labels: z.array(z.string()),
});

/**
 * Parse the reply string produced by {@link buildScriptWrapper}.
 */
export function parseHostReply(raw: string): HostReply {
  const text = raw.trim();
  if (text.length === 0) {
    throw new HostProtocolError('Host returned an empty reply', raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HostProtocolError('Host reply is not JSON', raw);
  }

  const reply = HostReplySchema.safeParse(parsed);
  if (!reply.success) {
    throw new HostProtocolError(
      `Host reply has an unexpected shape: ${reply.error.errors.map((e) => e.message).join(', ')}`,
      raw
    );
  }

  const data = reply.data;
  if (data.success) {
    return { ok: true, value: data.result ?? null };
  }
  return {
    ok: false,
    error: data.error,
    errorName: data.name ?? 'Error',
    line: data.line ?? -1,
  };
}

/** Validate the value a rollback script deposited in `__result`. */
export function parseRollbackReport(value: unknown): RollbackReport {
  const report = RollbackReportSchema.safeParse(value);
  if (!report.success) {
    throw new HostProtocolError('Rollback reply has an unexpected shape', encode(value));
  }
  return report.data;
}

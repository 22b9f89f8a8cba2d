import * as vm from 'node:vm';
import { describe, expect, it, vi } from 'vitest';
import { HostProtocolError } from '../../core/errors.js';
import { readAsset } from '../assets.js';
import type { HostScriptRequest } from '../types.js';
import {
  HOST_SERIALIZER_ASSET,
  MAX_ROLLBACK_STEPS,
  buildRollbackScript,
  buildScriptWrapper,
  clampRollbackSteps,
  parseHostReply,
  parseRollbackReport,
} from '../wrapper.js';

const SERIALIZER = '/* serializer */';

describe('buildScriptWrapper', () => {
  it('prepends the serializer and embeds the body verbatim', () => {
    const source = buildScriptWrapper({ script: 'var doc = app.activeDocument;', undoMode: 'none' }, SERIALIZER);

    expect(source.startsWith(`${SERIALIZER}\n(function () {`)).toBe(true);
    expect(source).toContain('\nvar doc = app.activeDocument;\n');
  });

  it('declares the result slot inside the body function', () => {
    const source = buildScriptWrapper({ script: '__result = 1;', undoMode: 'none' }, SERIALIZER);

    expect(source).toContain('        var __result;');
    expect(source).toContain("__value = (typeof __result === 'undefined') ? null : __result;");
  });

  it('calls the body directly when nothing is grouped', () => {
    const source = buildScriptWrapper({ script: '', undoMode: 'none' }, SERIALIZER);

    expect(source).toContain('        __body();');
    expect(source).not.toContain('app.doScript(');
  });

  it.each([
    ['entire', 'ENTIRE_SCRIPT'],
    ['fast_entire_script', 'FAST_ENTIRE_SCRIPT'],
    ['auto', 'SCRIPT_REQUEST'],
  ] as const)('groups %s through UndoModes.%s', (undoMode, hostName) => {
    const source = buildScriptWrapper({ script: '', undoMode, undoName: 'Agent Script' }, SERIALIZER);

    expect(source).toContain(
      `        app.doScript(__body, ScriptLanguage.JAVASCRIPT, undefined, UndoModes.${hostName}, "Agent Script");`
    );
  });

  it('embeds the undo name as an escaped literal', () => {
    const source = buildScriptWrapper(
      { script: '', undoMode: 'entire', undoName: 'Fix "quotes"\n\\ and lines' },
      SERIALIZER
    );

    expect(source).toContain('UndoModes.ENTIRE_SCRIPT, "Fix \\"quotes\\"\\n\\\\ and lines");');
  });

  it('suppresses dialogs and always restores the interaction level', () => {
    const source = buildScriptWrapper({ script: '', undoMode: 'entire', undoName: 'n' }, SERIALIZER);

    const suppress = source.indexOf('app.scriptPreferences.userInteractionLevel = UserInteractionLevels.NEVER_INTERACT;');
    const finallyAt = source.indexOf('} finally {');
    const restore = source.indexOf('app.scriptPreferences.userInteractionLevel = __uilevel;');

    expect(source).toContain('var __uilevel = app.scriptPreferences.userInteractionLevel;');
    expect(suppress).toBeGreaterThan(-1);
    expect(finallyAt).toBeGreaterThan(suppress);
    expect(restore).toBeGreaterThan(finallyAt);
  });

  it('replies through the host serializer', () => {
    const source = buildScriptWrapper({ script: '', undoMode: 'none' }, SERIALIZER);

    expect(source).toContain('if (__fault !== null) return __execStringify(__fault);');
    expect(source).toContain(`return '{"success":true,"result":' + __execStringify(__value) + '}';`);
  });

  it('records where the body starts and ends', () => {
    const source = buildScriptWrapper({ script: 'var a = 1;\nvar b = 2;', undoMode: 'none' }, SERIALIZER);
    const lines = source.split('\n');

    expect(lines[2]).toBe('    var __bodyStart = 11, __bodyEnd = 12;');
    expect(lines[10]).toBe('var a = 1;');
    expect(lines[11]).toBe('var b = 2;');
  });

  it('counts the lines of a multi-line serializer', () => {
    const source = buildScriptWrapper({ script: '', undoMode: 'none' }, '// one\n// two\n');
    const lines = source.split('\n');

    expect(lines[4]).toBe('    var __bodyStart = 13, __bodyEnd = 13;');
    expect(lines.indexOf('// ---- script body ----')).toBe(11);
  });

  it('reads the bundled serializer by default', () => {
    const source = buildScriptWrapper({ script: '', undoMode: 'none' });

    expect(source).toContain('function __execStringify(');
  });
});

describe('buildRollbackScript', () => {
  it('loops over the clamped step count and reports the labels', () => {
    const script = buildRollbackScript(3);

    expect(script).toContain('for (var i = 0; i < 3; i++) {');
    expect(script).toContain('if (doc.undoHistory.length === 0) break;');
    expect(script).toContain('__result = { stepsUndone: labels.length, labels: labels };');
  });

  it('never asks for more than the maximum', () => {
    expect(buildRollbackScript(1000)).toContain(`i < ${MAX_ROLLBACK_STEPS};`);
  });
});

describe('clampRollbackSteps', () => {
  it('clamps to 1..50 and truncates fractions', () => {
    expect(clampRollbackSteps(0)).toBe(1);
    expect(clampRollbackSteps(-4)).toBe(1);
    expect(clampRollbackSteps(7)).toBe(7);
    expect(clampRollbackSteps(7.9)).toBe(7);
    expect(clampRollbackSteps(51)).toBe(50);
  });

  it('falls back to one step for non-finite input', () => {
    expect(clampRollbackSteps(NaN)).toBe(1);
    expect(clampRollbackSteps(Infinity)).toBe(1);
  });
});

describe('parseHostReply', () => {
  it('reads a success reply', () => {
    expect(parseHostReply('{"success":true,"result":{"pages":4}}')).toEqual({ ok: true, value: { pages: 4 } });
  });

  it('treats a missing result as null', () => {
    expect(parseHostReply('{"success":true}')).toEqual({ ok: true, value: null });
  });

  it('reads a fault reply with its name and line', () => {
    expect(
      parseHostReply('{"success":false,"error":"undefined is not an object","name":"TypeError","line":3}')
    ).toEqual({ ok: false, error: 'undefined is not an object', errorName: 'TypeError', line: 3 });
  });

  it('defaults the fault name and line', () => {
    expect(parseHostReply('{"success":false,"error":"failed"}')).toEqual({
      ok: false,
      error: 'failed',
      errorName: 'Error',
      line: -1,
    });
  });

  it('tolerates surrounding whitespace', () => {
    expect(parseHostReply('  {"success":true,"result":1}\r\n')).toEqual({ ok: true, value: 1 });
  });

  it.each([
    ['an empty reply', '', 'Host returned an empty reply'],
    ['text that is not JSON', 'undefined', 'Host reply is not JSON'],
  ])('rejects %s', (_label, raw, message) => {
    expect(() => parseHostReply(raw)).toThrow(new HostProtocolError(message));
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => parseHostReply('[1,2]')).toThrow(HostProtocolError);
    expect(() => parseHostReply('{"success":false}')).toThrow(/unexpected shape/);
  });
});

describe('parseRollbackReport', () => {
  it('accepts a well-formed report', () => {
    expect(parseRollbackReport({ stepsUndone: 2, labels: ['B', 'A'] })).toEqual({
      stepsUndone: 2,
      labels: ['B', 'A'],
    });
  });

  it('rejects anything else', () => {
    expect(() => parseRollbackReport({ steps_undone: 1 })).toThrow(HostProtocolError);
    expect(() => parseRollbackReport(null)).toThrow('Rollback reply has an unexpected shape');
  });
});

// ============================================================================
// HOST-SIDE EXECUTION
// ============================================================================

function loadSerializer(): vm.Context {
  const context = vm.createContext({});
  vm.runInContext(readAsset(...HOST_SERIALIZER_ASSET), context);
  return context;
}

/** Run `source` in the serializer's context; values built there keep that realm's Array. */
function stringifyIn(context: vm.Context, source: string): string {
  const encoded: unknown = vm.runInContext(source, context);
  return String(encoded);
}

describe('host serializer', () => {
  const context = loadSerializer();

  it('encodes plain data', () => {
    expect(stringifyIn(context, String.raw`__execStringify({ a: 1, b: "x\"y", c: [1, NaN, undefined] })`)).toBe(
      String.raw`{"a":1,"b":"x\"y","c":[1,null,null]}`
    );
  });

  it('maps non-finite numbers to null', () => {
    expect(stringifyIn(context, '__execStringify([Infinity, -Infinity, NaN])')).toBe('[null,null,null]');
  });

  it('escapes control characters', () => {
    expect(stringifyIn(context, String.raw`__execStringify(["tab\there", "\u0001", "line\nbreak"])`)).toBe(
      String.raw`["tab\there","\u0001","line\nbreak"]`
    );
  });

  it('marks a self reference as circular', () => {
    expect(stringifyIn(context, 'var v = {}; v.self = v; __execStringify(v)')).toBe('{"self":"[circular]"}');
  });

  it('does not flag shared siblings as circular', () => {
    expect(stringifyIn(context, 'var s = { n: 1 }; __execStringify({ a: s, b: s })')).toBe(
      '{"a":{"n":1},"b":{"n":1}}'
    );
  });

  it('cuts the graph at depth 21', () => {
    const source = 'var root = {}, cur = root; for (var i = 0; i < 25; i++) { cur.child = {}; cur = cur.child; } __execStringify(root)';

    expect(stringifyIn(context, source)).toBe(`${'{"child":'.repeat(21)}"[max depth]"${'}'.repeat(21)}`);
  });

  it('drops a member whose read throws and keeps the rest', () => {
    const source = [
      'var o = { keep: 1 };',
      "Object.defineProperty(o, 'bad', { enumerable: true, get: function () { throw new Error('no'); } });",
      'o.after = 2;',
      '__execStringify(o)',
    ].join('\n');

    expect(stringifyIn(context, source)).toBe('{"keep":1,"after":2}');
  });

  it('tags objects that expose a specifier', () => {
    const source = [
      'function TextFrame() {}',
      "TextFrame.prototype.toSpecifier = function () { return '/document[@id=1]//text-frame[@id=7]'; };",
      '__execStringify({ frame: new TextFrame() })',
    ].join('\n');

    expect(stringifyIn(context, source)).toBe('{"frame":"[HOST:TextFrame:/document[@id=1]//text-frame[@id=7]]"}');
  });

  it('falls back to a generic tag when the specifier throws', () => {
    const source = "__execStringify({ toSpecifier: function () { throw new Error('gone'); } })";

    expect(stringifyIn(context, source)).toBe('"[HOST object]"');
  });

  it('drops callables from objects and nulls them in arrays', () => {
    expect(stringifyIn(context, '__execStringify({ f: function () {}, list: [1, function () {}, 2] })')).toBe(
      '{"list":[1,null,2]}'
    );
    expect(stringifyIn(context, '__execStringify(function () {})')).toBe('null');
  });
});

function createStubHost(globals: Record<string, unknown> = {}) {
  const app = {
    scriptPreferences: { userInteractionLevel: 'interactWithAll' },
    activeDocument: { pages: { length: 3 } },
    doScript: vi.fn((body: () => void) => {
      body();
    }),
  };
  const context = vm.createContext({
    ...globals,
    app,
    ScriptLanguage: { JAVASCRIPT: 'javascript' },
    UndoModes: { ENTIRE_SCRIPT: 'entireScript', FAST_ENTIRE_SCRIPT: 'fastEntireScript', SCRIPT_REQUEST: 'scriptRequest' },
    UserInteractionLevels: { NEVER_INTERACT: 'neverInteract' },
  });
  return { app, context };
}

type StubHost = ReturnType<typeof createStubHost>;

function runWrapped(host: StubHost, request: HostScriptRequest): string {
  const reply: unknown = vm.runInContext(buildScriptWrapper(request), host.context);
  return String(reply);
}

describe('wrapped script in the host', () => {
  it('runs an ungrouped body and returns the result slot', () => {
    const host = createStubHost();

    const reply = runWrapped(host, {
      script: '__result = { pages: app.activeDocument.pages.length, list: [1, 2] };',
      undoMode: 'none',
    });

    expect(reply).toBe('{"success":true,"result":{"pages":3,"list":[1,2]}}');
    expect(host.app.doScript).not.toHaveBeenCalled();
    expect(host.app.scriptPreferences.userInteractionLevel).toBe('interactWithAll');
  });

  it('replies null when the body leaves the slot unset', () => {
    expect(runWrapped(createStubHost(), { script: 'var unused = 1;', undoMode: 'none' })).toBe(
      '{"success":true,"result":null}'
    );
  });

  it('groups the body through doScript with dialogs suppressed', () => {
    const host = createStubHost();

    const reply = runWrapped(host, {
      script: '__result = app.scriptPreferences.userInteractionLevel;',
      undoMode: 'entire',
      undoName: 'Add page',
    });

    expect(parseHostReply(reply)).toEqual({ ok: true, value: 'neverInteract' });
    expect(host.app.doScript).toHaveBeenCalledTimes(1);
    const call: unknown[] = host.app.doScript.mock.calls[0] ?? [];
    expect(typeof call[0]).toBe('function');
    expect(call.slice(1)).toEqual(['javascript', undefined, 'entireScript', 'Add page']);
    expect(host.app.scriptPreferences.userInteractionLevel).toBe('interactWithAll');
  });

  it('reports a fault in the body as data and restores the interaction level', () => {
    const host = createStubHost();

    const reply = runWrapped(host, {
      script: "throw new RangeError('bad page');",
      undoMode: 'entire',
      undoName: 'Broken',
    });

    expect(reply).toBe('{"success":false,"error":"bad page","name":"RangeError","line":-1}');
    expect(host.app.scriptPreferences.userInteractionLevel).toBe('interactWithAll');
  });

  it('reports a fault raised by doScript itself', () => {
    const host = createStubHost();
    host.app.doScript.mockImplementationOnce(() => {
      throw new Error('Undo stack is busy');
    });

    const reply = runWrapped(host, { script: '__result = 1;', undoMode: 'entire', undoName: 'Busy' });

    expect(parseHostReply(reply)).toEqual({ ok: false, error: 'Undo stack is busy', errorName: 'Error', line: -1 });
    expect(host.app.scriptPreferences.userInteractionLevel).toBe('interactWithAll');
  });

  it('reports fault lines relative to the submitted script', () => {
    const request: HostScriptRequest = {
      script: "var a = 1;\nvar e = new Error('boom'); e.line = faultLine; throw e;",
      undoMode: 'none',
    };
    const firstBodyLine = buildScriptWrapper(request).split('\n').indexOf('// ---- script body ----') + 2;
    const host = createStubHost({ faultLine: firstBodyLine + 1 });

    expect(parseHostReply(runWrapped(host, request))).toEqual({
      ok: false,
      error: 'boom',
      errorName: 'Error',
      line: 2,
    });
  });

  it('drops a fault line that falls outside the body', () => {
    const request: HostScriptRequest = {
      script: "var e = new Error('boom'); e.line = faultLine; throw e;",
      undoMode: 'none',
    };
    const host = createStubHost({ faultLine: 1 });

    expect(parseHostReply(runWrapped(host, request))).toMatchObject({ ok: false, line: -1 });
  });
});

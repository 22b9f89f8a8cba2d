/**
 * @fileoverview Defensive Encoder
 *
 * Turns an arbitrary value graph (cyclic, deeply nested, holding host-native
 * objects or members that throw on read) into JSON text. `encode` is total:
 * it returns well-formed text for every input and always terminates, because
 * recursion is bounded by {@link MAX_DEPTH} and cycles are cut on the active
 * path. Anything it cannot represent becomes a placeholder string or is left
 * out; nothing is thrown to the caller.
 *
 * Output grammar is JSON plus the sentinel strings in {@link PLACEHOLDERS} and
 * the `[HOST:<type>:<specifier>]` tag.
 *
 * @packageDocumentation
 */

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_DEPTH = 20;

export const PLACEHOLDERS = {
  circular: '[circular]',
  maxDepth: '[max depth]',
  hostObject: '[HOST object]',
} as const;

export type Placeholder = (typeof PLACEHOLDERS)[keyof typeof PLACEHOLDERS];

const NULL_LITERAL = 'null';
const HOST_TAG_PATTERN = /^\[HOST:[^:\]]*:[\s\S]*\]$/;

/** Returned by {@link attempt} probes to mark "the probe itself faulted". */
const FAULT: unique symbol = Symbol('probe-fault');

// ============================================================================
// FAILURE BOUNDARY
// ============================================================================

/**
 * Run a probe that may throw; on failure return `fallback` instead.
 */
export function attempt<T, F>(probe: () => T, fallback: F): T | F {
  try {
    return probe();
  } catch {
    return fallback;
  }
}

function readMember(target: unknown, key: string): unknown {
  if (target === null || (typeof target !== 'object' && typeof target !== 'function')) {
    throw new TypeError(`Cannot read '${key}' of ${String(target)}`);
  }
  return Reflect.get(target, key);
}

// ============================================================================
// CLASSIFIER
// ============================================================================

/** Closed capability set every value is dispatched on. */
export type ValueKind =
  | { kind: 'absent' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'bigint'; value: bigint }
  | { kind: 'string'; value: string }
  | { kind: 'callable' }
  | { kind: 'opaque' }
  | { kind: 'host'; typeName: string; specify: () => unknown }
  | { kind: 'sequence'; value: readonly unknown[] }
  | { kind: 'record'; value: object };

const OPAQUE: ValueKind = { kind: 'opaque' };

/**
 * Classify a value. Primitive kinds are decided by `typeof` alone; aggregates
 * are probed for `constructor` before anything else touches them, since some
 * host values fault on that first access.
 */
export function classifyValue(value: unknown): ValueKind {
  switch (typeof value) {
    case 'undefined':
      return { kind: 'absent' };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      return { kind: 'number', value };
    case 'bigint':
      return { kind: 'bigint', value };
    case 'string':
      return { kind: 'string', value };
    case 'function':
      return { kind: 'callable' };
    case 'symbol':
      return OPAQUE;
    default:
      break;
  }

  // null lands here too: reading its constructor faults.
  const ctor = attempt(() => readMember(value, 'constructor'), FAULT);
  if (ctor === FAULT) return OPAQUE;

  const toSpecifier = attempt(() => readMember(value, 'toSpecifier'), FAULT);
  if (toSpecifier === FAULT) return OPAQUE;
  if (typeof toSpecifier === 'function') {
    return {
      kind: 'host',
      typeName: hostTypeName(ctor),
      specify: () => Reflect.apply(toSpecifier, value, []),
    };
  }

  const isSequence = attempt(() => Array.isArray(value), FAULT);
  if (isSequence === FAULT) return OPAQUE;
  if (isSequence && Array.isArray(value)) {
    return { kind: 'sequence', value };
  }
  if (typeof value === 'object' && value !== null) {
    return { kind: 'record', value };
  }
  return OPAQUE;
}

function hostTypeName(ctor: unknown): string {
  const name = attempt(() => readMember(ctor, 'name'), undefined);
  return typeof name === 'string' && name.length > 0 ? name : 'Object';
}

// ============================================================================
// STRING ESCAPING
// ============================================================================

/**
 * Quote a string as a JSON string literal. Only backslash, quote and control
 * characters are escaped; everything else passes through unchanged.
 */
export function encodeString(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    switch (code) {
      case 0x5c:
        out += '\\\\';
        break;
      case 0x22:
        out += '\\"';
        break;
      case 0x08:
        out += '\\b';
        break;
      case 0x09:
        out += '\\t';
        break;
      case 0x0a:
        out += '\\n';
        break;
      case 0x0c:
        out += '\\f';
        break;
      case 0x0d:
        out += '\\r';
        break;
      default:
        out += code < 0x20 ? `\\u${code.toString(16).padStart(4, '0')}` : text.charAt(i);
    }
  }
  return `"${out}"`;
}

// ============================================================================
// ENCODER
// ============================================================================

/**
 * Encode any value as JSON text. Never throws.
 *
 * @example
 * ```typescript
 * encode({ a: 1, b: 'x"y', c: [1, NaN, undefined] });
 * // => '{"a":1,"b":"x\\"y","c":[1,null,null]}'
 * ```
 */
export function encode(value: unknown): string {
  return attempt(() => encodeAt(value, 0, []) ?? NULL_LITERAL, NULL_LITERAL);
}

/**
 * Encode one value at `depth`. `undefined` means "omit" (callables only);
 * the caller decides whether that becomes `null` or a dropped key.
 */
function encodeAt(value: unknown, depth: number, seen: unknown[]): string | undefined {
  if (depth > MAX_DEPTH) return encodeString(PLACEHOLDERS.maxDepth);

  const classified = classifyValue(value);
  switch (classified.kind) {
    case 'absent':
    case 'opaque':
      return NULL_LITERAL;
    case 'boolean':
      return classified.value ? 'true' : 'false';
    case 'number':
      return Number.isFinite(classified.value) ? String(classified.value) : NULL_LITERAL;
    case 'bigint':
      return classified.value.toString();
    case 'string':
      return encodeString(classified.value);
    case 'callable':
      return undefined;
    case 'host':
      return encodeHostObject(classified.typeName, classified.specify);
    case 'sequence':
    case 'record':
      break;
  }

  if (seen.includes(value)) return encodeString(PLACEHOLDERS.circular);

  seen.push(value);
  try {
    return classified.kind === 'sequence'
      ? encodeSequence(classified.value, depth, seen)
      : encodeRecord(classified.value, depth, seen);
  } finally {
    seen.pop();
  }
}

function encodeHostObject(typeName: string, specify: () => unknown): string {
  const tag = attempt(() => `[HOST:${typeName}:${String(specify())}]`, PLACEHOLDERS.hostObject);
  return encodeString(tag);
}

function encodeSequence(items: readonly unknown[], depth: number, seen: unknown[]): string {
  const parts: string[] = [];
  const length = attempt(() => items.length, 0);
  for (let i = 0; i < length; i++) {
    // A dropped callable keeps its slot as null so indices stay aligned.
    parts.push(attempt(() => encodeAt(items[i], depth + 1, seen), undefined) ?? NULL_LITERAL);
  }
  return `[${parts.join(',')}]`;
}

function encodeRecord(record: object, depth: number, seen: unknown[]): string {
  const keys = attempt(() => Object.keys(record), FAULT);
  if (keys === FAULT) return NULL_LITERAL;

  const parts: string[] = [];
  for (const key of keys) {
    const encoded = attempt(() => encodeAt(Reflect.get(record, key), depth + 1, seen), undefined);
    if (encoded !== undefined) {
      parts.push(`${encodeString(key)}:${encoded}`);
    }
  }
  return `{${parts.join(',')}}`;
}

// ============================================================================
// PLACEHOLDER RECOGNITION
// ============================================================================

/**
 * True when `text` is one of the sentinel strings the encoder substitutes for
 * data it would not represent. Consumers should not read these as host data.
 */
export function isPlaceholder(text: string): boolean {
  return (
    text === PLACEHOLDERS.circular ||
    text === PLACEHOLDERS.maxDepth ||
    text === PLACEHOLDERS.hostObject ||
    HOST_TAG_PATTERN.test(text)
  );
}

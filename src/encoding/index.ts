/**
 * @fileoverview Encoding Module
 *
 * Defensive, total JSON encoding for values returned by host scripts.
 *
 * @packageDocumentation
 */

export {
  MAX_DEPTH,
  PLACEHOLDERS,
  attempt,
  classifyValue,
  encode,
  encodeString,
  isPlaceholder,
  type Placeholder,
  type ValueKind,
} from './encoder.js';

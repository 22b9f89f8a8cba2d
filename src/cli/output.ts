/**
 * @fileoverview Output helpers for CLI commands
 *
 * Results go to stdout; everything else (logs, errors) goes to stderr.
 */

import { isExecutionSuccess, type ExecutionOutcome } from '../execution/types.js';
import { faultToError } from './errors.js';

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Unwrap a successful outcome into its decoded result. A fault is thrown as
 * a CliError for the dispatcher to report.
 */
export function unwrapOutcome(outcome: ExecutionOutcome): { result: unknown; elapsedMs: number } {
  if (!isExecutionSuccess(outcome)) {
    throw faultToError(outcome);
  }
  const result: unknown = JSON.parse(outcome.encodedResult);
  return { result, elapsedMs: outcome.elapsedMs };
}

/** Print a script result: the JSON envelope with `--json`, the bare value otherwise. */
export function printResult(outcome: ExecutionOutcome, json: boolean): void {
  const { result, elapsedMs } = unwrapOutcome(outcome);
  if (json) {
    printJson({ success: true, result, elapsedMs });
    return;
  }
  console.log(typeof result === 'string' ? result : JSON.stringify(result, null, 2));
}

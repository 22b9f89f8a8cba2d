import { parseRollbackReport } from '../../host/wrapper.js';
import { createError } from '../errors.js';
import { printJson, unwrapOutcome } from '../output.js';
import type { CommandContext } from './context.js';

export interface UndoCommandOptions {
  steps?: string;
}

export async function undoCommand(context: CommandContext, options: UndoCommandOptions): Promise<void> {
  const steps = options.steps === undefined ? 1 : Number(options.steps);
  if (!Number.isInteger(steps)) {
    throw createError('EINVALID_ARGUMENT', `--steps must be an integer, got ${options.steps}`);
  }

  const { result } = unwrapOutcome(await context.envelope.rollback(steps));
  const report = parseRollbackReport(result);
  if (context.json) {
    printJson({ success: true, ...report });
    return;
  }
  if (report.stepsUndone === 0) {
    console.log('Nothing to undo.');
    return;
  }
  console.log(`Undid ${report.stepsUndone} step(s):`);
  for (const label of report.labels) {
    console.log(`  - ${label}`);
  }
}

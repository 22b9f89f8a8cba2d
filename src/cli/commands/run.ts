import { readFile } from 'node:fs/promises';
import type { UndoMode } from '../../host/types.js';
import { DEFAULT_UNDO_NAME, UndoModeSchema } from '../../mcp/schema.js';
import { getErrorMessage } from '../../utils/errors.js';
import { CliError, createError } from '../errors.js';
import { printResult } from '../output.js';
import type { CommandContext } from './context.js';

export interface RunCommandOptions {
  file: string | undefined;
  undoName?: string;
  undoMode?: string;
}

export async function runCommand(context: CommandContext, options: RunCommandOptions): Promise<void> {
  if (!options.file) {
    throw new CliError(
      'run needs a script file',
      'EINVALID_ARGUMENT',
      'Usage: indesign-exec run <file> [--undo-name <label>] [--undo-mode <mode>]',
    );
  }

  const undoMode = parseUndoMode(options.undoMode);

  let script: string;
  try {
    script = await readFile(options.file, 'utf8');
  } catch (error) {
    throw createError('EFILE_NOT_FOUND', `Cannot read ${options.file}: ${getErrorMessage(error)}`, {
      file: options.file,
    });
  }

  const outcome = await context.envelope.submit({
    script,
    undoName: options.undoName ?? DEFAULT_UNDO_NAME,
    undoMode,
    requireDocument: false,
  });
  printResult(outcome, context.json);
}

function parseUndoMode(value: string | undefined): UndoMode {
  if (value === undefined) return 'entire';
  const parsed = UndoModeSchema.safeParse(value);
  if (!parsed.success) {
    throw createError('EINVALID_ARGUMENT', `Unknown undo mode: ${value}`, {
      allowed: UndoModeSchema.options,
    });
  }
  return parsed.data;
}

import { CliError } from '../errors.js';
import { printResult } from '../output.js';
import type { CommandContext } from './context.js';

export async function evalCommand(context: CommandContext, args: string[]): Promise<void> {
  const expression = args.join(' ');
  if (expression.trim().length === 0) {
    throw new CliError('eval needs an expression', 'EINVALID_ARGUMENT', 'Usage: indesign-exec eval "<expression>"');
  }
  printResult(await context.envelope.evaluateExpression(expression), context.json);
}

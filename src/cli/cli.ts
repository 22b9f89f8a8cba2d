/**
 * @fileoverview Argument parsing and command dispatch for the indesign-exec CLI
 *
 * {@link runCli} never throws and never exits the process: it reports errors
 * on stderr and returns the exit code.
 */

import { parseArgs } from 'node:util';
import { EXEC_SERVER_VERSION, loadConfigFromEnv } from '../config/index.js';
import { ExecutionEnvelope } from '../execution/envelope.js';
import { createHostBridge } from '../host/bridge_factory.js';
import type { HostBridge } from '../host/types.js';
import { main as serveMcp } from '../mcp/server.js';
import { Session } from '../session/session.js';
import { setLogLevel } from '../telemetry/logger.js';
import type { CommandContext } from './commands/context.js';
import { evalCommand } from './commands/eval.js';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { undoCommand } from './commands/undo.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

type Command = 'serve' | 'run' | 'eval' | 'undo' | 'status' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  serve: {
    description: 'Start the MCP server on stdio',
    usage: 'indesign-exec serve',
  },
  run: {
    description: 'Run a script file inside one undo step',
    usage: 'indesign-exec run <file> [--undo-name <label>] [--undo-mode <mode>]',
  },
  eval: {
    description: 'Evaluate a single expression',
    usage: 'indesign-exec eval "<expression>"',
  },
  undo: {
    description: 'Undo the most recent steps of the active document',
    usage: 'indesign-exec undo [--steps <n>]',
  },
  status: {
    description: 'Show which InDesign instance is reachable',
    usage: 'indesign-exec status',
  },
  help: {
    description: 'Show help information',
    usage: 'indesign-exec help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export interface CliDependencies {
  /** Host transport; defaults to the one the environment configures */
  bridge?: HostBridge;
  env?: NodeJS.ProcessEnv;

  /** Starts the MCP server; replaced in tests */
  serve?: (env: NodeJS.ProcessEnv) => Promise<unknown>;
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      json: { type: 'boolean', default: false },
      'undo-name': { type: 'string' },
      'undo-mode': { type: 'string' },
      steps: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const jsonMode = argv.includes('--json');

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', classifyError(error).message);
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }

  const { values, positionals } = parsed;

  if (values.version) {
    console.log(`indesign-exec ${EXEC_SERVER_VERSION}`);
    return 0;
  }

  const command = positionals[0] ?? 'serve';
  const commandArgs = positionals.slice(1);

  if (values.help || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return 0;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'indesign-exec help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }

  let session: Session | null = null;
  try {
    if (command === 'serve') {
      await (deps.serve ?? serveMcp)(env);
      return 0;
    }

    const config = loadConfigFromEnv(env);
    setLogLevel(config.logLevel);
    const bridge = deps.bridge ?? createHostBridge(config);
    session = new Session(bridge, { slowCallWarningMs: config.session.slowCallWarningMs });
    const context: CommandContext = {
      bridge,
      session,
      envelope: new ExecutionEnvelope(session),
      json: values.json,
    };

    switch (command) {
      case 'run':
        await runCommand(context, {
          file: commandArgs[0],
          undoName: values['undo-name'],
          undoMode: values['undo-mode'],
        });
        break;
      case 'eval':
        await evalCommand(context, commandArgs);
        break;
      case 'undo':
        await undoCommand(context, { steps: values.steps });
        break;
      case 'status':
        await statusCommand(context);
        break;
    }
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  } finally {
    session?.disconnect();
  }
}

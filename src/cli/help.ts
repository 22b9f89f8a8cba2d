/**
 * @fileoverview Detailed help text for indesign-exec CLI commands
 */

const HELP_TEXT = {
  main: `
indesign-exec - Run ExtendScript in a live InDesign session

USAGE:
    indesign-exec <command> [options]

COMMANDS:
    serve               Start the MCP server on stdio (default)
    run <file>          Run a script file inside one undo step
    eval <expression>   Evaluate a single expression
    undo                Undo the most recent steps of the active document
    status              Show which InDesign instance is reachable
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Print results and errors as JSON

ENVIRONMENT:
    INDESIGN_EXEC_BRIDGE     auto | osascript | wsh (default: auto)
    INDESIGN_EXEC_TARGETS    Comma-separated app names or ProgIDs to try
    INDESIGN_EXEC_TIMEOUT    Seconds before a call is logged as slow (default: 30)
    INDESIGN_EXEC_LOG_LEVEL  debug | info | warn | error (default: info)
    INDESIGN_EXEC_SCOPES     Enabled MCP tool scopes (default: read,write)

ERROR HANDLING:
    With --json, errors are printed to stderr as
    { "error": { "code", "message", "retryable", "recoveryHints", "context" } }

    Exit codes: 10-19 host not reachable, 20-29 script errors,
    50-59 invalid arguments or configuration.
`,

  serve: `
indesign-exec serve

Start the MCP server on stdin/stdout. Tools: run_jsx, get_document_info,
get_selection, eval_expression, undo. Resource: config://usage.

Logs go to stderr. Configuration comes from the INDESIGN_EXEC_* variables.
`,

  run: `
indesign-exec run <file> [--undo-name <label>] [--undo-mode <mode>]

Run the ExtendScript in <file>. Assign the value to return to __result.

OPTIONS:
    --undo-name <label>  Label shown in Edit > Undo (default: "Agent Script")
    --undo-mode <mode>   entire | fast_entire_script | auto | none (default: entire)

EXAMPLES:
    indesign-exec run fix_headings.jsx --undo-name "Fix headings"
    indesign-exec run report.jsx --undo-mode none --json
`,

  eval: `
indesign-exec eval <expression>

Evaluate one expression and print its value. Nothing is grouped for undo
and no document needs to be open.

EXAMPLES:
    indesign-exec eval app.documents.length
    indesign-exec eval "app.activeDocument.pages.length" --json
`,

  undo: `
indesign-exec undo [--steps <n>]

Undo the most recent steps of the active document. Each grouped run is one
step. <n> is clamped to 1..50 (default: 1).
`,

  status: `
indesign-exec status

Connect to InDesign and show its name, version and open documents.
`,

  help: `
indesign-exec help [command]

Show help for a command, or the overview without one.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

export function isHelpTopic(topic: string): topic is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, topic);
}

export function getHelpText(command?: string): string {
  return command !== undefined && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}

#!/usr/bin/env node
/**
 * @fileoverview indesign-exec CLI
 *
 * Commands:
 *   indesign-exec serve               - Start the MCP server on stdio (default)
 *   indesign-exec run <file>          - Run a script file inside one undo step
 *   indesign-exec eval <expression>   - Evaluate a single expression
 *   indesign-exec undo [--steps n]    - Undo the most recent steps
 *   indesign-exec status              - Show which InDesign instance is reachable
 *   indesign-exec help [command]      - Show help
 *
 * @packageDocumentation
 */

import { runCli } from './cli.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });

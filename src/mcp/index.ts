/**
 * @fileoverview MCP Module - Model Context Protocol server for indesign-exec
 *
 * - Tools: run_jsx, get_document_info, get_selection, eval_expression, undo
 * - Resources: config://usage
 * - Scope-based authorization and an in-memory audit log
 *
 * @packageDocumentation
 */

export {
  type AuthorizationScope,
  type ToolAuthorization,
  type ToolFaultPayload,
  type AuditLogEntry,
  TOOL_AUTHORIZATION,
} from './types.js';

export {
  SCHEMA_VERSION,
  JSON_SCHEMA_DRAFT,
  DEFAULT_UNDO_NAME,
  UndoModeSchema,
  DetailLevelSchema,
  RunJsxToolInputSchema,
  GetDocumentInfoToolInputSchema,
  GetSelectionToolInputSchema,
  EvalExpressionToolInputSchema,
  UndoToolInputSchema,
  TOOL_INPUT_SCHEMAS,
  JSON_SCHEMAS,
  isToolName,
  validateToolInput,
  getToolJsonSchema,
  listToolSchemas,
  type ToolName,
  type RunJsxToolInputType,
  type GetSelectionToolInputType,
  type EvalExpressionToolInputType,
  type UndoToolInputType,
  type JSONSchema,
  type JSONSchemaProperty,
  type ValidationError,
  type ValidationResult,
} from './schema.js';

export {
  ExecMCPServer,
  USAGE_RESOURCE_URI,
  renderOutcome,
  createExecMCPServer,
  startStdioServer,
  main,
  type ExecMCPServerDependencies,
} from './server.js';

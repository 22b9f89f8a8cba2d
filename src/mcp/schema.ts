/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP tool inputs
 *
 * Zod does the runtime validation; the JSON Schemas are what `tools/list`
 * advertises to clients. Both describe the same five tools.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { UNDO_MODES } from '../host/types.js';

// ============================================================================
// SCHEMA VERSION
// ============================================================================

export const SCHEMA_VERSION = '1.0.0';
export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

export const DEFAULT_UNDO_NAME = 'Agent Script';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

export const UndoModeSchema = z.enum(UNDO_MODES);

export const DetailLevelSchema = z.enum(['basic', 'full']);

/**
 * run_jsx tool input schema
 */
export const RunJsxToolInputSchema = z.object({
  code: z.string().min(1).describe('ExtendScript code to run. Assign the value to return to __result.'),
  undo_name: z.string().optional().default(DEFAULT_UNDO_NAME).describe('Label for Edit > Undo'),
  undo_mode: UndoModeSchema.optional().default('entire').describe('How changes are grouped for undo'),
}).strict();

/**
 * get_document_info tool input schema
 */
export const GetDocumentInfoToolInputSchema = z.object({}).strict();

/**
 * get_selection tool input schema
 */
export const GetSelectionToolInputSchema = z.object({
  detail_level: DetailLevelSchema.optional().default('basic').describe('"full" adds styles, colours and page'),
}).strict();

/**
 * eval_expression tool input schema
 */
export const EvalExpressionToolInputSchema = z.object({
  expression: z.string().min(1).max(10_000).describe('A single ExtendScript expression'),
}).strict();

/**
 * undo tool input schema. Out-of-range counts are clamped, not rejected.
 */
export const UndoToolInputSchema = z.object({
  steps: z.number().int().optional().default(1).describe('Undo steps to perform (clamped to 1..50)'),
}).strict();

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type RunJsxToolInputType = z.infer<typeof RunJsxToolInputSchema>;
export type GetSelectionToolInputType = z.infer<typeof GetSelectionToolInputSchema>;
export type EvalExpressionToolInputType = z.infer<typeof EvalExpressionToolInputSchema>;
export type UndoToolInputType = z.infer<typeof UndoToolInputSchema>;

// ============================================================================
// SCHEMA REGISTRY
// ============================================================================

export const TOOL_INPUT_SCHEMAS = {
  run_jsx: RunJsxToolInputSchema,
  get_document_info: GetDocumentInfoToolInputSchema,
  get_selection: GetSelectionToolInputSchema,
  eval_expression: EvalExpressionToolInputSchema,
  undo: UndoToolInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

// ============================================================================
// JSON SCHEMAS
// ============================================================================

export interface JSONSchemaProperty {
  type: string;
  description?: string;
  enum?: string[];
  default?: string | number;
  minimum?: number;
  maximum?: number;
  minLength?: number;
}

export type JSONSchema = {
  $schema?: string;
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required: string[];
  additionalProperties: boolean;
};

export const JSON_SCHEMAS: Record<ToolName, JSONSchema> = {
  run_jsx: {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties: {
      code: {
        type: 'string',
        description: 'ExtendScript (ES3) code. Assign the value to return to __result; do not use return.',
        minLength: 1,
      },
      undo_name: {
        type: 'string',
        description: 'Label shown in Edit > Undo, e.g. "Agent: Format headings". Required unless undo_mode is none.',
        default: DEFAULT_UNDO_NAME,
      },
      undo_mode: {
        type: 'string',
        enum: [...UNDO_MODES],
        description:
          'entire: one undo step; fast_entire_script: one step, redraw deferred; auto: one step per change; none: read-only',
        default: 'entire',
      },
    },
    required: ['code'],
    additionalProperties: false,
  },
  get_document_info: {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties: {},
    required: [],
    additionalProperties: false,
  },
  get_selection: {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties: {
      detail_level: {
        type: 'string',
        enum: ['basic', 'full'],
        description: 'basic: type, bounds and content; full: adds styles, colours and page',
        default: 'basic',
      },
    },
    required: [],
    additionalProperties: false,
  },
  eval_expression: {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties: {
      expression: {
        type: 'string',
        description: 'Expression to evaluate, e.g. app.activeDocument.pages.length',
        minLength: 1,
      },
    },
    required: ['expression'],
    additionalProperties: false,
  },
  undo: {
    $schema: JSON_SCHEMA_DRAFT,
    type: 'object',
    properties: {
      steps: {
        type: 'integer',
        description: 'Number of undo steps',
        minimum: 1,
        maximum: 50,
        default: 1,
      },
    },
    required: [],
    additionalProperties: false,
  },
};

// ============================================================================
// VALIDATION
// ============================================================================

export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  data?: unknown;
}

/**
 * Validate tool input against schema
 */
export function validateToolInput(toolName: string, input: unknown): ValidationResult {
  if (!isToolName(toolName)) {
    return {
      valid: false,
      errors: [{ path: '', message: `Unknown tool: ${toolName}`, code: 'unknown_tool' }],
    };
  }

  const schema: z.ZodTypeAny = TOOL_INPUT_SCHEMAS[toolName];
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return { valid: true, errors: [], data: result.data };
  }

  return {
    valid: false,
    errors: result.error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
      code: e.code,
    })),
  };
}

/**
 * Get JSON Schema for a tool
 */
export function getToolJsonSchema(toolName: string): JSONSchema | undefined {
  return isToolName(toolName) ? JSON_SCHEMAS[toolName] : undefined;
}

/**
 * List all available tool schemas
 */
export function listToolSchemas(): ToolName[] {
  return Object.keys(TOOL_INPUT_SCHEMAS).filter(isToolName);
}

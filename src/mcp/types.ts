/**
 * @fileoverview MCP tool authorization and audit types
 *
 * @packageDocumentation
 */

import type { AuthorizationScope } from '../config/index.js';
import type { FaultKind } from '../execution/types.js';
import type { ToolName } from './schema.js';

export type { AuthorizationScope };

// ============================================================================
// AUTHORIZATION
// ============================================================================

/** Authorization requirement for a tool */
export interface ToolAuthorization {
  tool: ToolName;

  requiredScopes: AuthorizationScope[];

  riskLevel: 'low' | 'medium' | 'high';
}

/** Authorization matrix for all tools */
export const TOOL_AUTHORIZATION: Record<ToolName, ToolAuthorization> = {
  run_jsx: {
    tool: 'run_jsx',
    requiredScopes: ['read', 'write'],
    riskLevel: 'high',
  },
  get_document_info: {
    tool: 'get_document_info',
    requiredScopes: ['read'],
    riskLevel: 'low',
  },
  get_selection: {
    tool: 'get_selection',
    requiredScopes: ['read'],
    riskLevel: 'low',
  },
  eval_expression: {
    tool: 'eval_expression',
    requiredScopes: ['read'],
    riskLevel: 'medium',
  },
  undo: {
    tool: 'undo',
    requiredScopes: ['read', 'write'],
    riskLevel: 'medium',
  },
};

// ============================================================================
// TOOL RESPONSES
// ============================================================================

/** Body of a failed tool call, serialized into the `isError` text content. */
export interface ToolFaultPayload {
  success: false;
  kind: FaultKind | 'denied';
  error: string;
  name?: string;
  line?: number;
  reason?: string;
}

// ============================================================================
// AUDIT
// ============================================================================

/** Audit log entry */
export interface AuditLogEntry {
  id: string;

  timestamp: string;

  operation: 'tool_call' | 'resource_read' | 'authorization';

  /** Tool name or resource URI */
  name: string;

  /** Input, with script text shortened */
  input?: unknown;

  status: 'success' | 'failure' | 'denied';

  durationMs?: number;

  error?: string;
}

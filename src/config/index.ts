/**
 * @fileoverview indesign-exec configuration
 *
 * Defaults live in {@link DEFAULT_EXEC_CONFIG}; callers override any part of
 * them with a partial config. {@link loadConfigFromEnv} reads the
 * `INDESIGN_EXEC_*` variables and validates them with zod.
 */

import { z } from 'zod';
import { InputValidationError } from '../core/errors.js';
import type { LogLevel } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

/** Which process transport reaches the host. `auto` picks by platform. */
export type BridgeKind = 'auto' | 'osascript' | 'wsh';

/** Authorization scope for MCP tools */
export type AuthorizationScope = 'read' | 'write';

export interface ExecServerConfig {
  /** Server name reported to MCP clients */
  name: string;

  /** Server version reported to MCP clients */
  version: string;

  bridge: {
    kind: BridgeKind;

    /** App names / ProgIDs to try, newest first. Empty means the transport's defaults. */
    targets: string[];
  };

  session: {
    /** Calls slower than this are logged as warnings. The call itself is never cut off. */
    slowCallWarningMs: number;
  };

  authorization: {
    enabledScopes: AuthorizationScope[];
  };

  audit: {
    enabled: boolean;

    /** Oldest entries are dropped past this count */
    maxEntries: number;
  };

  logLevel: LogLevel;
}

export const EXEC_SERVER_VERSION = '0.3.0';

export const DEFAULT_EXEC_CONFIG: ExecServerConfig = {
  name: 'indesign-exec',
  version: EXEC_SERVER_VERSION,
  bridge: {
    kind: 'auto',
    targets: [],
  },
  session: {
    slowCallWarningMs: 30_000,
  },
  authorization: {
    enabledScopes: ['read', 'write'],
  },
  audit: {
    enabled: true,
    maxEntries: 10_000,
  },
  logLevel: 'info',
};

export type ExecServerConfigOverrides = {
  [K in keyof ExecServerConfig]?: ExecServerConfig[K] extends unknown[]
    ? ExecServerConfig[K]
    : ExecServerConfig[K] extends object
      ? Partial<ExecServerConfig[K]>
      : ExecServerConfig[K];
};

/** Merge overrides section by section onto the defaults. */
export function resolveConfig(overrides: ExecServerConfigOverrides = {}): ExecServerConfig {
  return {
    ...DEFAULT_EXEC_CONFIG,
    ...overrides,
    bridge: { ...DEFAULT_EXEC_CONFIG.bridge, ...overrides.bridge },
    session: { ...DEFAULT_EXEC_CONFIG.session, ...overrides.session },
    authorization: { ...DEFAULT_EXEC_CONFIG.authorization, ...overrides.authorization },
    audit: { ...DEFAULT_EXEC_CONFIG.audit, ...overrides.audit },
  };
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

const commaList = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0));

const EnvSchema = z.object({
  INDESIGN_EXEC_BRIDGE: z.enum(['auto', 'osascript', 'wsh']).optional(),
  INDESIGN_EXEC_TARGETS: commaList.optional(),
  INDESIGN_EXEC_TIMEOUT: z.coerce.number().positive().optional(),
  INDESIGN_EXEC_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  INDESIGN_EXEC_SCOPES: commaList.pipe(z.array(z.enum(['read', 'write']))).optional(),
});

/**
 * Build a config from `INDESIGN_EXEC_*` variables. Unset or blank variables
 * keep their defaults; invalid values throw InputValidationError.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExecServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('INDESIGN_EXEC_') && value !== undefined && value.trim() !== ''
    )
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
    throw new InputValidationError(
      `Invalid environment configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues
    );
  }

  const vars = parsed.data;
  return resolveConfig({
    bridge: {
      ...(vars.INDESIGN_EXEC_BRIDGE !== undefined ? { kind: vars.INDESIGN_EXEC_BRIDGE } : {}),
      ...(vars.INDESIGN_EXEC_TARGETS !== undefined ? { targets: vars.INDESIGN_EXEC_TARGETS } : {}),
    },
    session:
      vars.INDESIGN_EXEC_TIMEOUT !== undefined
        ? { slowCallWarningMs: Math.round(vars.INDESIGN_EXEC_TIMEOUT * 1000) }
        : {},
    authorization:
      vars.INDESIGN_EXEC_SCOPES !== undefined ? { enabledScopes: vars.INDESIGN_EXEC_SCOPES } : {},
    ...(vars.INDESIGN_EXEC_LOG_LEVEL !== undefined ? { logLevel: vars.INDESIGN_EXEC_LOG_LEVEL } : {}),
  });
}

import { z } from 'zod';
import { logger, type LogLevel } from './logger.js';

// ============================================================================
// Transform helpers
// ============================================================================

/**
 * Parse an env string as an integer, falling back to defaultValue.
 */
function envInt(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      const parsed = parseInt(val, 10);
      return Number.isNaN(parsed) ? defaultValue : parsed;
    });
}

/**
 * Parse an env string as a boolean that defaults to true.
 * Only the string 'false' disables it.
 */
function envBoolDefaultTrue() {
  return z
    .string()
    .optional()
    .transform((val) => val !== 'false');
}

/**
 * Parse a comma-separated env string into a trimmed, non-empty list.
 */
function envList() {
  return z
    .string()
    .optional()
    .transform((val) =>
      (val ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    );
}

/**
 * `.catch` handler: an invalid value falls back to the default for this
 * variable only, with a warning. An unset variable falls back silently.
 */
function fallback<T>(variable: string, defaultValue: T) {
  return (ctx: { input: unknown }): T => {
    if (ctx.input !== undefined) {
      logger.warn({ variable, value: ctx.input }, 'Invalid environment value, using default');
    }
    return defaultValue;
  };
}

export const FAILURE_POLICIES = ['fail-fast', 'isolate'] as const;

export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // Plugin web server
  PLUGIN_SERVER_ENABLED: envBoolDefaultTrue(),
  PLUGIN_SERVER_HOST: z.string().optional().default('0.0.0.0'),
  PLUGIN_SERVER_PORT: envInt(5000),
  PLUGIN_SERVER_ORIGINS: envList(),

  // Event dispatch
  EVENT_BUFFER_SIZE: envInt(100),
  DISPATCH_FAILURE_POLICY: z
    .enum(FAILURE_POLICIES)
    .catch(fallback<FailurePolicy>('DISPATCH_FAILURE_POLICY', 'fail-fast')),

  // Logging
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .optional()
    .catch(fallback<LogLevel | undefined>('LOG_LEVEL', undefined)),
});

export type ParsedEnv = z.infer<typeof envSchema>;

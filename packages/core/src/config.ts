import { envSchema, type FailurePolicy } from './config-schema.js';
import type { LogLevel } from './logger.js';

// ============================================================================
// Config Types
// ============================================================================

export interface RuntimeConfig {
  server: {
    enabled: boolean;
    host: string;
    port: number;
    /** Empty list allows any origin */
    allowedOrigins: string[];
    rateLimit: { windowMs: number; max: number };
  };
  events: {
    /** Number of dispatched events kept for inspection */
    bufferSize: number;
    failurePolicy: FailurePolicy;
  };
  /** Log threshold from LOG_LEVEL; unset leaves the logger as it is */
  logLevel?: LogLevel;
}

/** Address the plugin web server binds to. */
export type Endpoint = readonly [host: string, port: number];

// ============================================================================
// Factory: create config from env (no process.exit; each invalid value
// falls back to its own default)
// ============================================================================

export function createConfig(
  overrides: Partial<RuntimeConfig> = {},
  source: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const env = envSchema.parse(source);

  const defaults: RuntimeConfig = {
    server: {
      enabled: env.PLUGIN_SERVER_ENABLED,
      host: env.PLUGIN_SERVER_HOST,
      port: env.PLUGIN_SERVER_PORT,
      allowedOrigins: env.PLUGIN_SERVER_ORIGINS,
      rateLimit: { windowMs: 60 * 1000, max: 100 },
    },
    events: {
      bufferSize: env.EVENT_BUFFER_SIZE,
      failurePolicy: env.DISPATCH_FAILURE_POLICY,
    },
    logLevel: env.LOG_LEVEL,
  };

  return { ...defaults, ...overrides };
}

export function endpointOf(config: RuntimeConfig): Endpoint {
  return [config.server.host, config.server.port];
}

// @chatplug/core: shared types, config, logger, errors and text utilities
export * from './types.js';
export * from './config.js';
export { envSchema, FAILURE_POLICIES } from './config-schema.js';
export type { FailurePolicy, ParsedEnv } from './config-schema.js';
export { logger, logEmitter, getLogBuffer, getLogLevel, setLogLevel } from './logger.js';
export type { LogEntry, LogLevel, Logger } from './logger.js';
export {
  PluginError,
  PluginNotFoundError,
  PluginLoadError,
  PluginBindingError,
  EventContractViolation,
} from './errors.js';
export { formatError, escapeRegex } from './utils.js';
export { extractMentionText, mentionToken, MENTION_MARKER } from './mention-text.js';

export { loadHookwireConfig, parseSimpleYaml, DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { HookwireConfig } from './config.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
export { createHookLoader } from './hook-loader.js';
export type { HookModule } from './hook-loader.js';

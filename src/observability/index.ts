export { ContextLogger, silentLogger } from './context-logger.js';
export type { ContextLoggerOptions, LogLevel, WritableOutput } from './context-logger.js';

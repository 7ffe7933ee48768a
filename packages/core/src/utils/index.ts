export { generateId, now } from './id';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel, type ConsoleLoggerOptions } from './logger';

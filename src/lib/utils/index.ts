export { createLogger, setLogger, type Logger, type LogLevel, type LogSink } from './logger.js';
export { redactSecrets, splitOutputLines, boundLines } from './redact.js';

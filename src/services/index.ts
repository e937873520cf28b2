/**
 * services/index.ts
 * Barrel export for the checker's utility services.
 */

export { FileService } from './file-service.js';
export { InputValidator, ValidationError } from './input-validator.js';
export { DiagnosticExporter } from './diagnostic-exporter.js';
export { ConsoleLogger, FileLogger, TeeLogger, SilentLogger, formatLogLine } from './logger.js';
export type { Logger, LogLevel, ConsoleStream } from './logger.js';

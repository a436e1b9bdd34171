/**
 * services/index.ts
 * Barrel export for the utility services.
 */

export { FileService } from './file-service.js';
export { LookupCache } from './lookup-cache.js';
export { ModelValidator } from './model-validator.js';
export { ModelExporter } from './model-exporter.js';
export {
  PlaybookGraphError,
  FormatError,
  MissingResourceError,
  ModelValidationError,
} from './errors.js';
export type { PlaybookGraphErrorCode } from './errors.js';
export { ConsoleLogger, FileLogger, TeeLogger, CollectingLogger, SilentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export { logger, configureLogger, createScopedLogger, formatObject } from './logger';
export type { ScopedLogger, LogLevel, ConfigureLoggerOptions } from './logger';

export * from './fileHelpers';
export * from './errorHelpers';

export * as schemas from './schemas';

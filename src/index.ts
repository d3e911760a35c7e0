/**
 * @fileoverview Entrada pública del paquete: motor de descargas, configuración y logger.
 * @module model-shard-downloader
 */

export * from './engines';
export { default as config, mergeConfig, loadConfigOverrides } from './config';
export type {
  AppConfig,
  AppConfigOverrides,
  NetworkConfig,
  DownloadsConfig,
  VerifierConfig,
  LoggingConfig,
  LogLevelName,
} from './config.types';
export { logger, configureLogger } from './utils';
export type { ScopedLogger, ConfigureLoggerOptions } from './utils';
export { ERRORS } from './constants/errors';

/**
 * Configuración por defecto del descargador (valores de runtime).
 *
 * Aquí se definen timeouts, backoff, concurrencia, tamaños de bloque y de buffer de hash,
 * el sufijo de archivos parciales y el logging. Un archivo JSON del usuario puede
 * sobrescribir cualquier clave (loadConfigOverrides); las opciones pasadas a
 * DownloadCoordinator.run() tienen prioridad sobre ambos.
 *
 * @module config
 */

import { promises as fs } from 'fs';
import type { AppConfig, AppConfigOverrides } from './config.types';
import { SETTINGS_ERRORS } from './constants/errors';
import { getErrorMessage, isFileNotFound } from './utils/errorHelpers';
import { validateConfigOverrides } from './utils/schemas';

const isDev = process.env.NODE_ENV === 'development';

const config: AppConfig = {
  network: {
    responseTimeoutMs: 30000,
    idleTimeoutMs: 60000,
    retryDelayMs: 1000,
    maxRetryDelayMs: 30000,
    retryJitterFactor: 0.3,
    retryAfterMaxMs: 300000,
    userAgent: 'model-shard-downloader/1.0',
  },

  downloads: {
    // 3-4 tareas: suficiente para saturar el enlace sin agotar memoria ni radio en móvil
    maxConcurrent: 3,
    maxAttempts: 3,
    chunkSize: 64 * 1024,
    partialSuffix: '.partial',
    progressThrottleMs: 0,
  },

  verifier: {
    hashBufferSize: 64 * 1024,
  },

  logging: {
    consoleLevel: isDev ? 'debug' : 'info',
    fileLevel: 'info',
    logFile: null,
  },
};

/** Mezcla sobrescrituras parciales sobre una configuración base (sin mutarla). */
export function mergeConfig(base: AppConfig, overrides: AppConfigOverrides = {}): AppConfig {
  return {
    network: { ...base.network, ...overrides.network },
    downloads: { ...base.downloads, ...overrides.downloads },
    verifier: { ...base.verifier, ...overrides.verifier },
    logging: { ...base.logging, ...overrides.logging },
  };
}

/**
 * Lee un archivo JSON de configuración, lo valida y lo mezcla sobre los valores por defecto.
 * Si el archivo no existe devuelve los valores por defecto.
 */
export async function loadConfigOverrides(filePath: string): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isFileNotFound(error)) {
      return mergeConfig(config);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${SETTINGS_ERRORS.LOAD_FAILED} (${filePath}): ${getErrorMessage(error)}`);
  }

  const validation = validateConfigOverrides(parsed);
  if (!validation.success || !validation.data) {
    throw new Error(validation.error ?? SETTINGS_ERRORS.INVALID);
  }
  return mergeConfig(config, validation.data);
}

export default config;

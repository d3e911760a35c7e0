/**
 * Tipos para la configuración centralizada del descargador.
 *
 * La implementación concreta y los valores por defecto están en config.ts.
 */

export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface NetworkConfig {
  /** Tiempo máximo hasta recibir cabeceras de respuesta (ms). */
  responseTimeoutMs: number;
  /** Tiempo máximo sin recibir bytes del cuerpo antes de abortar (ms). */
  idleTimeoutMs: number;
  /** Delay base del backoff exponencial entre intentos (ms). */
  retryDelayMs: number;
  /** Tope del backoff (ms). */
  maxRetryDelayMs: number;
  /** Jitter relativo (0.0-1.0) aplicado al delay calculado. */
  retryJitterFactor: number;
  /** Tope aplicado a Retry-After de 429/503 (ms). */
  retryAfterMaxMs: number;
  userAgent: string;
}

export interface DownloadsConfig {
  /** Tareas de archivo simultáneas dentro de una clase de prioridad. */
  maxConcurrent: number;
  /** Intentos por archivo antes de marcarlo como fallido. */
  maxAttempts: number;
  /** Tamaño máximo de cada bloque escrito al archivo parcial (bytes). */
  chunkSize: number;
  /** Sufijo reservado de los archivos en curso. */
  partialSuffix: string;
  /** Throttle de eventos de progreso por archivo (0 = un evento por bloque). */
  progressThrottleMs: number;
}

export interface VerifierConfig {
  /** Tamaño del buffer de lectura al calcular SHA-256 (bytes). */
  hashBufferSize: number;
}

export interface LoggingConfig {
  consoleLevel: LogLevelName | false;
  fileLevel: LogLevelName | false;
  /** Ruta del archivo de log; null desactiva el transport de archivo. */
  logFile: string | null;
}

export interface AppConfig {
  /** Timeouts, backoff y cabeceras HTTP. */
  network: NetworkConfig;
  /** Concurrencia, reintentos y escritura a disco. */
  downloads: DownloadsConfig;
  /** Parámetros del cálculo de hash. */
  verifier: VerifierConfig;
  logging: LoggingConfig;
}

/** Sobrescrituras parciales por sección (archivo JSON del usuario). */
export type AppConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Clasificación de errores y política de reintentos del motor de descargas.
 *
 * classifyTransientError: categoría del fallo de red (para logs).
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 * calculateBackoffDelay: backoff exponencial acotado con jitter.
 * isRetryableTransferError: decide si un TransferError consume otro intento o es fatal.
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import { getErrorMessage, logger } from '../utils';
import { TransferError, TransferErrorKind, getErrorCode } from './TransferError';

const log = logger.child('DownloadValidator');

/**
 * Clasificación del error de red:
 * - `timeout`: el servidor no respondió a tiempo (vivo pero lento).
 * - `connection_reset`: conexión interrumpida.
 * - `connection_refused`: servidor rechaza conexiones o host inalcanzable.
 * - `dns`: resolución DNS falló.
 * - `server_overload`: 429/503.
 * - `unknown`: error no clasificado.
 */
export type TransientErrorType =
  | 'timeout'
  | 'connection_reset'
  | 'connection_refused'
  | 'dns'
  | 'server_overload'
  | 'unknown';

export function classifyTransientError(error: unknown): TransientErrorType {
  if (typeof error !== 'object' || error === null) return 'unknown';

  if (error instanceof TransferError && (error.status === 429 || error.status === 503)) {
    return 'server_overload';
  }

  const code = getErrorCode(error) ?? '';
  const msg = getErrorMessage(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'UND_ERR_CONNECT_TIMEOUT' ||
    code === 'UND_ERR_HEADERS_TIMEOUT' ||
    code === 'UND_ERR_BODY_TIMEOUT' ||
    msg.includes('timeout') ||
    msg.includes('Tiempo de espera')
  ) {
    return 'timeout';
  }

  if (
    code === 'ECONNRESET' ||
    code === 'EPIPE' ||
    code === 'UND_ERR_SOCKET' ||
    code === 'UND_ERR_CLOSED' ||
    msg.includes('terminated') ||
    msg.includes('other side closed')
  ) {
    return 'connection_reset';
  }

  if (code === 'ECONNREFUSED' || code === 'ENETUNREACH' || code === 'EHOSTUNREACH') {
    return 'connection_refused';
  }

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'dns';
  }

  return 'unknown';
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms acotados o null. */
export function parseRetryAfter(
  retryAfter: string | null | undefined,
  maxMs: number = config.network.retryAfterMaxMs,
  now: number = Date.now()
): number | null {
  if (!retryAfter) return null;
  const s = retryAfter.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, maxMs);
  }
  const date = new Date(s);
  if (!Number.isNaN(date.getTime())) {
    const ms = date.getTime() - now;
    return ms > 0 ? Math.min(ms, maxMs) : null;
  }
  return null;
}

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter relativo (0.0-1.0). */
  jitterFactor: number;
  /** Tope para la espera pedida por el servidor con Retry-After. */
  retryAfterMaxMs: number;
}

export function defaultBackoffPolicy(): BackoffPolicy {
  return {
    baseDelayMs: config.network.retryDelayMs,
    maxDelayMs: config.network.maxRetryDelayMs,
    jitterFactor: config.network.retryJitterFactor,
    retryAfterMaxMs: config.network.retryAfterMaxMs,
  };
}

/**
 * Delay antes del intento siguiente: base * 2^retryIndex + jitter, acotado por maxDelayMs.
 * Un Retry-After explícito del servidor (429/503) tiene prioridad, acotado por retryAfterMaxMs.
 *
 * @param retryIndex - Reintentos previos (0 para el primer reintento).
 */
export function calculateBackoffDelay(
  retryIndex: number,
  policy: BackoffPolicy = defaultBackoffPolicy(),
  error?: TransferError,
  random: () => number = Math.random
): number {
  if (error?.retryAfterMs != null && error.retryAfterMs > 0) {
    return Math.min(error.retryAfterMs, policy.retryAfterMaxMs);
  }
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, retryIndex);
  const jitter = random() * policy.jitterFactor * exponentialDelay;
  const delay = Math.round(Math.min(exponentialDelay + jitter, policy.maxDelayMs));

  log.debug(
    `[Backoff] retry=${retryIndex}, delay=${delay}ms (base=${policy.baseDelayMs}, max=${policy.maxDelayMs})`
  );
  return delay;
}

/** Estados HTTP que merecen reintento: 5xx, 408 Request Timeout y 429 Too Many Requests. */
export function isRetryableHttpStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Indica si el error consume un intento y se reintenta (true) o termina la tarea (false).
 * La corrupción (tamaño o hash) y los fallos locales se reintentan dentro del tope de intentos.
 */
export function isRetryableTransferError(error: TransferError): boolean {
  switch (error.kind) {
    case TransferErrorKind.NETWORK:
    case TransferErrorKind.SIZE_MISMATCH:
    case TransferErrorKind.DIGEST_MISMATCH:
    case TransferErrorKind.RANGE_NOT_SATISFIABLE:
    case TransferErrorKind.IO:
      return true;
    case TransferErrorKind.HTTP:
      return error.status !== undefined && isRetryableHttpStatus(error.status);
    case TransferErrorKind.CANCELLED:
      return false;
    default:
      return false;
  }
}

/**
 * Taxonomía de errores de transferencia.
 *
 * network y http (5xx/408/429) son transitorios; size-mismatch y digest-mismatch se tratan
 * como corrupción y provocan otra descarga; range-not-satisfiable reinicia desde cero;
 * io es un fallo local con reintentos limitados; cancelled no se reintenta nunca.
 *
 * @module engines/TransferError
 */

import { getErrorCode, getErrorMessage } from '../utils/errorHelpers';
import type { TransferErrorInfo } from './types';

export const TransferErrorKind = Object.freeze({
  NETWORK: 'network',
  HTTP: 'http',
  SIZE_MISMATCH: 'size-mismatch',
  DIGEST_MISMATCH: 'digest-mismatch',
  RANGE_NOT_SATISFIABLE: 'range-not-satisfiable',
  IO: 'io',
  CANCELLED: 'cancelled',
} as const);

export type TransferErrorKindType = (typeof TransferErrorKind)[keyof typeof TransferErrorKind];

export interface TransferErrorOptions {
  status?: number;
  code?: string;
  retryAfterMs?: number;
  cause?: unknown;
}

export class TransferError extends Error {
  readonly kind: TransferErrorKindType;
  readonly status?: number;
  readonly code?: string;
  readonly retryAfterMs?: number;

  constructor(kind: TransferErrorKindType, message: string, options: TransferErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransferError';
    this.kind = kind;
    this.status = options.status;
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
  }

  toInfo(): TransferErrorInfo {
    const info: TransferErrorInfo = { kind: this.kind, message: this.message };
    if (this.status !== undefined) info.status = this.status;
    if (this.code !== undefined) info.code = this.code;
    return info;
  }
}

export { getErrorCode };

export function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

/**
 * Normaliza cualquier error a TransferError. Un TransferError se devuelve tal cual;
 * el resto se envuelve con el tipo indicado conservando código y causa.
 */
export function toTransferError(error: unknown, kind: TransferErrorKindType): TransferError {
  if (error instanceof TransferError) return error;
  return new TransferError(kind, getErrorMessage(error), { code: getErrorCode(error), cause: error });
}

/**
 * Descarga HTTP de un archivo (o de su cola desde un offset) hacia un ByteSink.
 *
 * Envía `Range: bytes=N-` cuando hay bytes previos y distingue las respuestas:
 * 206 (reanudación aceptada), 200 (servidor ignoró el rango), 416 (rango no satisfacible)
 * y el resto (error HTTP). El cuerpo se escribe en bloques de como máximo chunkSize
 * bytes; cada bloque se escribe entero antes de observar la cancelación, así el parcial
 * siempre termina en un límite de bloque.
 *
 * @module RangeFetcher
 */

import config from '../config';
import { DOWNLOAD_ERRORS, GENERAL_ERRORS, NETWORK_ERRORS } from '../constants/errors';
import { getErrorMessage, logger } from '../utils';
import { parseRetryAfter } from './DownloadValidator';
import { TransferError, TransferErrorKind, getErrorCode, isAbortError } from './TransferError';
import type { ByteSink, FetchInit, FetchLike, FetchResult } from './types';

const log = logger.child('RangeFetcher');

export interface RangeFetcherOptions {
  fetchImpl?: FetchLike;
  chunkSize?: number;
  responseTimeoutMs?: number;
  idleTimeoutMs?: number;
  userAgent?: string;
  retryAfterMaxMs?: number;
}

export interface RangeFetchRequest {
  url: string;
  sink: ByteSink;
  resumeFromByte: number;
  /** Tamaño total del archivo, no de lo que queda por bajar. */
  expectedTotalSize: number | null;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Bytes escritos en esta petición, tras cada bloque. */
  onProgress?: (_bytesWritten: number) => void;
}

export interface ContentRange {
  start: number;
  end: number;
  total: number | null;
}

/** Parsea `Content-Range: bytes start-end/total` (total puede ser `*`). */
export function parseContentRange(value: string | null): ContentRange | null {
  if (!value) return null;
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(value.trim());
  if (!match) return null;
  return {
    start: parseInt(match[1], 10),
    end: parseInt(match[2], 10),
    total: match[3] === '*' ? null : parseInt(match[3], 10),
  };
}

/**
 * Subtipos de size-mismatch. Solo SHORT_BODY deja un parcial reanudable; en los otros
 * el servidor no coincide con el manifiesto y el parcial se descarta.
 */
export const SizeMismatchCode = Object.freeze({
  SHORT_BODY: 'SHORT_BODY',
  TOO_MANY_BYTES: 'TOO_MANY_BYTES',
  TOTAL_MISMATCH: 'TOTAL_MISMATCH',
} as const);

type AbortReason = 'cancelled' | 'response-timeout' | 'idle-timeout';

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export default class RangeFetcher {
  private readonly fetchImpl: FetchLike;
  private readonly chunkSize: number;
  private readonly responseTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly userAgent: string;
  private readonly retryAfterMaxMs: number;

  constructor(options: RangeFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.chunkSize = options.chunkSize ?? config.downloads.chunkSize;
    this.responseTimeoutMs = options.responseTimeoutMs ?? config.network.responseTimeoutMs;
    this.idleTimeoutMs = options.idleTimeoutMs ?? config.network.idleTimeoutMs;
    this.userAgent = options.userAgent ?? config.network.userAgent;
    this.retryAfterMaxMs = options.retryAfterMaxMs ?? config.network.retryAfterMaxMs;
  }

  async fetch(request: RangeFetchRequest): Promise<FetchResult> {
    const { url, sink, resumeFromByte, expectedTotalSize, signal, onProgress } = request;

    if (signal?.aborted) {
      throw new TransferError(TransferErrorKind.CANCELLED, GENERAL_ERRORS.OPERATION_CANCELLED);
    }

    const controller = new AbortController();
    let abortReason: AbortReason | null = null;
    const abortWith = (reason: AbortReason): void => {
      if (abortReason === null) abortReason = reason;
      controller.abort();
    };
    const onExternalAbort = (): void => abortWith('cancelled');
    signal?.addEventListener('abort', onExternalAbort, { once: true });

    let responseTimer: NodeJS.Timeout | null = setTimeout(
      () => abortWith('response-timeout'),
      this.responseTimeoutMs
    );
    let idleTimer: NodeJS.Timeout | null = null;
    const clearTimers = (): void => {
      if (responseTimer) clearTimeout(responseTimer);
      if (idleTimer) clearTimeout(idleTimer);
      responseTimer = null;
      idleTimer = null;
    };

    const toError = (error: unknown): TransferError => {
      if (error instanceof TransferError) return error;
      if (abortReason === 'cancelled' || signal?.aborted) {
        return new TransferError(TransferErrorKind.CANCELLED, GENERAL_ERRORS.OPERATION_CANCELLED, {
          cause: error,
        });
      }
      if (abortReason === 'response-timeout') {
        return new TransferError(TransferErrorKind.NETWORK, NETWORK_ERRORS.RESPONSE_TIMEOUT, {
          code: 'ETIMEDOUT',
          cause: error,
        });
      }
      if (abortReason === 'idle-timeout') {
        return new TransferError(TransferErrorKind.NETWORK, NETWORK_ERRORS.IDLE_TIMEOUT, {
          code: 'ETIMEDOUT',
          cause: error,
        });
      }
      if (isAbortError(error)) {
        return new TransferError(TransferErrorKind.NETWORK, NETWORK_ERRORS.CONNECTION_CLOSED, {
          code: getErrorCode(error),
          cause: error,
        });
      }
      return new TransferError(
        TransferErrorKind.NETWORK,
        `${NETWORK_ERRORS.CONNECTION_FAILED}: ${getErrorMessage(error)}`,
        { code: getErrorCode(error), cause: error }
      );
    };

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'identity',
      ...request.headers,
    };
    if (resumeFromByte > 0) {
      headers.Range = `bytes=${resumeFromByte}-`;
    }
    const init: FetchInit = { method: 'GET', headers, signal: controller.signal, redirect: 'follow' };

    let settled = false;
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, init);
      } catch (error) {
        throw toError(error);
      }
      if (responseTimer) clearTimeout(responseTimer);
      responseTimer = null;

      const status = response.status;

      if (status === 416) {
        log.warn(`Range not satisfiable para ${url} (offset ${resumeFromByte})`);
        await this.discardBody(response);
        settled = true;
        return { kind: 'range-not-satisfiable', serverIgnoredRange: false, httpStatus: status };
      }

      if (status !== 200 && status !== 206) {
        const retryAfterMs =
          status === 429 || status === 503
            ? parseRetryAfter(response.headers.get('retry-after'), this.retryAfterMaxMs)
            : null;
        await this.discardBody(response);
        settled = true;
        throw new TransferError(
          TransferErrorKind.HTTP,
          `${NETWORK_ERRORS.HTTP_ERROR} ${status}${response.statusText ? ` ${response.statusText}` : ''}`,
          { status, retryAfterMs: retryAfterMs ?? undefined }
        );
      }

      let announcedTotal: number | null = null;
      if (status === 200) {
        if (resumeFromByte > 0) {
          log.warn(`${DOWNLOAD_ERRORS.SERVER_IGNORED_RANGE}: ${url}`);
          await this.discardBody(response);
          settled = true;
          return { kind: 'server-ignored-range', serverIgnoredRange: true, httpStatus: status };
        }
        const contentLength = response.headers.get('content-length');
        if (contentLength && /^\d+$/.test(contentLength)) {
          announcedTotal = parseInt(contentLength, 10);
        }
      } else {
        const range = parseContentRange(response.headers.get('content-range'));
        if (range && range.start !== resumeFromByte) {
          log.warn(
            `${DOWNLOAD_ERRORS.SERVER_IGNORED_RANGE}: Content-Range empieza en ${range.start}, pedido ${resumeFromByte}`
          );
          await this.discardBody(response);
          settled = true;
          return { kind: 'server-ignored-range', serverIgnoredRange: true, httpStatus: status };
        }
        announcedTotal = range?.total ?? null;
      }

      if (expectedTotalSize !== null && announcedTotal !== null && announcedTotal !== expectedTotalSize) {
        await this.discardBody(response);
        settled = true;
        throw new TransferError(
          TransferErrorKind.SIZE_MISMATCH,
          `${DOWNLOAD_ERRORS.CONTENT_RANGE_MISMATCH}: ${announcedTotal}/${expectedTotalSize} bytes`,
          { code: SizeMismatchCode.TOTAL_MISMATCH }
        );
      }

      const totalSize = expectedTotalSize ?? announcedTotal;
      const expectedRemaining = totalSize !== null ? totalSize - resumeFromByte : null;

      if (!response.body) {
        settled = true;
        if (expectedRemaining !== null && expectedRemaining > 0) {
          throw new TransferError(TransferErrorKind.NETWORK, DOWNLOAD_ERRORS.BODY_MISSING);
        }
        return { kind: 'completed', serverIgnoredRange: false, httpStatus: status, bytesWritten: 0, totalSize };
      }

      const reader = response.body.getReader();
      const armIdle = (): void => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = setTimeout(() => abortWith('idle-timeout'), this.idleTimeoutMs);
      };

      let bytesWritten = 0;
      try {
        for (;;) {
          armIdle();
          const { done, value } = await reader.read();
          if (done) break;
          // los trozos de undici pueden ser Uint8Array de otro realm
          if (!ArrayBuffer.isView(value)) {
            throw new TransferError(
              TransferErrorKind.NETWORK,
              `${NETWORK_ERRORS.INVALID_BODY_CHUNK}: ${typeof value}`
            );
          }
          const bytes = new Uint8Array(value.buffer, value.byteOffset, value.byteLength);

          for (let offset = 0; offset < bytes.byteLength; offset += this.chunkSize) {
            const chunk = bytes.subarray(offset, Math.min(offset + this.chunkSize, bytes.byteLength));
            if (expectedRemaining !== null && bytesWritten + chunk.byteLength > expectedRemaining) {
              throw new TransferError(
                TransferErrorKind.SIZE_MISMATCH,
                `${DOWNLOAD_ERRORS.TOO_MANY_BYTES}: más de ${expectedRemaining} bytes desde ${resumeFromByte}`,
                { code: SizeMismatchCode.TOO_MANY_BYTES }
              );
            }
            await sink.write(chunk);
            bytesWritten += chunk.byteLength;
            onProgress?.(bytesWritten);
            if (signal?.aborted) {
              throw new TransferError(TransferErrorKind.CANCELLED, GENERAL_ERRORS.OPERATION_CANCELLED);
            }
          }
        }
      } catch (error) {
        reader.cancel().catch((cancelError: unknown) => {
          log.debug(`Error cancelando el cuerpo de ${url} (esperado):`, cancelError);
        });
        throw toError(error);
      }
      settled = true;

      if (expectedRemaining !== null && bytesWritten < expectedRemaining) {
        throw new TransferError(
          TransferErrorKind.SIZE_MISMATCH,
          `${DOWNLOAD_ERRORS.SIZE_MISMATCH}: ${resumeFromByte + bytesWritten}/${totalSize} bytes`,
          { code: SizeMismatchCode.SHORT_BODY }
        );
      }

      return { kind: 'completed', serverIgnoredRange: false, httpStatus: status, bytesWritten, totalSize };
    } finally {
      clearTimers();
      signal?.removeEventListener('abort', onExternalAbort);
      if (!settled) controller.abort();
    }
  }

  private async discardBody(response: Response): Promise<void> {
    if (!response.body) return;
    try {
      await response.body.cancel();
    } catch (error) {
      log.debug('Error descartando cuerpo de respuesta (esperado):', error);
    }
  }
}

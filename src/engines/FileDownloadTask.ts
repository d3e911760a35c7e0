/**
 * Tarea de descarga de un archivo del manifiesto.
 *
 * Recorre la máquina de estados de TransferStateMachine:
 * not_started → checking_existing → resuming|downloading → verifying → verified,
 * con corrupt → retrying → checking_existing en cada reintento. Los errores de un
 * archivo nunca salen de la tarea: run() siempre resuelve con el estado terminal.
 *
 * @module FileDownloadTask
 */

import config from '../config';
import { DOWNLOAD_ERRORS, GENERAL_ERRORS, VERIFY_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import type ChecksumVerifier from './ChecksumVerifier';
import {
  type BackoffPolicy,
  calculateBackoffDelay,
  classifyTransientError,
  defaultBackoffPolicy,
  isRetryableTransferError,
} from './DownloadValidator';
import type PartialFileStore from './PartialFileStore';
import type RangeFetcher from './RangeFetcher';
import { SizeMismatchCode } from './RangeFetcher';
import { TransferError, TransferErrorKind, toTransferError } from './TransferError';
import { InvalidTransitionError, canTransition, isTerminalStatus } from './TransferStateMachine';
import {
  type Credentials,
  type FetchResult,
  type FileDescriptor,
  type TransferSnapshot,
  type TransferState,
  TransferStatus,
  type TransferStatusType,
} from './types';

const log = logger.child('FileDownloadTask');

export interface TransferListener {
  onStatus?: (_snapshot: TransferSnapshot, _previous: TransferStatusType) => void;
  onProgress?: (_snapshot: TransferSnapshot) => void;
}

export interface FileDownloadTaskOptions {
  descriptor: FileDescriptor;
  store: PartialFileStore;
  fetcher: RangeFetcher;
  verifier: ChecksumVerifier;
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  credentials?: Credentials | null;
  signal?: AbortSignal;
  listener?: TransferListener;
}

/** Espera cancelable; rechaza con TransferError `cancelled` si se aborta. */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const cancelled = (): TransferError =>
      new TransferError(TransferErrorKind.CANCELLED, GENERAL_ERRORS.OPERATION_CANCELLED);
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export default class FileDownloadTask {
  readonly descriptor: FileDescriptor;
  private readonly store: PartialFileStore;
  private readonly fetcher: RangeFetcher;
  private readonly verifier: ChecksumVerifier;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly credentials: Credentials | null;
  private readonly signal?: AbortSignal;
  private readonly listener: TransferListener;
  private readonly state: TransferState;

  constructor(options: FileDownloadTaskOptions) {
    this.descriptor = options.descriptor;
    this.store = options.store;
    this.fetcher = options.fetcher;
    this.verifier = options.verifier;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? config.downloads.maxAttempts);
    this.backoff = options.backoff ?? defaultBackoffPolicy();
    this.credentials = options.credentials ?? null;
    this.signal = options.signal;
    this.listener = options.listener ?? {};

    const { finalPath, partialPath } = this.store.pathsFor(this.descriptor);
    this.state = {
      localPath: finalPath,
      partialPath,
      bytesConfirmed: 0,
      status: TransferStatus.NOT_STARTED,
      attemptCount: 0,
      lastError: null,
      digestVerified: false,
      bytesTransferred: 0,
      networkRequests: 0,
    };
  }

  get status(): TransferStatusType {
    return this.state.status;
  }

  snapshot(): TransferSnapshot {
    return Object.freeze({
      ...this.state,
      lastError: this.state.lastError ? { ...this.state.lastError } : null,
      name: this.descriptor.name,
      expectedSize: this.descriptor.expectedSize,
      priorityClass: this.descriptor.priorityClass,
    });
  }

  /** Marca como cancelada una tarea que nunca llegó a arrancar. */
  cancelBeforeStart(): TransferSnapshot {
    if (this.state.status === TransferStatus.NOT_STARTED) {
      this.transition(TransferStatus.CANCELLED);
    }
    return this.snapshot();
  }

  async run(): Promise<TransferSnapshot> {
    if (this.state.status !== TransferStatus.NOT_STARTED) {
      throw new Error(`La tarea ${this.descriptor.name} ya se ejecutó (${this.state.status})`);
    }
    if (this.signal?.aborted) {
      return this.cancelBeforeStart();
    }

    for (;;) {
      this.state.attemptCount += 1;
      this.transition(TransferStatus.CHECKING_EXISTING);

      try {
        await this.attempt();
        return this.snapshot();
      } catch (error) {
        if (error instanceof InvalidTransitionError) throw error;
        const transferError = toTransferError(error, TransferErrorKind.IO);
        this.state.lastError = transferError.toInfo();

        if (transferError.kind === TransferErrorKind.CANCELLED || this.signal?.aborted) {
          log.info(`${this.descriptor.name}: cancelada (${this.state.bytesConfirmed} bytes en disco)`);
          this.transition(TransferStatus.CANCELLED);
          return this.snapshot();
        }

        if (!isRetryableTransferError(transferError)) {
          this.logFatal(transferError);
          this.transition(TransferStatus.FAILED);
          return this.snapshot();
        }

        if (this.state.attemptCount >= this.maxAttempts) {
          log.error(
            `${this.descriptor.name}: ${DOWNLOAD_ERRORS.MULTIPLE_RETRIES_FAILED} (${this.state.attemptCount}/${this.maxAttempts}): ${transferError.message}`
          );
          this.transition(TransferStatus.FAILED);
          return this.snapshot();
        }

        const waitMs = calculateBackoffDelay(
          this.state.attemptCount - 1,
          this.backoff,
          transferError
        );
        const category =
          transferError.kind === TransferErrorKind.NETWORK || transferError.kind === TransferErrorKind.HTTP
            ? ` [${classifyTransientError(transferError)}]`
            : '';
        log.warn(
          `${this.descriptor.name}: intento ${this.state.attemptCount}/${this.maxAttempts} falló (${transferError.kind}${category}): ${transferError.message}. Reintentando en ${waitMs}ms`
        );
        this.transition(TransferStatus.RETRYING);

        try {
          if (waitMs > 0) await delay(waitMs, this.signal);
          this.throwIfCancelled();
        } catch (cancelError) {
          this.state.lastError = toTransferError(cancelError, TransferErrorKind.CANCELLED).toInfo();
          this.transition(TransferStatus.CANCELLED);
          return this.snapshot();
        }
      }
    }
  }

  private async attempt(): Promise<void> {
    const { descriptor, store } = this;
    const { localPath, partialPath } = this.state;

    this.throwIfCancelled();
    let existing = await store.existingBytes(descriptor);

    if (existing.location === 'final') {
      if (await this.acceptExistingFinal()) {
        await store.discard(partialPath);
        log.info(`${descriptor.name}: ya descargado y verificado, sin peticiones de red`);
        this.transition(TransferStatus.VERIFIED);
        return;
      }
      this.transition(TransferStatus.CORRUPT);
      await store.discard(localPath);
      existing = await store.existingBytes(descriptor);
    }

    let offset = existing.location === 'partial' ? existing.bytes : 0;
    const expectedSize = descriptor.expectedSize;

    if (expectedSize !== null && offset > expectedSize) {
      log.warn(
        `${descriptor.name}: parcial de ${offset} bytes mayor que el esperado (${expectedSize}), descartando`
      );
      await store.discard(partialPath);
      offset = 0;
      existing = { location: 'none', bytes: 0 };
    }
    this.setConfirmed(offset);

    if (expectedSize !== null && offset === expectedSize) {
      if (existing.location === 'none') {
        const sink = await store.openForAppend(partialPath);
        await sink.close();
      }
      this.transition(TransferStatus.VERIFYING);
      await this.promoteAndVerify();
      return;
    }

    this.transition(offset > 0 ? TransferStatus.RESUMING : TransferStatus.DOWNLOADING);
    if (offset > 0) {
      log.info(`${descriptor.name}: reanudando desde byte ${offset}`);
    }

    let result = await this.fetchFrom(offset);
    if (result.kind !== 'completed') {
      log.warn(
        `${descriptor.name}: ${result.kind === 'server-ignored-range' ? DOWNLOAD_ERRORS.SERVER_IGNORED_RANGE : DOWNLOAD_ERRORS.RANGE_NOT_SATISFIABLE}; reiniciando desde 0`
      );
      await store.discard(partialPath);
      this.setConfirmed(0);
      if (this.state.status === TransferStatus.RESUMING) {
        this.transition(TransferStatus.DOWNLOADING);
      }
      result = await this.fetchFrom(0);
      if (result.kind !== 'completed') {
        throw new TransferError(
          TransferErrorKind.RANGE_NOT_SATISFIABLE,
          `${DOWNLOAD_ERRORS.RANGE_NOT_SATISFIABLE} (HTTP ${result.httpStatus})`,
          { status: result.httpStatus }
        );
      }
    }

    this.throwIfCancelled();
    this.transition(TransferStatus.VERIFYING);
    await this.promoteAndVerify();
  }

  /** Verifica el archivo final ya presente; true si puede aceptarse sin red. */
  private async acceptExistingFinal(): Promise<boolean> {
    const { expectedSize, expectedDigest, name } = this.descriptor;
    if (expectedSize === null && expectedDigest === null) {
      log.info(`${name}: archivo existente sin tamaño ni hash conocido, se vuelve a descargar`);
      return false;
    }

    const result = await this.verifier.verifyFile(this.state.localPath, expectedSize, expectedDigest);
    if (!result.valid) {
      log.warn(`${name}: archivo existente inválido (${result.error ?? VERIFY_ERRORS.DIGEST_MISMATCH})`);
      return false;
    }

    this.state.digestVerified = result.digestValid === true;
    this.setConfirmed(result.actualSize);
    return true;
  }

  private async fetchFrom(offset: number): Promise<FetchResult> {
    const { descriptor, store } = this;
    const sink = await store.openForAppend(this.state.partialPath);
    this.state.networkRequests += 1;

    let lastWritten = 0;
    try {
      return await this.fetcher.fetch({
        url: descriptor.url,
        sink,
        resumeFromByte: offset,
        expectedTotalSize: descriptor.expectedSize,
        headers: this.authHeaders(),
        signal: this.signal,
        onProgress: (bytesWritten) => {
          this.state.bytesTransferred += bytesWritten - lastWritten;
          lastWritten = bytesWritten;
          this.setConfirmed(offset + bytesWritten);
        },
      });
    } catch (error) {
      if (
        error instanceof TransferError &&
        error.kind === TransferErrorKind.SIZE_MISMATCH &&
        error.code !== SizeMismatchCode.SHORT_BODY
      ) {
        await sink.close();
        await store.discard(this.state.partialPath);
        this.setConfirmed(0);
      }
      throw error;
    } finally {
      await sink.close();
    }
  }

  private async promoteAndVerify(): Promise<void> {
    const { descriptor, store } = this;
    const { localPath, partialPath } = this.state;

    try {
      await store.promote(partialPath, localPath);
    } catch (error) {
      if (error instanceof TransferError && error.code === 'EXDEV') {
        await store.promoteByCopy(partialPath, localPath);
      } else {
        throw error;
      }
    }

    const result = await this.verifier.verifyFile(
      localPath,
      descriptor.expectedSize,
      descriptor.expectedDigest
    );
    if (!result.valid) {
      this.transition(TransferStatus.CORRUPT);
      await store.discard(localPath);
      this.setConfirmed(0);
      throw new TransferError(
        result.sizeValid ? TransferErrorKind.DIGEST_MISMATCH : TransferErrorKind.SIZE_MISMATCH,
        result.error ?? VERIFY_ERRORS.DIGEST_MISMATCH
      );
    }

    this.state.digestVerified = result.digestValid === true;
    this.setConfirmed(result.actualSize);
    if (!this.state.digestVerified) {
      log.warn(`${descriptor.name}: aceptado sin hash esperado (integridad no comprobada)`);
    }
    this.transition(TransferStatus.VERIFIED);
  }

  private authHeaders(): Record<string, string> {
    if (!this.credentials?.token) return {};
    return { Authorization: `Bearer ${this.credentials.token}` };
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new TransferError(TransferErrorKind.CANCELLED, GENERAL_ERRORS.OPERATION_CANCELLED);
    }
  }

  private setConfirmed(bytes: number): void {
    this.state.bytesConfirmed = bytes;
    this.listener.onProgress?.(this.snapshot());
  }

  private transition(to: TransferStatusType): void {
    const from = this.state.status;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(this.descriptor.name, from, to);
    }
    this.state.status = to;
    log.debug(`${this.descriptor.name}: ${from} → ${to}`);
    this.listener.onStatus?.(this.snapshot(), from);
    if (isTerminalStatus(to)) {
      log.info(`${this.descriptor.name}: ${to} (intentos: ${this.state.attemptCount})`);
    }
  }

  private logFatal(error: TransferError): void {
    if (error.status === 401 || error.status === 403) {
      log.error(`${this.descriptor.name}: ${DOWNLOAD_ERRORS.UNAUTHORIZED} (HTTP ${error.status})`);
      return;
    }
    log.error(`${this.descriptor.name}: ${DOWNLOAD_ERRORS.CLIENT_ERROR}: ${error.message}`);
  }
}

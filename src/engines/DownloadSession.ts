/**
 * Sesión de descarga: canal de eventos entre DownloadCoordinator y sus observadores.
 *
 * Emite: progress, fileStatus, fileCompleted, fileFailed, finished y close (la sesión
 * terminó, con o sin resumen). También es un iterable asíncrono de ProgressEvent que
 * termina con close. Los observadores solo leen snapshots congelados; nunca tocan el
 * estado de las tareas.
 *
 * @module DownloadSession
 */

import EventEmitter from 'events';
import { logger } from '../utils';
import type {
  DownloadSummary,
  FileReport,
  ProgressEvent,
  TransferSnapshot,
  TransferStatusType,
} from './types';

const log = logger.child('DownloadSession');

export interface FileStatusEvent {
  fileName: string;
  status: TransferStatusType;
  previous: TransferStatusType;
  snapshot: TransferSnapshot;
  timestamp: number;
}

export type SessionSnapshot = Readonly<Record<string, TransferSnapshot>>;

export type SessionExecutor = (_session: DownloadSession) => Promise<DownloadSummary>;

class DownloadSession extends EventEmitter implements AsyncIterable<ProgressEvent> {
  /** Resumen final; solo rechaza ante errores de programación. */
  readonly result: Promise<DownloadSummary>;
  private readonly _controller: AbortController;
  private readonly _snapshotSource: () => readonly TransferSnapshot[];
  private _finished = false;

  constructor(
    controller: AbortController,
    snapshotSource: () => readonly TransferSnapshot[],
    executor: SessionExecutor
  ) {
    super();
    this.setMaxListeners(100);
    this._controller = controller;
    this._snapshotSource = snapshotSource;
    // arranca en la siguiente microtarea para que el llamante pueda suscribirse antes
    this.result = Promise.resolve()
      .then(() => executor(this))
      .finally(() => {
        this._finished = true;
        this.emit('close');
      });
  }

  get signal(): AbortSignal {
    return this._controller.signal;
  }

  get cancelled(): boolean {
    return this._controller.signal.aborted;
  }

  get finished(): boolean {
    return this._finished;
  }

  /** Cancelación cooperativa: no se lanzan más tareas y las activas paran en el siguiente bloque. */
  cancel(): void {
    if (this._controller.signal.aborted || this._finished) return;
    log.info('Cancelación solicitada');
    this._controller.abort();
  }

  /** Snapshots congelados de todas las tareas, indexados por nombre. */
  getSnapshot(): SessionSnapshot {
    const byName: Record<string, TransferSnapshot> = {};
    for (const snapshot of this._snapshotSource()) {
      byName[snapshot.name] = snapshot;
    }
    return Object.freeze(byName);
  }

  emitProgress(event: ProgressEvent): void {
    this.emit('progress', event);
  }

  emitFileStatus(snapshot: TransferSnapshot, previous: TransferStatusType): void {
    const payload: FileStatusEvent = {
      fileName: snapshot.name,
      status: snapshot.status,
      previous,
      snapshot,
      timestamp: Date.now(),
    };
    this.emit('fileStatus', payload);
  }

  emitFileCompleted(report: FileReport): void {
    this.emit('fileCompleted', { ...report, timestamp: Date.now() });
  }

  emitFileFailed(report: FileReport): void {
    this.emit('fileFailed', { ...report, timestamp: Date.now() });
  }

  emitFinished(summary: DownloadSummary): void {
    this._finished = true;
    this.emit('finished', summary);
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    const queue: ProgressEvent[] = [];
    const waiters: Array<(_result: IteratorResult<ProgressEvent>) => void> = [];
    let done = this._finished;

    const onProgress = (event: ProgressEvent): void => {
      const waiter = waiters.shift();
      if (waiter) waiter({ value: event, done: false });
      else queue.push(event);
    };
    const close = (): void => {
      done = true;
      this.off('progress', onProgress);
      this.off('close', close);
      for (const waiter of waiters.splice(0)) {
        waiter({ value: undefined, done: true });
      }
    };

    if (!done) {
      this.on('progress', onProgress);
      this.once('close', close);
    }

    return {
      next: (): Promise<IteratorResult<ProgressEvent>> => {
        const value = queue.shift();
        if (value !== undefined) return Promise.resolve({ value, done: false });
        if (done) return Promise.resolve({ value: undefined, done: true });
        return new Promise(resolve => {
          waiters.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<ProgressEvent>> => {
        close();
        queue.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

export default DownloadSession;

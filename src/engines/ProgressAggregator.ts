/**
 * Agregador de progreso de la sesión: único punto donde se combinan los snapshots de
 * todas las tareas.
 *
 * Cada tarea informa su propio snapshot; el agregador suma los bytes confirmados de los
 * archivos con tamaño conocido y calcula la fracción global. Los archivos sin tamaño
 * quedan fuera del denominador y se cuentan como indeterminados.
 *
 * La fracción emitida nunca decrece: un parcial descartado (reinicio desde 0) baja los
 * bytes de su archivo, pero la fracción se mantiene en su máximo hasta que se supere.
 *
 * @module ProgressAggregator
 */

import {
  type FileDescriptor,
  type ProgressEvent,
  type TransferSnapshot,
  TransferStatus,
  type TransferStatusType,
} from './types';

interface FileProgress {
  expectedSize: number | null;
  bytesConfirmed: number;
  status: TransferStatusType;
  lastEmittedAt: number;
}

export interface ProgressAggregatorOptions {
  /** Intervalo mínimo entre eventos de bytes del mismo archivo (0 = todos). */
  throttleMs?: number;
  now?: () => number;
}

class ProgressAggregator {
  private _files = new Map<string, FileProgress>();
  private _totalKnownBytes = 0;
  private _indeterminateFiles = 0;
  private _highWaterConfirmed = 0;
  private _highWaterFraction = 0;
  private readonly _throttleMs: number;
  private readonly _now: () => number;

  constructor(descriptors: readonly FileDescriptor[], options: ProgressAggregatorOptions = {}) {
    this._throttleMs = Math.max(0, options.throttleMs ?? 0);
    this._now = options.now ?? Date.now;
    for (const d of descriptors) {
      this._files.set(d.name, {
        expectedSize: d.expectedSize,
        bytesConfirmed: 0,
        status: TransferStatus.NOT_STARTED,
        lastEmittedAt: Number.NEGATIVE_INFINITY,
      });
      if (d.expectedSize === null) {
        this._indeterminateFiles++;
      } else {
        this._totalKnownBytes += d.expectedSize;
      }
    }
  }

  /**
   * Registra el snapshot de una tarea y devuelve el evento agregado, o null si el
   * throttle lo descarta. Los cambios de estado nunca se descartan.
   */
  update(snapshot: TransferSnapshot): ProgressEvent | null {
    const entry = this._files.get(snapshot.name);
    if (!entry) return null;

    const statusChanged = entry.status !== snapshot.status;
    entry.bytesConfirmed = snapshot.bytesConfirmed;
    entry.status = snapshot.status;

    const now = this._now();
    if (!statusChanged && this._throttleMs > 0 && now - entry.lastEmittedAt < this._throttleMs) {
      this.recompute();
      return null;
    }
    entry.lastEmittedAt = now;

    this.recompute();
    return {
      fileName: snapshot.name,
      status: snapshot.status,
      bytesConfirmed: snapshot.bytesConfirmed,
      totalBytes: entry.expectedSize,
      overallFraction: this._highWaterFraction,
      confirmedBytes: this._highWaterConfirmed,
      totalKnownBytes: this._totalKnownBytes,
      indeterminateFiles: this._indeterminateFiles,
      timestamp: now,
    };
  }

  get overallFraction(): number {
    return this._highWaterFraction;
  }

  get totalKnownBytes(): number {
    return this._totalKnownBytes;
  }

  get indeterminateFiles(): number {
    return this._indeterminateFiles;
  }

  private recompute(): void {
    let confirmed = 0;
    let verified = 0;
    for (const file of this._files.values()) {
      if (file.status === TransferStatus.VERIFIED) verified++;
      if (file.expectedSize !== null) {
        confirmed += Math.min(file.bytesConfirmed, file.expectedSize);
      }
    }

    // sin bytes conocidos (todo indeterminado o vacío) la fracción cuenta archivos verificados
    const fraction =
      this._totalKnownBytes > 0
        ? confirmed / this._totalKnownBytes
        : this._files.size > 0
          ? verified / this._files.size
          : 1;

    this._highWaterConfirmed = Math.max(this._highWaterConfirmed, confirmed);
    this._highWaterFraction = Math.min(1, Math.max(this._highWaterFraction, fraction));
  }
}

export default ProgressAggregator;

/**
 * Controlador de concurrencia con semáforo explícito y cola FIFO.
 *
 * Limita las tareas de archivo activas dentro de una clase de prioridad. Las tareas
 * que exceden el límite esperan en orden de llegada (orden del manifiesto).
 *
 * @module ConcurrencyController
 */

export interface ConcurrencyControllerOptions {
  /** Máximo de tareas activas a la vez. */
  maxConcurrent?: number;
}

export class ConcurrencyController {
  private readonly _maxConcurrent: number;
  private _active = 0;
  private _waiting: Array<() => void> = [];

  constructor(options: ConcurrencyControllerOptions = {}) {
    this._maxConcurrent = Math.max(1, options.maxConcurrent ?? 3);
  }

  /** Intenta adquirir un slot sin esperar. No adelanta a tareas ya en cola. */
  acquireSlot(): boolean {
    if (this._waiting.length > 0 || this._active >= this._maxConcurrent) return false;
    this._active++;
    return true;
  }

  /** Espera un slot libre respetando el orden de llegada. */
  waitForSlot(): Promise<void> {
    if (this.acquireSlot()) return Promise.resolve();
    return new Promise(resolve => {
      this._waiting.push(resolve);
    });
  }

  /** Libera un slot y lo cede a la siguiente tarea en cola. Idempotente (no baja de 0). */
  releaseSlot(): void {
    if (this._active > 0) this._active--;
    this.drain();
  }

  /** Ejecuta task cuando haya slot; el slot se libera al terminar, con éxito o error. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    try {
      return await task();
    } finally {
      this.releaseSlot();
    }
  }

  get maxConcurrent(): number {
    return this._maxConcurrent;
  }

  private drain(): void {
    while (this._waiting.length > 0 && this._active < this._maxConcurrent) {
      const next = this._waiting.shift();
      if (!next) break;
      this._active++;
      next();
    }
  }
}

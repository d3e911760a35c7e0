/**
 * Coordinador de descargas del paquete de modelo.
 *
 * run() valida el manifiesto, crea una FileDownloadTask por archivo y las ejecuta con
 * prioridad estricta: ninguna tarea de clase parameter arranca mientras quede alguna
 * essential sin estado terminal. Dentro de cada clase un ConcurrencyController limita
 * las tareas simultáneas y encola el resto en orden de manifiesto.
 *
 * El progreso de todas las tareas pasa por un único ProgressAggregator; los fallos de
 * un archivo quedan contenidos en su tarea y aparecen en el resumen final.
 *
 * @module DownloadCoordinator
 */

import defaultConfig, { mergeConfig } from '../config';
import type { AppConfig, AppConfigOverrides } from '../config.types';
import { SETTINGS_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { type ManifestEntryInput, validateDownloadSettings } from '../utils/schemas';
import ChecksumVerifier from './ChecksumVerifier';
import { ConcurrencyController } from './ConcurrencyController';
import type { BackoffPolicy } from './DownloadValidator';
import DownloadSession from './DownloadSession';
import FileDownloadTask, { type TransferListener } from './FileDownloadTask';
import { assertNoReservedNames, createManifest } from './manifest';
import PartialFileStore from './PartialFileStore';
import ProgressAggregator from './ProgressAggregator';
import RangeFetcher from './RangeFetcher';
import {
  type Credentials,
  type DownloadSummary,
  type FetchLike,
  type FileReport,
  type Manifest,
  PriorityClass,
  type TransferSnapshot,
  TransferStatus,
} from './types';

const log = logger.child('DownloadCoordinator');

export interface DownloadRunOptions {
  destinationRoot: string;
  /** Tareas simultáneas por clase de prioridad. */
  concurrency?: number;
  credentials?: Credentials | null;
  /** Señal externa; abortarla equivale a session.cancel(). */
  signal?: AbortSignal;
  maxAttempts?: number;
  retry?: Partial<BackoffPolicy>;
  chunkSize?: number;
  progressThrottleMs?: number;
  fetchImpl?: FetchLike;
}

export interface DownloadCoordinatorOptions {
  /** Configuración completa (p. ej. de loadConfigOverrides) o sobrescrituras parciales. */
  config?: AppConfig | AppConfigOverrides;
  fetchImpl?: FetchLike;
}

export function toFileReport(snapshot: TransferSnapshot): FileReport {
  return {
    name: snapshot.name,
    priorityClass: snapshot.priorityClass,
    status: snapshot.status,
    bytesConfirmed: snapshot.bytesConfirmed,
    expectedSize: snapshot.expectedSize,
    attempts: snapshot.attemptCount,
    bytesTransferred: snapshot.bytesTransferred,
    networkRequests: snapshot.networkRequests,
    digestVerified: snapshot.digestVerified,
    lastError: snapshot.lastError,
  };
}

export function buildSummary(
  snapshots: readonly TransferSnapshot[],
  cancelled: boolean,
  durationMs: number
): DownloadSummary {
  const files = snapshots.map(toFileReport);
  return {
    success: files.every(f => f.status === TransferStatus.VERIFIED),
    cancelled,
    files,
    failed: files.filter(f => f.status === TransferStatus.FAILED),
    unverifiedDigests: files
      .filter(f => f.status === TransferStatus.VERIFIED && !f.digestVerified)
      .map(f => f.name),
    networkRequests: files.reduce((sum, f) => sum + f.networkRequests, 0),
    bytesTransferred: files.reduce((sum, f) => sum + f.bytesTransferred, 0),
    durationMs,
  };
}

export class DownloadCoordinator {
  private readonly config: AppConfig;
  private readonly fetchImpl?: FetchLike;

  constructor(options: DownloadCoordinatorOptions = {}) {
    this.config = mergeConfig(defaultConfig, options.config ?? {});
    this.fetchImpl = options.fetchImpl;
  }

  /**
   * Lanza la descarga del manifiesto. Devuelve la sesión de inmediato; el trabajo
   * empieza en la siguiente microtarea.
   *
   * @throws ManifestError si el manifiesto no es válido o usa el sufijo de parciales; Error si los ajustes no lo son.
   */
  run(manifestInput: Manifest | readonly ManifestEntryInput[], options: DownloadRunOptions): DownloadSession {
    const manifest = createManifest(manifestInput);
    const { downloads, network, verifier: verifierConfig } = this.config;
    assertNoReservedNames(manifest, downloads.partialSuffix);

    const settings = validateDownloadSettings({
      concurrency: options.concurrency,
      maxAttempts: options.maxAttempts,
      chunkSize: options.chunkSize,
      progressThrottleMs: options.progressThrottleMs,
    });
    if (!settings.success || !settings.data) {
      throw new Error(`${SETTINGS_ERRORS.INVALID}: ${settings.error ?? ''}`);
    }
    const concurrency = settings.data.concurrency ?? downloads.maxConcurrent;
    const maxAttempts = settings.data.maxAttempts ?? downloads.maxAttempts;

    const store = new PartialFileStore(options.destinationRoot, {
      partialSuffix: downloads.partialSuffix,
    });
    const fetcher = new RangeFetcher({
      fetchImpl: options.fetchImpl ?? this.fetchImpl,
      chunkSize: settings.data.chunkSize ?? downloads.chunkSize,
      responseTimeoutMs: network.responseTimeoutMs,
      idleTimeoutMs: network.idleTimeoutMs,
      userAgent: network.userAgent,
      retryAfterMaxMs: network.retryAfterMaxMs,
    });
    const verifier = new ChecksumVerifier({ bufferSize: verifierConfig.hashBufferSize });
    const backoff: BackoffPolicy = {
      baseDelayMs: network.retryDelayMs,
      maxDelayMs: network.maxRetryDelayMs,
      jitterFactor: network.retryJitterFactor,
      retryAfterMaxMs: network.retryAfterMaxMs,
      ...options.retry,
    };
    const aggregator = new ProgressAggregator(manifest, {
      throttleMs: settings.data.progressThrottleMs ?? downloads.progressThrottleMs,
    });

    const controller = new AbortController();
    const tasks: FileDownloadTask[] = [];
    const session = new DownloadSession(
      controller,
      () => tasks.map(t => t.snapshot()),
      async current => {
        const startedAt = Date.now();
        const endOp = log.startOperation(
          `Descarga de ${manifest.length} archivos en ${options.destinationRoot}`
        );

        const onExternalAbort = (): void => current.cancel();
        if (options.signal?.aborted) current.cancel();
        options.signal?.addEventListener('abort', onExternalAbort, { once: true });

        try {
          const essential = tasks.filter(t => t.descriptor.priorityClass === PriorityClass.ESSENTIAL);
          const parameter = tasks.filter(t => t.descriptor.priorityClass === PriorityClass.PARAMETER);

          await this.runClass(essential, concurrency, controller.signal);
          if (parameter.length > 0) {
            log.info(
              `Archivos esenciales terminados, iniciando ${parameter.length} shards de parámetros`
            );
          }
          await this.runClass(parameter, concurrency, controller.signal);
        } finally {
          options.signal?.removeEventListener('abort', onExternalAbort);
        }

        const summary = buildSummary(
          tasks.map(t => t.snapshot()),
          controller.signal.aborted,
          Date.now() - startedAt
        );
        const verified = summary.files.filter(f => f.status === TransferStatus.VERIFIED).length;
        endOp(
          `${verified}/${summary.files.length} verificados, ` +
            `${summary.networkRequests} peticiones, ${summary.bytesTransferred} bytes`
        );
        if (summary.unverifiedDigests.length > 0) {
          log.warn(`Archivos sin hash verificado: ${summary.unverifiedDigests.join(', ')}`);
        }
        for (const failed of summary.failed) {
          log.error(`Falló ${failed.name}: ${failed.lastError?.message ?? 'sin detalle'}`);
        }
        current.emitFinished(summary);
        return summary;
      }
    );

    const listener: TransferListener = {
      onStatus: (snapshot, previous) => {
        session.emitFileStatus(snapshot, previous);
        const event = aggregator.update(snapshot);
        if (event) session.emitProgress(event);
        if (snapshot.status === TransferStatus.VERIFIED) {
          session.emitFileCompleted(toFileReport(snapshot));
        } else if (snapshot.status === TransferStatus.FAILED) {
          session.emitFileFailed(toFileReport(snapshot));
        }
      },
      onProgress: snapshot => {
        const event = aggregator.update(snapshot);
        if (event) session.emitProgress(event);
      },
    };

    for (const descriptor of manifest) {
      tasks.push(
        new FileDownloadTask({
          descriptor,
          store,
          fetcher,
          verifier,
          maxAttempts,
          backoff,
          credentials: options.credentials ?? null,
          signal: controller.signal,
          listener,
        })
      );
    }

    log.info(
      `Sesión creada: ${manifest.length} archivos, concurrencia ${concurrency}, ` +
        `${aggregator.totalKnownBytes} bytes conocidos, ${aggregator.indeterminateFiles} indeterminados`
    );
    return session;
  }

  private async runClass(
    tasks: readonly FileDownloadTask[],
    concurrency: number,
    signal: AbortSignal
  ): Promise<void> {
    if (tasks.length === 0) return;
    const pool = new ConcurrencyController({ maxConcurrent: concurrency });
    await Promise.all(
      tasks.map(task =>
        pool.run(async () => (signal.aborted ? task.cancelBeforeStart() : task.run()))
      )
    );
  }
}

export default DownloadCoordinator;

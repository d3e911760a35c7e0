/**
 * Tipos y constantes compartidos por el motor de descargas.
 *
 * Define el descriptor inmutable de cada archivo del manifiesto, los estados de una
 * transferencia, el contrato del sumidero de bytes (ByteSink), el resultado de
 * RangeFetcher y los eventos/resumen que DownloadCoordinator expone a los observadores.
 *
 * @module engines/types
 */

/** Clase de prioridad: archivos de control/tokenizer primero, shards de parámetros después. */
export const PriorityClass = Object.freeze({
  ESSENTIAL: 'essential',
  PARAMETER: 'parameter',
} as const);

export type PriorityClassType = (typeof PriorityClass)[keyof typeof PriorityClass];

/** Entrada del manifiesto. Se congela al cargar el manifiesto y no se muta nunca. */
export interface FileDescriptor {
  /** Ruta relativa al destino, única dentro del manifiesto. */
  readonly name: string;
  readonly url: string;
  /** Bytes esperados; null si se desconoce. */
  readonly expectedSize: number | null;
  /** SHA-256 en hex minúsculas; null si no se pide verificación. */
  readonly expectedDigest: string | null;
  readonly priorityClass: PriorityClassType;
}

export type Manifest = readonly FileDescriptor[];

/** Estados de la máquina de estados de FileDownloadTask. */
export const TransferStatus = Object.freeze({
  NOT_STARTED: 'not_started',
  CHECKING_EXISTING: 'checking_existing',
  RESUMING: 'resuming',
  DOWNLOADING: 'downloading',
  VERIFYING: 'verifying',
  VERIFIED: 'verified',
  RETRYING: 'retrying',
  CORRUPT: 'corrupt',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const);

export type TransferStatusType = (typeof TransferStatus)[keyof typeof TransferStatus];

/** Último error de una transferencia, en forma serializable. */
export interface TransferErrorInfo {
  kind: string;
  message: string;
  status?: number;
  code?: string;
}

/** Registro mutable por archivo; pertenece en exclusiva a su FileDownloadTask. */
export interface TransferState {
  localPath: string;
  partialPath: string;
  bytesConfirmed: number;
  status: TransferStatusType;
  attemptCount: number;
  lastError: TransferErrorInfo | null;
  /** true solo si el hash del archivo final se comparó con expectedDigest. */
  digestVerified: boolean;
  /** Bytes recibidos por red en esta sesión (todas las tentativas). */
  bytesTransferred: number;
  networkRequests: number;
}

/** Copia congelada de TransferState que leen coordinador y observadores. */
export type TransferSnapshot = Readonly<
  TransferState & {
    name: string;
    expectedSize: number | null;
    priorityClass: PriorityClassType;
  }
>;

/** Destino de bytes de RangeFetcher. Cada write se completa entero antes de resolver. */
export interface ByteSink {
  readonly path: string;
  write(_chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Resultado de RangeFetcher.fetch; los errores se lanzan como TransferError. */
export type FetchResult =
  | {
      kind: 'completed';
      serverIgnoredRange: false;
      httpStatus: number;
      /** Bytes escritos en esta petición (sin contar los ya reanudados). */
      bytesWritten: number;
      /** Tamaño total anunciado por el servidor, si lo hubo. */
      totalSize: number | null;
    }
  | {
      kind: 'server-ignored-range';
      serverIgnoredRange: true;
      httpStatus: number;
    }
  | {
      kind: 'range-not-satisfiable';
      serverIgnoredRange: false;
      httpStatus: number;
    };

export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: 'follow';
}

/** Firma mínima de fetch que usa RangeFetcher (inyectable en tests). */
export type FetchLike = (_url: string, _init: FetchInit) => Promise<Response>;

/** Credencial opcional enviada como `Authorization: Bearer <token>`. */
export interface Credentials {
  token: string;
}

/** Evento de progreso agregado que emite la sesión. */
export interface ProgressEvent {
  fileName: string;
  status: TransferStatusType;
  bytesConfirmed: number;
  totalBytes: number | null;
  /** Fracción global [0, 1], no decreciente durante la sesión. */
  overallFraction: number;
  /** Bytes confirmados de archivos con tamaño conocido. */
  confirmedBytes: number;
  totalKnownBytes: number;
  /** Archivos sin tamaño conocido (fuera del denominador). */
  indeterminateFiles: number;
  timestamp: number;
}

export interface FileReport {
  name: string;
  priorityClass: PriorityClassType;
  status: TransferStatusType;
  bytesConfirmed: number;
  expectedSize: number | null;
  attempts: number;
  bytesTransferred: number;
  networkRequests: number;
  digestVerified: boolean;
  lastError: TransferErrorInfo | null;
}

export interface DownloadSummary {
  /** true si y solo si todos los archivos terminaron en VERIFIED. */
  success: boolean;
  cancelled: boolean;
  files: FileReport[];
  failed: FileReport[];
  /** Archivos aceptados sin comprobar hash (sin expectedDigest): el eslabón débil. */
  unverifiedDigests: string[];
  networkRequests: number;
  bytesTransferred: number;
  durationMs: number;
}

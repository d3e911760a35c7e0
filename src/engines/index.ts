/**
 * Punto de entrada del motor de descargas: reexporta DownloadCoordinator, DownloadSession,
 * FileDownloadTask, RangeFetcher, PartialFileStore, ChecksumVerifier, las utilidades de
 * manifiesto, la política de reintentos y los tipos compartidos.
 *
 * @module engines
 */

export { default as DownloadCoordinator, buildSummary, toFileReport } from './DownloadCoordinator';
export type { DownloadRunOptions, DownloadCoordinatorOptions } from './DownloadCoordinator';
export { default as DownloadSession } from './DownloadSession';
export type { FileStatusEvent, SessionSnapshot } from './DownloadSession';
export { default as FileDownloadTask } from './FileDownloadTask';
export type { FileDownloadTaskOptions, TransferListener } from './FileDownloadTask';
export { default as RangeFetcher, parseContentRange, SizeMismatchCode } from './RangeFetcher';
export type { RangeFetcherOptions, RangeFetchRequest, ContentRange } from './RangeFetcher';
export { default as PartialFileStore } from './PartialFileStore';
export type { FilePaths, ExistingBytes, ExistingLocation } from './PartialFileStore';
export { default as ChecksumVerifier } from './ChecksumVerifier';
export type { VerifyFileResult, ChecksumVerifierOptions } from './ChecksumVerifier';
export { ConcurrencyController } from './ConcurrencyController';
export { default as ProgressAggregator } from './ProgressAggregator';
export {
  createManifest,
  loadManifestFile,
  buildShardedManifest,
  checkModelAvailability,
  shardName,
  assertNoReservedNames,
  DEFAULT_SHARD_NAME_PATTERN,
  ManifestError,
} from './manifest';
export type { ShardedManifestOptions, ModelAvailability, KnownFileMetadata } from './manifest';
export {
  classifyTransientError,
  parseRetryAfter,
  calculateBackoffDelay,
  defaultBackoffPolicy,
  isRetryableHttpStatus,
  isRetryableTransferError,
} from './DownloadValidator';
export type { TransientErrorType, BackoffPolicy } from './DownloadValidator';
export { TransferError, TransferErrorKind, toTransferError, isAbortError } from './TransferError';
export type { TransferErrorKindType, TransferErrorOptions } from './TransferError';
export {
  canTransition,
  isTerminalStatus,
  InvalidTransitionError,
} from './TransferStateMachine';
export { PriorityClass, TransferStatus } from './types';
export type {
  PriorityClassType,
  FileDescriptor,
  Manifest,
  TransferStatusType,
  TransferErrorInfo,
  TransferState,
  TransferSnapshot,
  ByteSink,
  FetchResult,
  FetchInit,
  FetchLike,
  Credentials,
  ProgressEvent,
  FileReport,
  DownloadSummary,
} from './types';

/**
 * Utilidades de manifiesto: validación y congelado, carga desde JSON, construcción del
 * layout "archivos de configuración + N shards de parámetros" y comprobación barata de
 * disponibilidad en disco (sin hash).
 *
 * @module manifest
 */

import { promises as fs } from 'fs';
import { MANIFEST_ERRORS } from '../constants/errors';
import { getErrorMessage, getFileSize, logger, resolveInsideRoot } from '../utils';
import { type ManifestEntryInput, validateManifest } from '../utils/schemas';
import { type FileDescriptor, type Manifest, PriorityClass } from './types';

const log = logger.child('Manifest');

export class ManifestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

/** Valida las entradas (zod), rechaza nombres duplicados o que salgan del destino y congela. */
export function createManifest(entries: unknown): Manifest {
  const validation = validateManifest(entries);
  if (!validation.success || !validation.data) {
    throw new ManifestError(`${MANIFEST_ERRORS.INVALID}: ${validation.error ?? ''}`);
  }
  const descriptors = validation.data.map(
    (entry): FileDescriptor =>
      Object.freeze({
        name: entry.name,
        url: entry.url,
        expectedSize: entry.expectedSize,
        expectedDigest: entry.expectedDigest,
        priorityClass: entry.priorityClass,
      })
  );
  return Object.freeze(descriptors);
}

/**
 * Rechaza nombres que terminan en el sufijo de parciales: el archivo final de uno sería
 * el parcial de otro (`w.bin.partial` frente a `w.bin`).
 */
export function assertNoReservedNames(manifest: Manifest, partialSuffix: string): void {
  const reserved = manifest.filter(d => d.name.endsWith(partialSuffix)).map(d => d.name);
  if (reserved.length > 0) {
    throw new ManifestError(
      `${MANIFEST_ERRORS.RESERVED_SUFFIX} (${partialSuffix}): ${reserved.join(', ')}`
    );
  }
}

/**
 * Lee un manifiesto JSON: un array de entradas o un objeto `{ files: [...] }`.
 */
export async function loadManifestFile(filePath: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ManifestError(`${MANIFEST_ERRORS.READ_FAILED}: ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ManifestError(
      `${MANIFEST_ERRORS.INVALID_JSON} (${filePath}): ${getErrorMessage(error)}`,
      { cause: error }
    );
  }

  const entries =
    typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) && 'files' in parsed
      ? parsed.files
      : parsed;
  const manifest = createManifest(entries);
  log.info(`Manifiesto cargado: ${filePath} (${manifest.length} archivos)`);
  return manifest;
}

export interface KnownFileMetadata {
  expectedSize?: number | null;
  expectedDigest?: string | null;
}

export interface ShardedManifestOptions {
  /** URL base del repositorio; cada nombre se resuelve contra ella. */
  baseUrl: string;
  /** Archivos de configuración y tokenizer (clase essential). */
  essentialFiles: readonly string[];
  parameterShardCount: number;
  /** Patrón del nombre de shard; `{i}` se sustituye por el índice (desde 0). */
  shardNamePattern?: string;
  /** Tamaño y hash conocidos, por nombre de archivo. */
  metadata?: Readonly<Record<string, KnownFileMetadata>>;
}

export const DEFAULT_SHARD_NAME_PATTERN = 'params_shard_{i}.bin';

export function shardName(pattern: string, index: number): string {
  return pattern.split('{i}').join(String(index));
}

/** Manifiesto con los archivos esenciales primero y los shards de parámetros después. */
export function buildShardedManifest(options: ShardedManifestOptions): Manifest {
  const {
    baseUrl,
    essentialFiles,
    parameterShardCount,
    shardNamePattern = DEFAULT_SHARD_NAME_PATTERN,
    metadata = {},
  } = options;

  if (!Number.isInteger(parameterShardCount) || parameterShardCount < 0) {
    throw new ManifestError(`${MANIFEST_ERRORS.INVALID}: parameterShardCount=${parameterShardCount}`);
  }
  if (parameterShardCount > 0 && !shardNamePattern.includes('{i}')) {
    throw new ManifestError(`${MANIFEST_ERRORS.INVALID}: shardNamePattern sin {i}`);
  }

  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const entry = (name: string, priorityClass: ManifestEntryInput['priorityClass']): ManifestEntryInput => ({
    name,
    url: new URL(name, base).toString(),
    expectedSize: metadata[name]?.expectedSize ?? null,
    expectedDigest: metadata[name]?.expectedDigest ?? null,
    priorityClass,
  });

  const entries: ManifestEntryInput[] = [
    ...essentialFiles.map(name => entry(name, PriorityClass.ESSENTIAL)),
    ...Array.from({ length: parameterShardCount }, (_, i) =>
      entry(shardName(shardNamePattern, i), PriorityClass.PARAMETER)
    ),
  ];
  return createManifest(entries);
}

export interface ModelAvailability {
  /** Todos los archivos esenciales existen y no están vacíos (o tienen su tamaño esperado). */
  essentialReady: boolean;
  /** Todos los archivos existen con su tamaño esperado. */
  complete: boolean;
  /** Nombres que faltan o tienen tamaño incorrecto. */
  missing: string[];
}

/**
 * Comprobación rápida en disco, sin hash: los parciales nunca cuentan como presentes.
 * Para garantizar integridad hay que ejecutar el coordinador (que verifica hashes).
 */
export async function checkModelAvailability(
  rootDir: string,
  manifest: Manifest
): Promise<ModelAvailability> {
  const missing: string[] = [];
  let essentialReady = true;

  for (const descriptor of manifest) {
    const size = await getFileSize(resolveInsideRoot(rootDir, descriptor.name));
    const present =
      size !== null &&
      (descriptor.expectedSize !== null ? size === descriptor.expectedSize : size > 0);
    if (!present) {
      missing.push(descriptor.name);
      if (descriptor.priorityClass === PriorityClass.ESSENTIAL) essentialReady = false;
    }
  }

  return { essentialReady, complete: missing.length === 0, missing };
}

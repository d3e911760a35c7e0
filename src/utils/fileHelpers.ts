/**
 * @fileoverview Utilidades para operaciones con archivos y rutas dentro del destino.
 * @module fileHelpers
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FILE_ERRORS } from '../constants/errors';
import { isFileNotFound } from './errorHelpers';
import { logger } from './logger';

const log = logger.child('FileUtils');

/** Tamaño de un archivo regular, o null si no existe. Otros errores se propagan. */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    if (stat.isFile()) {
      return stat.size;
    }
    return null;
  } catch (error) {
    if (isFileNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/** Elimina un archivo; devuelve false si no existía. */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isFileNotFound(error)) {
      return false;
    }
    log.error(`${FILE_ERRORS.DELETE_FAILED}: ${filePath}`, error);
    throw error;
  }
}

export async function ensureParentDirectory(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

/**
 * Resuelve un nombre relativo contra el directorio raíz y rechaza rutas que salgan de él.
 */
export function resolveInsideRoot(rootDir: string, relativeName: string): string {
  const resolvedRoot = path.resolve(rootDir);
  const resolved = path.resolve(resolvedRoot, relativeName);
  const relative = path.relative(resolvedRoot, resolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    log.warn(`Intento de path traversal detectado: ${relativeName} fuera de ${rootDir}`);
    throw new Error(`${FILE_ERRORS.PATH_OUTSIDE_ROOT}: ${relativeName}`);
  }
  return resolved;
}

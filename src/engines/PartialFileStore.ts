/**
 * Almacén de archivos parciales: mapea cada descriptor a su ruta final y a su `.partial`,
 * abre sumideros en modo append y promociona el parcial al nombre final.
 *
 * Un parcial nunca coexiste con su archivo final tras la promoción: promote es un
 * rename atómico; si el sistema de archivos no lo permite (EXDEV) se lanza un error
 * `io` con code EXDEV y el llamante usa promoteByCopy y vuelve a verificar.
 *
 * @module PartialFileStore
 */

import { promises as fs } from 'fs';
import config from '../config';
import { FILE_ERRORS } from '../constants/errors';
import { ensureParentDirectory, getFileSize, logger, removeFile, resolveInsideRoot } from '../utils';
import { TransferError, TransferErrorKind, getErrorCode } from './TransferError';
import type { ByteSink, FileDescriptor } from './types';

const log = logger.child('PartialFileStore');

export interface FilePaths {
  finalPath: string;
  partialPath: string;
}

export type ExistingLocation = 'final' | 'partial' | 'none';

export interface ExistingBytes {
  location: ExistingLocation;
  bytes: number;
}

export interface PartialFileStoreOptions {
  partialSuffix?: string;
}

function ioError(message: string, error: unknown): TransferError {
  return new TransferError(TransferErrorKind.IO, message, {
    code: getErrorCode(error),
    cause: error,
  });
}

export default class PartialFileStore {
  readonly rootDir: string;
  private readonly partialSuffix: string;
  private readonly openSinks = new Set<string>();

  constructor(rootDir: string, options: PartialFileStoreOptions = {}) {
    this.rootDir = rootDir;
    this.partialSuffix = options.partialSuffix ?? config.downloads.partialSuffix;
  }

  pathsFor(descriptor: Pick<FileDescriptor, 'name'>): FilePaths {
    const finalPath = resolveInsideRoot(this.rootDir, descriptor.name);
    return { finalPath, partialPath: finalPath + this.partialSuffix };
  }

  /**
   * Bytes ya presentes en disco. Un final no vacío tiene prioridad (el llamante debe
   * verificarlo); si solo existe el parcial, su longitud es el offset de reanudación.
   */
  async existingBytes(descriptor: Pick<FileDescriptor, 'name'>): Promise<ExistingBytes> {
    const { finalPath, partialPath } = this.pathsFor(descriptor);
    try {
      const finalSize = await getFileSize(finalPath);
      if (finalSize !== null && finalSize > 0) {
        return { location: 'final', bytes: finalSize };
      }
      const partialSize = await getFileSize(partialPath);
      if (partialSize !== null) {
        return { location: 'partial', bytes: partialSize };
      }
      if (finalSize === 0) {
        return { location: 'final', bytes: 0 };
      }
      return { location: 'none', bytes: 0 };
    } catch (error) {
      throw ioError(`${FILE_ERRORS.READ_FAILED}: ${finalPath}`, error);
    }
  }

  /**
   * Abre el parcial en modo append. Cada write se escribe entero antes de resolver.
   * Un segundo sumidero sobre la misma ruta mientras el primero sigue abierto es un error.
   */
  async openForAppend(partialPath: string): Promise<ByteSink> {
    if (this.openSinks.has(partialPath)) {
      throw new TransferError(
        TransferErrorKind.IO,
        `${FILE_ERRORS.PARTIAL_IN_USE}: ${partialPath}`,
        { code: 'EBUSY' }
      );
    }
    this.openSinks.add(partialPath);

    let handle: fs.FileHandle;
    try {
      await ensureParentDirectory(partialPath);
      handle = await fs.open(partialPath, 'a');
    } catch (error) {
      this.openSinks.delete(partialPath);
      throw ioError(`${FILE_ERRORS.CREATE_DIRECTORY_FAILED}: ${partialPath}`, error);
    }

    let closed = false;
    const release = (): void => {
      this.openSinks.delete(partialPath);
    };

    return {
      path: partialPath,
      write: async (chunk: Uint8Array): Promise<void> => {
        let offset = 0;
        try {
          while (offset < chunk.byteLength) {
            const { bytesWritten } = await handle.write(chunk, offset, chunk.byteLength - offset);
            offset += bytesWritten;
          }
        } catch (error) {
          throw ioError(`${FILE_ERRORS.WRITE_FAILED}: ${partialPath}`, error);
        }
      },
      close: async (): Promise<void> => {
        if (closed) return;
        closed = true;
        try {
          await handle.close();
        } finally {
          release();
        }
      },
    };
  }

  /** Rename atómico parcial → final. */
  async promote(partialPath: string, finalPath: string): Promise<void> {
    try {
      await fs.rename(partialPath, finalPath);
    } catch (error) {
      const code = getErrorCode(error);
      if (code === 'EXDEV') {
        throw new TransferError(
          TransferErrorKind.IO,
          `${FILE_ERRORS.RENAME_NOT_ATOMIC}: ${partialPath} -> ${finalPath}`,
          { code, cause: error }
        );
      }
      throw ioError(`${FILE_ERRORS.RENAME_FAILED}: ${partialPath} -> ${finalPath}`, error);
    }
    log.debug(`Promovido ${partialPath} -> ${finalPath}`);
  }

  /** Copia + fsync + borrado del parcial. No es atómico: el llamante vuelve a verificar. */
  async promoteByCopy(partialPath: string, finalPath: string): Promise<void> {
    log.warn(`Rename no atómico, copiando ${partialPath} -> ${finalPath}`);
    try {
      await fs.copyFile(partialPath, finalPath);
      const handle = await fs.open(finalPath, 'r+');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
      await removeFile(partialPath);
    } catch (error) {
      throw ioError(`${FILE_ERRORS.RENAME_FAILED}: ${partialPath} -> ${finalPath}`, error);
    }
  }

  /** Borra un archivo (parcial o final); no falla si no existe. */
  async discard(filePath: string): Promise<void> {
    try {
      const removed = await removeFile(filePath);
      if (removed) log.debug(`Descartado ${filePath}`);
    } catch (error) {
      throw ioError(`${FILE_ERRORS.DELETE_FAILED}: ${filePath}`, error);
    }
  }

  isOpen(partialPath: string): boolean {
    return this.openSinks.has(partialPath);
  }
}

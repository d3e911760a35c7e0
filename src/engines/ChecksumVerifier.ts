/**
 * Verificación de integridad: tamaño y hash SHA-256.
 *
 * digest lee el archivo en bloques de tamaño fijo (hashBufferSize) para que la memoria
 * quede acotada con shards de cientos de MB. verifyFile comprueba primero el tamaño
 * (barato) y después el hash, si lo hay.
 *
 * @module ChecksumVerifier
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import config from '../config';
import { FILE_ERRORS, VERIFY_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { TransferError, TransferErrorKind, getErrorCode } from './TransferError';

const log = logger.child('ChecksumVerifier');

export interface VerifyFileResult {
  valid: boolean;
  sizeValid: boolean;
  /** null si no se pidió hash o no llegó a calcularse (tamaño incorrecto). */
  digestValid: boolean | null;
  actualSize: number;
  actualDigest: string | null;
  error?: string;
}

export interface ChecksumVerifierOptions {
  bufferSize?: number;
}

export default class ChecksumVerifier {
  private readonly bufferSize: number;

  constructor(options: ChecksumVerifierOptions = {}) {
    this.bufferSize = options.bufferSize ?? config.verifier.hashBufferSize;
  }

  /** SHA-256 del archivo en hex minúsculas. */
  async digest(filePath: string): Promise<string> {
    let fileHandle: fs.FileHandle;
    try {
      fileHandle = await fs.open(filePath, 'r');
    } catch (error) {
      throw this.ioError(filePath, error);
    }

    const hash = crypto.createHash('sha256');
    const buffer = Buffer.allocUnsafe(this.bufferSize);
    let position = 0;

    try {
      for (;;) {
        const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, position);
        if (bytesRead === 0) break;
        hash.update(buffer.subarray(0, bytesRead));
        position += bytesRead;
      }
      return hash.digest('hex');
    } catch (error) {
      throw this.ioError(filePath, error);
    } finally {
      await fileHandle.close();
    }
  }

  /** true si no hay hash esperado o si coincide (comparación sin distinguir mayúsculas). */
  async verify(filePath: string, expectedDigest: string | null): Promise<boolean> {
    if (!expectedDigest) return true;
    const actual = await this.digest(filePath);
    return actual === expectedDigest.toLowerCase();
  }

  async verifyFile(
    filePath: string,
    expectedSize: number | null,
    expectedDigest: string | null
  ): Promise<VerifyFileResult> {
    let actualSize: number;
    try {
      actualSize = (await fs.stat(filePath)).size;
    } catch (error) {
      throw this.ioError(filePath, error);
    }

    if (expectedSize !== null && actualSize !== expectedSize) {
      return {
        valid: false,
        sizeValid: false,
        digestValid: null,
        actualSize,
        actualDigest: null,
        error: `Tamaño incorrecto: ${actualSize}/${expectedSize} bytes`,
      };
    }

    if (!expectedDigest) {
      return { valid: true, sizeValid: true, digestValid: null, actualSize, actualDigest: null };
    }

    const endOp = log.startOperation(`Hash ${filePath}`);
    const actualDigest = await this.digest(filePath);
    endOp();
    const digestValid = actualDigest === expectedDigest.toLowerCase();
    if (!digestValid) {
      log.warn(`${VERIFY_ERRORS.DIGEST_MISMATCH}: ${actualDigest} !== ${expectedDigest}`);
      return {
        valid: false,
        sizeValid: true,
        digestValid: false,
        actualSize,
        actualDigest,
        error: `${VERIFY_ERRORS.DIGEST_MISMATCH}: ${actualDigest} !== ${expectedDigest}`,
      };
    }

    return { valid: true, sizeValid: true, digestValid: true, actualSize, actualDigest };
  }

  private ioError(filePath: string, error: unknown): TransferError {
    const code = getErrorCode(error);
    log.error(`${VERIFY_ERRORS.HASH_FAILED} (ruta: ${filePath}): ${code ?? 'VERIFY_ERROR'}`);
    return new TransferError(TransferErrorKind.IO, `${FILE_ERRORS.READ_FAILED}: ${filePath}`, {
      code,
      cause: error,
    });
  }
}

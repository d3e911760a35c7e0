/**
 * @fileoverview Lectura de código y mensaje de errores desconocidos.
 * @module utils/errorHelpers
 *
 * Los errores de fs y de undici pueden venir de otro realm (p. ej. dentro de un vm) y no
 * pasar `instanceof Error`, así que se inspeccionan por forma.
 */

/** Código errno/undici de un error o de su causa (fetch envuelve el error de socket en `cause`). */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return 'cause' in error ? getErrorCode(error.cause) : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    if (typeof error.message === 'string') return error.message;
  }
  return String(error);
}

export function isFileNotFound(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}

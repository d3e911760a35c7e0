/**
 * @fileoverview Constantes de mensajes de error del descargador.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. El motor (src/engines) y el script de
 * línea de comandos reexportan este módulo para mantener los mensajes coherentes.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS = {
  OPERATION_CANCELLED: 'Operación cancelada',
} as const;

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS = {
  RANGE_NOT_SATISFIABLE: 'Rango no satisfacible: el servidor no tiene bytes desde el offset pedido',
  SERVER_IGNORED_RANGE: 'El servidor ignoró la cabecera Range',
  SIZE_MISMATCH: 'Tamaño incorrecto',
  TOO_MANY_BYTES: 'El servidor envió más bytes de los esperados',
  CONTENT_RANGE_MISMATCH: 'Content-Range no coincide con el tamaño esperado',
  BODY_MISSING: 'Respuesta sin cuerpo',
  MULTIPLE_RETRIES_FAILED: 'Error después de múltiples reintentos',
  CLIENT_ERROR: 'Error de cliente HTTP (no se reintenta)',
  UNAUTHORIZED: 'Acceso denegado: revisa el token de acceso',
} as const;

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS = {
  CONNECTION_FAILED: 'No se pudo conectar al servidor',
  INVALID_BODY_CHUNK: 'El cuerpo de la respuesta contiene un bloque que no es binario',
  RESPONSE_TIMEOUT: 'Tiempo de espera agotado esperando respuesta',
  IDLE_TIMEOUT: 'Sin progreso en la descarga (idle timeout)',
  CONNECTION_CLOSED: 'Conexión cerrada inesperadamente',
  HTTP_ERROR: 'Error HTTP',
} as const;

// =====================
// ERRORES DE INTEGRIDAD
// =====================

export const VERIFY_ERRORS = {
  DIGEST_MISMATCH: 'Hash incorrecto',
  HASH_FAILED: 'Error calculando hash',
} as const;

// =====================
// ERRORES DE ARCHIVOS
// =====================

export const FILE_ERRORS = {
  READ_FAILED: 'Error leyendo archivo',
  WRITE_FAILED: 'Error escribiendo archivo',
  DELETE_FAILED: 'Error eliminando archivo',
  RENAME_FAILED: 'Error renombrando archivo parcial',
  RENAME_NOT_ATOMIC: 'El renombrado no es atómico en este sistema de archivos',
  CREATE_DIRECTORY_FAILED: 'Error creando directorio',
  PARTIAL_IN_USE: 'El archivo parcial ya está abierto por otra tarea',
  PATH_OUTSIDE_ROOT: 'La ruta del archivo sale del directorio de destino',
} as const;

// =====================
// ERRORES DE MANIFIESTO Y CONFIGURACIÓN
// =====================

export const MANIFEST_ERRORS = {
  INVALID: 'Manifiesto inválido',
  DUPLICATE_NAME: 'Nombre de archivo duplicado en el manifiesto',
  RESERVED_SUFFIX: 'Nombre de archivo con el sufijo reservado para parciales',
  READ_FAILED: 'Error leyendo manifiesto',
  INVALID_JSON: 'JSON inválido en manifiesto',
} as const;

export const SETTINGS_ERRORS = {
  LOAD_FAILED: 'Error cargando configuración',
  INVALID: 'Configuración inválida',
} as const;

// =====================
// OBJETO UNIFICADO
// =====================

/** Objeto unificado de errores por categoría. */
export interface ErrorsMap {
  GENERAL: typeof GENERAL_ERRORS;
  DOWNLOAD: typeof DOWNLOAD_ERRORS;
  NETWORK: typeof NETWORK_ERRORS;
  VERIFY: typeof VERIFY_ERRORS;
  FILE: typeof FILE_ERRORS;
  MANIFEST: typeof MANIFEST_ERRORS;
  SETTINGS: typeof SETTINGS_ERRORS;
}

export const ERRORS: ErrorsMap = {
  GENERAL: GENERAL_ERRORS,
  DOWNLOAD: DOWNLOAD_ERRORS,
  NETWORK: NETWORK_ERRORS,
  VERIFY: VERIFY_ERRORS,
  FILE: FILE_ERRORS,
  MANIFEST: MANIFEST_ERRORS,
  SETTINGS: SETTINGS_ERRORS,
};

export default ERRORS;

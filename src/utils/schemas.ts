/**
 * @fileoverview Schemas de validación usando Zod para manifiestos, ajustes de descarga
 * y sobrescrituras de configuración.
 * @module schemas
 */

import path from 'path';
import { z } from 'zod';
import { MANIFEST_ERRORS, SETTINGS_ERRORS } from '../constants/errors';
import { getErrorMessage } from './errorHelpers';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

/**
 * Nombre relativo que no puede salir del directorio de destino:
 * sin rutas absolutas, sin segmentos vacíos, '.' ni '..'.
 */
export function isSafeRelativeName(name: string): boolean {
  if (!name || path.isAbsolute(name) || path.win32.isAbsolute(name)) return false;
  return name.split(/[\\/]/).every(segment => segment !== '' && segment !== '.' && segment !== '..');
}

const priorityClassSchema = z.enum(['essential', 'parameter']);

const sha256HexSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, 'expectedDigest debe ser SHA-256 en hexadecimal (64 caracteres)')
  .transform(val => val.toLowerCase());

const manifestEntrySchema = z.object({
  name: z
    .string()
    .min(1, 'name no puede estar vacío')
    .max(1000, 'name demasiado largo')
    .refine(isSafeRelativeName, 'name debe ser una ruta relativa dentro del destino'),
  url: z.string().url('url inválida'),
  expectedSize: z
    .number()
    .int('expectedSize debe ser entero')
    .nonnegative('expectedSize no puede ser negativo')
    .nullable()
    .optional()
    .transform(val => val ?? null),
  expectedDigest: sha256HexSchema
    .nullable()
    .optional()
    .transform(val => val ?? null),
  priorityClass: priorityClassSchema,
});

const manifestSchema = z
  .array(manifestEntrySchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `${MANIFEST_ERRORS.DUPLICATE_NAME}: ${entry.name}`,
        });
      }
      seen.add(entry.name);
    });
  });

const downloadSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(16).optional(),
  maxAttempts: z.number().int().min(1).max(50).optional(),
  chunkSize: z
    .number()
    .int()
    .min(1024)
    .max(16 * 1024 * 1024)
    .optional(),
  progressThrottleMs: z.number().int().min(0).max(60_000).optional(),
});

const logLevelSchema = z.union([
  z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']),
  z.literal(false),
]);

const configOverridesSchema = z.object({
  network: z
    .object({
      responseTimeoutMs: z.number().int().positive(),
      idleTimeoutMs: z.number().int().positive(),
      retryDelayMs: z.number().int().nonnegative(),
      maxRetryDelayMs: z.number().int().nonnegative(),
      retryJitterFactor: z.number().min(0).max(1),
      retryAfterMaxMs: z.number().int().nonnegative(),
      userAgent: z.string().min(1),
    })
    .partial()
    .optional(),
  downloads: z
    .object({
      maxConcurrent: z.number().int().min(1).max(16),
      maxAttempts: z.number().int().min(1).max(50),
      chunkSize: z
        .number()
        .int()
        .min(1024)
        .max(16 * 1024 * 1024),
      partialSuffix: z.string().regex(/^\.[A-Za-z0-9_-]+$/, 'partialSuffix debe empezar por punto'),
      progressThrottleMs: z.number().int().min(0),
    })
    .partial()
    .optional(),
  verifier: z
    .object({
      hashBufferSize: z
        .number()
        .int()
        .min(4096)
        .max(64 * 1024 * 1024),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      consoleLevel: logLevelSchema,
      fileLevel: logLevelSchema,
      logFile: z.string().min(1).nullable(),
    })
    .partial()
    .optional(),
});

export type ManifestEntryInput = z.input<typeof manifestEntrySchema>;
export type ManifestEntryData = z.output<typeof manifestEntrySchema>;
export type DownloadSettings = z.output<typeof downloadSettingsSchema>;
export type ConfigOverridesData = z.output<typeof configOverridesSchema>;

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ZodValidationResult<T> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${MANIFEST_ERRORS.INVALID}: ${getErrorMessage(error)}`,
    };
  }
}

export function validateManifest(entries: unknown): ZodValidationResult<ManifestEntryData[]> {
  return validate(manifestSchema, entries);
}

export function validateDownloadSettings(params: unknown): ZodValidationResult<DownloadSettings> {
  return validate(downloadSettingsSchema, params);
}

export function validateConfigOverrides(data: unknown): ZodValidationResult<ConfigOverridesData> {
  const result = validate(configOverridesSchema, data);
  if (!result.success) {
    return { success: false, error: `${SETTINGS_ERRORS.INVALID}: ${result.error ?? ''}` };
  }
  return result;
}

export const schemas = {
  manifestEntry: manifestEntrySchema,
  manifest: manifestSchema,
  downloadSettings: downloadSettingsSchema,
  configOverrides: configOverridesSchema,
};

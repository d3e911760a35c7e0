/**
 * Tests unitarios para src/utils/schemas.ts
 */
import {
  isSafeRelativeName,
  validateConfigOverrides,
  validateDownloadSettings,
  validateManifest,
} from '../../src/utils/schemas';
import { MANIFEST_ERRORS, SETTINGS_ERRORS } from '../../src/constants/errors';

const DIGEST = 'A'.repeat(64);

describe('schemas', () => {
  describe('isSafeRelativeName', () => {
    it('debe aceptar rutas relativas con subdirectorios', () => {
      expect(isSafeRelativeName('config.json')).toBe(true);
      expect(isSafeRelativeName('tokenizer/vocab.json')).toBe(true);
    });

    it('debe rechazar rutas absolutas y segmentos peligrosos', () => {
      expect(isSafeRelativeName('')).toBe(false);
      expect(isSafeRelativeName('/etc/passwd')).toBe(false);
      expect(isSafeRelativeName('C:\\model.bin')).toBe(false);
      expect(isSafeRelativeName('../fuera.bin')).toBe(false);
      expect(isSafeRelativeName('a//b.bin')).toBe(false);
      expect(isSafeRelativeName('./a.bin')).toBe(false);
    });
  });

  describe('validateManifest', () => {
    it('debe normalizar campos opcionales a null y el hash a minúsculas', () => {
      const result = validateManifest([
        { name: 'config.json', url: 'https://models.test/config.json', priorityClass: 'essential' },
        {
          name: 'params_shard_0.bin',
          url: 'https://models.test/params_shard_0.bin',
          expectedSize: 10,
          expectedDigest: DIGEST,
          priorityClass: 'parameter',
        },
      ]);

      expect(result.success).toBe(true);
      expect(result.data).toEqual([
        {
          name: 'config.json',
          url: 'https://models.test/config.json',
          expectedSize: null,
          expectedDigest: null,
          priorityClass: 'essential',
        },
        {
          name: 'params_shard_0.bin',
          url: 'https://models.test/params_shard_0.bin',
          expectedSize: 10,
          expectedDigest: 'a'.repeat(64),
          priorityClass: 'parameter',
        },
      ]);
    });

    it('debe rechazar nombres duplicados', () => {
      const entry = { name: 'a.bin', url: 'https://models.test/a.bin', priorityClass: 'parameter' };
      const result = validateManifest([entry, entry]);
      expect(result.success).toBe(false);
      expect(result.error).toBe(`1.name: ${MANIFEST_ERRORS.DUPLICATE_NAME}: a.bin`);
    });

    it('debe rechazar tamaños negativos, hashes cortos y clases desconocidas', () => {
      expect(
        validateManifest([
          { name: 'a.bin', url: 'https://models.test/a.bin', expectedSize: -1, priorityClass: 'parameter' },
        ]).success
      ).toBe(false);
      expect(
        validateManifest([
          { name: 'a.bin', url: 'https://models.test/a.bin', expectedDigest: 'abc', priorityClass: 'parameter' },
        ]).success
      ).toBe(false);
      expect(
        validateManifest([{ name: 'a.bin', url: 'https://models.test/a.bin', priorityClass: 'other' }])
          .success
      ).toBe(false);
    });

    it('debe rechazar algo que no es un array', () => {
      expect(validateManifest({ name: 'a.bin' }).success).toBe(false);
    });
  });

  describe('validateDownloadSettings', () => {
    it('debe aceptar un objeto vacío', () => {
      expect(validateDownloadSettings({})).toEqual({ success: true, data: {} });
    });

    it('debe rechazar concurrencia fuera de rango', () => {
      expect(validateDownloadSettings({ concurrency: 0 }).success).toBe(false);
      expect(validateDownloadSettings({ concurrency: 17 }).success).toBe(false);
      expect(validateDownloadSettings({ concurrency: 4 }).success).toBe(true);
    });

    it('debe rechazar bloques menores de 1 KiB', () => {
      const result = validateDownloadSettings({ chunkSize: 512 });
      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^chunkSize: /);
    });
  });

  describe('validateConfigOverrides', () => {
    it('debe aceptar secciones parciales', () => {
      const result = validateConfigOverrides({ downloads: { maxConcurrent: 4 } });
      expect(result).toEqual({ success: true, data: { downloads: { maxConcurrent: 4 } } });
    });

    it('debe prefijar el error con el mensaje de configuración inválida', () => {
      const result = validateConfigOverrides({ downloads: { partialSuffix: 'partial' } });
      expect(result.success).toBe(false);
      expect(result.error).toBe(
        `${SETTINGS_ERRORS.INVALID}: downloads.partialSuffix: partialSuffix debe empezar por punto`
      );
    });
  });
});

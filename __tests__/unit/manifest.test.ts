/**
 * Tests unitarios para src/engines/manifest.ts
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  ManifestError,
  assertNoReservedNames,
  buildShardedManifest,
  checkModelAvailability,
  createManifest,
  loadManifestFile,
  shardName,
} from '../../src/engines/manifest';
import { PriorityClass } from '../../src/engines/types';
import { MANIFEST_ERRORS } from '../../src/constants/errors';

const BASE_URL = 'https://models.test/org/model/resolve/main';

describe('manifest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('createManifest', () => {
    it('debe congelar el manifiesto y cada descriptor', () => {
      const manifest = createManifest([
        { name: 'a.bin', url: 'https://models.test/a.bin', priorityClass: 'parameter' },
      ]);
      expect(Object.isFrozen(manifest)).toBe(true);
      expect(Object.isFrozen(manifest[0])).toBe(true);
      expect(manifest[0].expectedSize).toBeNull();
    });

    it('debe lanzar ManifestError con el detalle de validación', () => {
      expect(() => createManifest([{ name: '', url: 'x', priorityClass: 'parameter' }])).toThrow(
        ManifestError
      );
      expect(() => createManifest('no-es-manifiesto')).toThrow(MANIFEST_ERRORS.INVALID);
    });
  });

  describe('assertNoReservedNames', () => {
    const manifest = createManifest([
      { name: 'w.bin', url: `${BASE_URL}/w.bin`, priorityClass: 'parameter' },
      { name: 'w.bin.partial', url: `${BASE_URL}/w.bin.partial`, priorityClass: 'parameter' },
    ]);

    it('debe rechazar nombres con el sufijo de parciales', () => {
      expect(() => assertNoReservedNames(manifest, '.partial')).toThrow(
        `${MANIFEST_ERRORS.RESERVED_SUFFIX} (.partial): w.bin.partial`
      );
    });

    it('debe aceptar el manifiesto si el sufijo es otro', () => {
      expect(() => assertNoReservedNames(manifest, '.part')).not.toThrow();
    });
  });

  describe('loadManifestFile', () => {
    const entries = [
      { name: 'config.json', url: 'https://models.test/config.json', priorityClass: 'essential' },
    ];

    it('debe leer un array de entradas', async () => {
      const file = path.join(dir, 'manifest.json');
      await fs.writeFile(file, JSON.stringify(entries));
      const manifest = await loadManifestFile(file);
      expect(manifest.map(d => d.name)).toEqual(['config.json']);
    });

    it('debe leer un objeto { files }', async () => {
      const file = path.join(dir, 'manifest.json');
      await fs.writeFile(file, JSON.stringify({ files: entries }));
      const manifest = await loadManifestFile(file);
      expect(manifest).toHaveLength(1);
      expect(manifest[0].priorityClass).toBe(PriorityClass.ESSENTIAL);
    });

    it('debe fallar con archivos inexistentes o JSON roto', async () => {
      await expect(loadManifestFile(path.join(dir, 'missing.json'))).rejects.toThrow(
        MANIFEST_ERRORS.READ_FAILED
      );
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '[');
      await expect(loadManifestFile(file)).rejects.toThrow(MANIFEST_ERRORS.INVALID_JSON);
    });
  });

  describe('buildShardedManifest', () => {
    it('debe poner los esenciales primero y numerar los shards desde 0', () => {
      const manifest = buildShardedManifest({
        baseUrl: BASE_URL,
        essentialFiles: ['config.json', 'tokenizer.json'],
        parameterShardCount: 3,
        metadata: { 'params_shard_1.bin': { expectedSize: 42 } },
      });

      expect(manifest.map(d => [d.name, d.priorityClass])).toEqual([
        ['config.json', 'essential'],
        ['tokenizer.json', 'essential'],
        ['params_shard_0.bin', 'parameter'],
        ['params_shard_1.bin', 'parameter'],
        ['params_shard_2.bin', 'parameter'],
      ]);
      expect(manifest[0].url).toBe(`${BASE_URL}/config.json`);
      expect(manifest[3].expectedSize).toBe(42);
      expect(manifest[4].expectedSize).toBeNull();
    });

    it('debe aceptar un patrón de nombre propio', () => {
      expect(shardName('model-{i}-of-4.safetensors', 2)).toBe('model-2-of-4.safetensors');
      const manifest = buildShardedManifest({
        baseUrl: `${BASE_URL}/`,
        essentialFiles: [],
        parameterShardCount: 1,
        shardNamePattern: 'weights/{i}.bin',
      });
      expect(manifest[0].url).toBe(`${BASE_URL}/weights/0.bin`);
    });

    it('debe rechazar un número de shards inválido o un patrón sin {i}', () => {
      expect(() =>
        buildShardedManifest({ baseUrl: BASE_URL, essentialFiles: [], parameterShardCount: -1 })
      ).toThrow(ManifestError);
      expect(() =>
        buildShardedManifest({
          baseUrl: BASE_URL,
          essentialFiles: [],
          parameterShardCount: 2,
          shardNamePattern: 'fijo.bin',
        })
      ).toThrow(ManifestError);
    });
  });

  describe('checkModelAvailability', () => {
    it('debe ignorar parciales y exigir el tamaño esperado', async () => {
      const manifest = buildShardedManifest({
        baseUrl: BASE_URL,
        essentialFiles: ['config.json'],
        parameterShardCount: 2,
        metadata: { 'params_shard_0.bin': { expectedSize: 4 }, 'params_shard_1.bin': { expectedSize: 4 } },
      });
      await fs.writeFile(path.join(dir, 'config.json'), '{}');
      await fs.writeFile(path.join(dir, 'params_shard_0.bin'), 'abc');
      await fs.writeFile(path.join(dir, 'params_shard_1.bin.partial'), 'abcd');

      await expect(checkModelAvailability(dir, manifest)).resolves.toEqual({
        essentialReady: true,
        complete: false,
        missing: ['params_shard_0.bin', 'params_shard_1.bin'],
      });
    });

    it('debe informar esenciales ausentes', async () => {
      const manifest = buildShardedManifest({
        baseUrl: BASE_URL,
        essentialFiles: ['config.json'],
        parameterShardCount: 0,
      });
      await expect(checkModelAvailability(dir, manifest)).resolves.toEqual({
        essentialReady: false,
        complete: false,
        missing: ['config.json'],
      });
    });
  });
});

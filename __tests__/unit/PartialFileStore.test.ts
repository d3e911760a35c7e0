/**
 * Tests unitarios para src/engines/PartialFileStore.ts
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import PartialFileStore from '../../src/engines/PartialFileStore';
import { TransferErrorKind } from '../../src/engines/TransferError';
import { FILE_ERRORS } from '../../src/constants/errors';

describe('PartialFileStore', () => {
  let root: string;
  let store: PartialFileStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'partial-store-'));
    store = new PartialFileStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('pathsFor', () => {
    it('debe derivar la ruta final y el sufijo .partial', () => {
      const paths = store.pathsFor({ name: 'tokenizer/vocab.json' });
      expect(paths.finalPath).toBe(path.join(root, 'tokenizer', 'vocab.json'));
      expect(paths.partialPath).toBe(path.join(root, 'tokenizer', 'vocab.json.partial'));
    });

    it('debe respetar un sufijo configurado', () => {
      const custom = new PartialFileStore(root, { partialSuffix: '.part' });
      expect(custom.pathsFor({ name: 'a.bin' }).partialPath).toBe(path.join(root, 'a.bin.part'));
    });

    it('debe rechazar nombres fuera del destino', () => {
      expect(() => store.pathsFor({ name: '../fuera.bin' })).toThrow(FILE_ERRORS.PATH_OUTSIDE_ROOT);
    });
  });

  describe('existingBytes', () => {
    it('debe devolver none si no hay nada', async () => {
      await expect(store.existingBytes({ name: 'a.bin' })).resolves.toEqual({
        location: 'none',
        bytes: 0,
      });
    });

    it('debe devolver la longitud del parcial como offset', async () => {
      await fs.writeFile(path.join(root, 'a.bin.partial'), new Uint8Array(400));
      await expect(store.existingBytes({ name: 'a.bin' })).resolves.toEqual({
        location: 'partial',
        bytes: 400,
      });
    });

    it('debe priorizar un final no vacío sobre el parcial', async () => {
      await fs.writeFile(path.join(root, 'a.bin'), new Uint8Array(10));
      await fs.writeFile(path.join(root, 'a.bin.partial'), new Uint8Array(4));
      await expect(store.existingBytes({ name: 'a.bin' })).resolves.toEqual({
        location: 'final',
        bytes: 10,
      });
    });

    it('debe reportar un final vacío sin parcial', async () => {
      await fs.writeFile(path.join(root, 'empty.bin'), new Uint8Array(0));
      await expect(store.existingBytes({ name: 'empty.bin' })).resolves.toEqual({
        location: 'final',
        bytes: 0,
      });
    });
  });

  describe('openForAppend', () => {
    it('debe crear directorios y añadir al final del parcial', async () => {
      const { partialPath } = store.pathsFor({ name: 'nested/dir/a.bin' });
      await fs.mkdir(path.dirname(partialPath), { recursive: true });
      await fs.writeFile(partialPath, Uint8Array.from([1, 2, 3]));

      const sink = await store.openForAppend(partialPath);
      await sink.write(Uint8Array.from([4, 5]));
      await sink.write(Uint8Array.from([6]));
      await sink.close();

      const content = await fs.readFile(partialPath);
      expect(Array.from(content)).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('debe crear el directorio padre si no existe', async () => {
      const { partialPath } = store.pathsFor({ name: 'x/y/z.bin' });
      const sink = await store.openForAppend(partialPath);
      await sink.close();
      await expect(fs.stat(partialPath)).resolves.toMatchObject({ size: 0 });
    });

    it('debe rechazar un segundo sumidero sobre la misma ruta', async () => {
      const { partialPath } = store.pathsFor({ name: 'a.bin' });
      const sink = await store.openForAppend(partialPath);
      expect(store.isOpen(partialPath)).toBe(true);

      await expect(store.openForAppend(partialPath)).rejects.toMatchObject({
        kind: TransferErrorKind.IO,
        code: 'EBUSY',
      });

      await sink.close();
      expect(store.isOpen(partialPath)).toBe(false);
      const again = await store.openForAppend(partialPath);
      await again.close();
    });

    it('close debe ser idempotente', async () => {
      const { partialPath } = store.pathsFor({ name: 'a.bin' });
      const sink = await store.openForAppend(partialPath);
      await sink.close();
      await expect(sink.close()).resolves.toBeUndefined();
    });
  });

  describe('promote / promoteByCopy / discard', () => {
    it('promote debe renombrar el parcial al nombre final', async () => {
      const { finalPath, partialPath } = store.pathsFor({ name: 'a.bin' });
      await fs.writeFile(partialPath, 'datos');

      await store.promote(partialPath, finalPath);

      await expect(fs.readFile(finalPath, 'utf8')).resolves.toBe('datos');
      await expect(fs.stat(partialPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('promote debe lanzar io si el parcial no existe', async () => {
      const { finalPath, partialPath } = store.pathsFor({ name: 'a.bin' });
      await expect(store.promote(partialPath, finalPath)).rejects.toMatchObject({
        kind: TransferErrorKind.IO,
        code: 'ENOENT',
      });
    });

    it('promoteByCopy debe copiar y borrar el parcial', async () => {
      const { finalPath, partialPath } = store.pathsFor({ name: 'a.bin' });
      await fs.writeFile(partialPath, 'copia');

      await store.promoteByCopy(partialPath, finalPath);

      await expect(fs.readFile(finalPath, 'utf8')).resolves.toBe('copia');
      await expect(fs.stat(partialPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('discard debe tolerar archivos inexistentes', async () => {
      const { partialPath } = store.pathsFor({ name: 'a.bin' });
      await expect(store.discard(partialPath)).resolves.toBeUndefined();
      await fs.writeFile(partialPath, 'x');
      await store.discard(partialPath);
      await expect(fs.stat(partialPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });
});

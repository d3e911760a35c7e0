/**
 * Tests unitarios para src/engines/ChecksumVerifier.ts
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import ChecksumVerifier from '../../src/engines/ChecksumVerifier';
import { TransferError, TransferErrorKind } from '../../src/engines/TransferError';
import { makeBytes, sha256 } from '../helpers/fakeServer';

const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('ChecksumVerifier', () => {
  let dir: string;
  let verifier: ChecksumVerifier;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'checksum-'));
    verifier = new ChecksumVerifier({ bufferSize: 4096 });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: Uint8Array | string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  }

  describe('digest', () => {
    it('debe calcular el SHA-256 conocido de "abc"', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      await expect(verifier.digest(filePath)).resolves.toBe(SHA256_ABC);
    });

    it('debe calcular el hash de un archivo vacío', async () => {
      const filePath = await writeFile('empty.bin', new Uint8Array(0));
      await expect(verifier.digest(filePath)).resolves.toBe(SHA256_EMPTY);
    });

    it('debe leer en bloques archivos mayores que el buffer', async () => {
      const bytes = makeBytes(200_000, 3);
      const filePath = await writeFile('big.bin', bytes);

      await expect(verifier.digest(filePath)).resolves.toBe(sha256(bytes));
    });

    it('debe lanzar TransferError io si el archivo no existe', async () => {
      const promise = verifier.digest(path.join(dir, 'missing.bin'));
      await expect(promise).rejects.toBeInstanceOf(TransferError);
      await expect(promise).rejects.toMatchObject({ kind: TransferErrorKind.IO, code: 'ENOENT' });
    });
  });

  describe('verify', () => {
    it('debe aceptar cualquier archivo si no hay hash esperado', async () => {
      const filePath = await writeFile('a.bin', 'contenido');
      await expect(verifier.verify(filePath, null)).resolves.toBe(true);
    });

    it('debe comparar sin distinguir mayúsculas en el hash esperado', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      await expect(verifier.verify(filePath, SHA256_ABC.toUpperCase())).resolves.toBe(true);
    });

    it('debe rechazar un hash distinto', async () => {
      const filePath = await writeFile('abc.txt', 'abd');
      await expect(verifier.verify(filePath, SHA256_ABC)).resolves.toBe(false);
    });
  });

  describe('verifyFile', () => {
    it('debe fallar por tamaño sin calcular hash', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      const result = await verifier.verifyFile(filePath, 4, SHA256_ABC);
      expect(result).toEqual({
        valid: false,
        sizeValid: false,
        digestValid: null,
        actualSize: 3,
        actualDigest: null,
        error: 'Tamaño incorrecto: 3/4 bytes',
      });
    });

    it('debe validar tamaño y hash', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      const result = await verifier.verifyFile(filePath, 3, SHA256_ABC);
      expect(result).toEqual({
        valid: true,
        sizeValid: true,
        digestValid: true,
        actualSize: 3,
        actualDigest: SHA256_ABC,
      });
    });

    it('debe aceptar tamaño desconocido y comprobar solo el hash', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      const result = await verifier.verifyFile(filePath, null, SHA256_EMPTY);
      expect(result.valid).toBe(false);
      expect(result.sizeValid).toBe(true);
      expect(result.digestValid).toBe(false);
      expect(result.actualDigest).toBe(SHA256_ABC);
    });

    it('debe marcar digestValid null cuando no hay hash esperado', async () => {
      const filePath = await writeFile('abc.txt', 'abc');
      const result = await verifier.verifyFile(filePath, 3, null);
      expect(result).toMatchObject({ valid: true, digestValid: null, actualDigest: null });
    });

    it('debe lanzar io si el archivo no existe', async () => {
      await expect(
        verifier.verifyFile(path.join(dir, 'missing.bin'), 3, null)
      ).rejects.toMatchObject({ kind: TransferErrorKind.IO, code: 'ENOENT' });
    });
  });
});

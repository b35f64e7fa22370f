/**
 * Tests unitarios para core/engines/Verifier.ts
 */
import crypto from 'crypto';
import path from 'path';
import { promises as fs } from 'fs';
import Verifier, { getAlgorithmSecurity, isWeakAlgorithm } from '../../core/engines/Verifier';
import { makeTempDir, removeTempDir } from '../helpers/tempDir';
import { generateData } from '../helpers/testServer';

describe('Verifier', () => {
  let dir: string;
  let filePath: string;
  const data = generateData(10_000, 42);

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, 'sample.bin');
    await fs.writeFile(filePath, data);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('getAlgorithmSecurity', () => {
    it('clasifica los algoritmos', () => {
      expect(getAlgorithmSecurity('sha256')).toBe('strong');
      expect(getAlgorithmSecurity('sha384')).toBe('strong');
      expect(getAlgorithmSecurity('sha512')).toBe('strong');
      expect(getAlgorithmSecurity('sha1')).toBe('weak');
      expect(getAlgorithmSecurity('md5')).toBe('weak');
      expect(isWeakAlgorithm('md5')).toBe(true);
      expect(isWeakAlgorithm('sha256')).toBe(false);
    });
  });

  describe('calculateHash', () => {
    it.each(['md5', 'sha1', 'sha256', 'sha384', 'sha512'] as const)(
      'coincide con crypto para %s aunque el buffer sea menor que el archivo',
      async algorithm => {
        const verifier = new Verifier(1024);
        const expected = crypto.createHash(algorithm).update(data).digest('hex');
        const result = await verifier.calculateHash(filePath, algorithm);
        expect(result).toEqual({ hex: expected, bytes: data.length });
      }
    );

    it('informa el progreso hasta 1', async () => {
      const verifier = new Verifier(4096);
      const progress: number[] = [];
      await verifier.calculateHash(filePath, 'sha256', p => progress.push(p));
      expect(progress).toHaveLength(3);
      expect(progress[progress.length - 1]).toBe(1);
    });

    it('hashea un archivo vacío', async () => {
      const emptyPath = path.join(dir, 'empty.bin');
      await fs.writeFile(emptyPath, Buffer.alloc(0));
      const result = await new Verifier().calculateHash(emptyPath, 'sha256');
      expect(result.hex).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
      expect(result.bytes).toBe(0);
    });
  });

  describe('verifyChecksum', () => {
    const sha256 = crypto.createHash('sha256').update(data).digest('hex');

    it('valida un checksum correcto sin distinguir mayúsculas', async () => {
      const result = await new Verifier().verifyChecksum(filePath, {
        algorithm: 'sha256',
        expectedHex: sha256.toUpperCase(),
      });
      expect(result).toEqual({
        valid: true,
        algorithm: 'sha256',
        security: 'strong',
        expectedHex: sha256,
        actualHex: sha256,
        bytesHashed: data.length,
      });
    });

    it('no lanza ante una discrepancia', async () => {
      const wrong = '0'.repeat(64);
      const result = await new Verifier().verifyChecksum(filePath, {
        algorithm: 'sha256',
        expectedHex: wrong,
      });
      expect(result.valid).toBe(false);
      expect(result.expectedHex).toBe(wrong);
      expect(result.actualHex).toBe(sha256);
      expect(result.error).toBeUndefined();
    });

    it('devuelve el error de E/S como valid false', async () => {
      const result = await new Verifier().verifyChecksum(path.join(dir, 'missing.bin'), {
        algorithm: 'md5',
        expectedHex: '0'.repeat(32),
      });
      expect(result.valid).toBe(false);
      expect(result.actualHex).toBeNull();
      expect(result.security).toBe('weak');
      expect(result.error).toContain('ENOENT');
    });

    it('propaga el aborto', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(
        new Verifier(1024).verifyChecksum(
          filePath,
          { algorithm: 'sha256', expectedHex: sha256 },
          null,
          controller.signal
        )
      ).rejects.toMatchObject({ name: 'AbortError' });
    });
  });
});

/**
 * Tests unitarios para core/utils/validation.ts
 */
import path from 'path';
import {
  parseChecksum,
  normalizeChecksum,
  formatChecksum,
  validateDownloadId,
  validateEnqueueParams,
  VALIDATIONS,
} from '../../core/utils/validation';

const HEX64 = 'ab'.repeat(32);

describe('validation', () => {
  describe('parseChecksum', () => {
    it('interpreta la notación algoritmo:hex y normaliza a minúsculas', () => {
      expect(parseChecksum(`SHA256:${HEX64.toUpperCase()}`)).toEqual({
        valid: true,
        data: { algorithm: 'sha256', expectedHex: HEX64 },
      });
    });

    it('exige el separador', () => {
      expect(parseChecksum(HEX64)).toEqual({
        valid: false,
        error: VALIDATIONS.CHECKSUM.INVALID_FORMAT,
      });
      expect(parseChecksum(`:${HEX64}`).valid).toBe(false);
    });

    it('rechaza algoritmos no soportados', () => {
      expect(parseChecksum('crc32:abcd1234')).toEqual({
        valid: false,
        error: `algorithm: ${VALIDATIONS.CHECKSUM.UNSUPPORTED_ALGORITHM}`,
      });
    });

    it('rechaza hex inválido', () => {
      expect(parseChecksum(`sha256:${'zz'.repeat(32)}`)).toEqual({
        valid: false,
        error: `expectedHex: ${VALIDATIONS.CHECKSUM.INVALID_HEX}`,
      });
    });

    it('exige la longitud de cada algoritmo', () => {
      expect(parseChecksum('sha256:abcd')).toEqual({
        valid: false,
        error: VALIDATIONS.CHECKSUM.INVALID_LENGTH,
      });
      expect(parseChecksum(`md5:${'a'.repeat(32)}`).valid).toBe(true);
      expect(parseChecksum(`sha1:${'a'.repeat(40)}`).valid).toBe(true);
      expect(parseChecksum(`sha384:${'a'.repeat(96)}`).valid).toBe(true);
      expect(parseChecksum(`sha512:${'a'.repeat(128)}`).valid).toBe(true);
      expect(parseChecksum(`sha512:${'a'.repeat(64)}`).valid).toBe(false);
    });
  });

  describe('normalizeChecksum', () => {
    it('acepta ausencia de checksum', () => {
      expect(normalizeChecksum(undefined)).toEqual({ valid: true, data: null });
      expect(normalizeChecksum(null)).toEqual({ valid: true, data: null });
      expect(normalizeChecksum('')).toEqual({ valid: true, data: null });
    });

    it('acepta el objeto y la notación', () => {
      expect(normalizeChecksum({ algorithm: 'sha256', expectedHex: HEX64.toUpperCase() })).toEqual({
        valid: true,
        data: { algorithm: 'sha256', expectedHex: HEX64 },
      });
      expect(normalizeChecksum(`sha256:${HEX64}`).data).toEqual({
        algorithm: 'sha256',
        expectedHex: HEX64,
      });
    });
  });

  it('formatChecksum produce la notación de manifiestos', () => {
    expect(formatChecksum({ algorithm: 'sha256', expectedHex: HEX64.toUpperCase() })).toBe(
      `sha256:${HEX64}`
    );
  });

  describe('validateDownloadId', () => {
    it('acepta enteros positivos (también como string)', () => {
      expect(validateDownloadId(5)).toEqual({ valid: true, data: 5, error: undefined });
      expect(validateDownloadId('12').data).toBe(12);
    });

    it('rechaza cero, negativos y decimales', () => {
      expect(validateDownloadId(0).valid).toBe(false);
      expect(validateDownloadId(-1).valid).toBe(false);
      expect(validateDownloadId(1.5).error).toBe(VALIDATIONS.ID.MUST_BE_INTEGER);
    });
  });

  describe('validateEnqueueParams', () => {
    it('resuelve la ruta de destino y normaliza el checksum', () => {
      const result = validateEnqueueParams(
        ' http://127.0.0.1/a.bin ',
        'descargas/a.bin',
        `sha256:${HEX64}`
      );
      expect(result).toEqual({
        valid: true,
        data: {
          url: 'http://127.0.0.1/a.bin',
          outputPath: path.resolve('descargas/a.bin'),
          checksum: { algorithm: 'sha256', expectedHex: HEX64 },
        },
      });
    });

    it('checksum null cuando no se indica', () => {
      expect(validateEnqueueParams('http://h/a', '/tmp/a').data?.checksum).toBeNull();
    });

    it('rechaza URL no http', () => {
      expect(validateEnqueueParams('ftp://h/a', '/tmp/a')).toEqual({
        valid: false,
        error: VALIDATIONS.URL.MUST_BE_ABSOLUTE,
      });
      expect(validateEnqueueParams('/relativa/a.bin', '/tmp/a').valid).toBe(false);
      expect(validateEnqueueParams('', '/tmp/a').valid).toBe(false);
    });

    it('rechaza rutas vacías o con byte nulo', () => {
      expect(validateEnqueueParams('http://h/a', '').valid).toBe(false);
      expect(validateEnqueueParams('http://h/a', '/tmp/a\0b')).toEqual({
        valid: false,
        error: VALIDATIONS.PATH.NULL_BYTE,
      });
    });

    it('rechaza checksums inválidos', () => {
      expect(validateEnqueueParams('http://h/a', '/tmp/a', 'sha256:abc').error).toBe(
        VALIDATIONS.CHECKSUM.INVALID_LENGTH
      );
    });
  });
});

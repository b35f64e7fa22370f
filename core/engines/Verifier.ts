/**
 * Verificación de integridad por checksum.
 *
 * verifyChecksum: calcula el hash del archivo leyendo en bloques de tamaño fijo (memoria
 * constante) y lo compara sin distinguir mayúsculas. Nunca lanza por una discrepancia; los
 * errores de E/S vuelven como valid: false con error. sha256/384/512 se consideran
 * fuertes; sha1 y md5 solo se aceptan por compatibilidad.
 *
 * @module Verifier
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import config from '../config';
import { logger } from '../utils/logger';
import { getErrorCode, getErrorMessage } from '../utils/errors';
import type { ChecksumAlgorithm, ChecksumSpec } from './types';

const log = logger.child('Verifier');

export type AlgorithmSecurity = 'strong' | 'weak';

const ALGORITHM_SECURITY: Readonly<Record<ChecksumAlgorithm, AlgorithmSecurity>> = Object.freeze({
  sha256: 'strong',
  sha384: 'strong',
  sha512: 'strong',
  sha1: 'weak',
  md5: 'weak',
});

export function getAlgorithmSecurity(algorithm: ChecksumAlgorithm): AlgorithmSecurity {
  return ALGORITHM_SECURITY[algorithm];
}

export function isWeakAlgorithm(algorithm: ChecksumAlgorithm): boolean {
  return getAlgorithmSecurity(algorithm) === 'weak';
}

export interface VerifyChecksumResult {
  valid: boolean;
  algorithm: ChecksumAlgorithm;
  security: AlgorithmSecurity;
  expectedHex: string;
  actualHex: string | null;
  bytesHashed: number;
  error?: string;
}

export default class Verifier {
  private readonly bufferSize: number;

  constructor(bufferSize: number = config.downloads.verifyBufferSize) {
    this.bufferSize = bufferSize;
  }

  async calculateHash(
    filePath: string,
    algorithm: ChecksumAlgorithm,
    onProgress: ((_progress: number) => void) | null = null,
    signal?: AbortSignal
  ): Promise<{ hex: string; bytes: number }> {
    const hash = crypto.createHash(algorithm);
    const stats = await fs.stat(filePath);
    const fileHandle = await fs.open(filePath, 'r');
    const buffer = Buffer.allocUnsafe(Math.max(1, Math.min(this.bufferSize, stats.size || 1)));
    let bytesRead = 0;

    try {
      while (bytesRead < stats.size) {
        signal?.throwIfAborted();
        const toRead = Math.min(buffer.length, stats.size - bytesRead);
        const { bytesRead: read } = await fileHandle.read(buffer, 0, toRead, bytesRead);
        if (read === 0) break;
        hash.update(buffer.subarray(0, read));
        bytesRead += read;
        if (onProgress) onProgress(bytesRead / stats.size);
      }
      return { hex: hash.digest('hex'), bytes: bytesRead };
    } finally {
      await fileHandle.close();
    }
  }

  /**
   * Compara el hash del archivo con el esperado.
   *
   * @returns valid true solo si coinciden; actualHex es null si no se pudo leer el archivo.
   */
  async verifyChecksum(
    filePath: string,
    spec: ChecksumSpec,
    onProgress: ((_progress: number) => void) | null = null,
    signal?: AbortSignal
  ): Promise<VerifyChecksumResult> {
    const expectedHex = spec.expectedHex.toLowerCase();
    const security = getAlgorithmSecurity(spec.algorithm);
    try {
      const { hex, bytes } = await this.calculateHash(filePath, spec.algorithm, onProgress, signal);
      const valid = hex === expectedHex;
      if (!valid) {
        log.warn(`Checksum ${spec.algorithm} no coincide en ${filePath}: ${hex} !== ${expectedHex}`);
      }
      return {
        valid,
        algorithm: spec.algorithm,
        security,
        expectedHex,
        actualHex: hex,
        bytesHashed: bytes,
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      log.error(
        `Error verificando archivo (ruta: ${filePath}): ${getErrorCode(error) ?? 'VERIFY_ERROR'}`,
        error
      );
      return {
        valid: false,
        algorithm: spec.algorithm,
        security,
        expectedHex,
        actualHex: null,
        bytesHashed: 0,
        error: getErrorMessage(error),
      };
    }
  }
}

export { Verifier };

/**
 * @fileoverview Módulo de validación centralizado del motor.
 * @module validation
 *
 * Valida los parámetros que llegan a la fachada: URLs, rutas de destino, checksums
 * (objeto o notación `<algoritmo>:<hex>`) e IDs de descarga.
 */

import path from 'path';
import { logger } from './logger';
import { VALIDATIONS } from '../constants/validations';
import { schemas, validate, validateDownloadId as validateDownloadIdSchema } from './schemas';
import type { ChecksumSpec } from '../../shared/types';

const log = logger.child('Validation');

export interface ValidationResult<T = unknown> {
  valid: boolean;
  data?: T;
  error?: string;
}

export interface EnqueueParams {
  url: string;
  outputPath: string;
  checksum: ChecksumSpec | null;
}

/**
 * Interpreta la notación de manifiestos `sha256:<hex>`. El algoritmo no distingue
 * mayúsculas; el hex se normaliza a minúsculas.
 */
export function parseChecksum(notation: string): ValidationResult<ChecksumSpec> {
  const separator = notation.indexOf(':');
  if (separator <= 0) {
    return { valid: false, error: VALIDATIONS.CHECKSUM.INVALID_FORMAT };
  }
  return normalizeChecksumSpec({
    algorithm: notation.slice(0, separator).trim().toLowerCase(),
    expectedHex: notation.slice(separator + 1).trim(),
  });
}

function normalizeChecksumSpec(spec: unknown): ValidationResult<ChecksumSpec> {
  const result = validate(schemas.checksumSpec, spec);
  if (!result.success || !result.data) {
    return { valid: false, error: result.error };
  }
  return { valid: true, data: result.data };
}

/** Acepta objeto, notación en string o ausencia de checksum. */
export function normalizeChecksum(
  input: ChecksumSpec | string | null | undefined
): ValidationResult<ChecksumSpec | null> {
  if (input === null || input === undefined || input === '') {
    return { valid: true, data: null };
  }
  if (typeof input === 'string') {
    return parseChecksum(input);
  }
  return normalizeChecksumSpec({
    algorithm: String(input.algorithm).toLowerCase(),
    expectedHex: input.expectedHex,
  });
}

/** Serializa un checksum a la notación `<algoritmo>:<hex>`. */
export function formatChecksum(spec: ChecksumSpec): string {
  return `${spec.algorithm}:${spec.expectedHex.toLowerCase()}`;
}

export function validateDownloadId(downloadId: unknown): ValidationResult<number> {
  const result = validateDownloadIdSchema(downloadId);
  return {
    valid: result.success,
    data: result.data,
    error: result.error,
  };
}

/**
 * Valida los parámetros de enqueue. La ruta de destino se resuelve a absoluta.
 */
export function validateEnqueueParams(
  url: unknown,
  outputPath: unknown,
  checksum?: ChecksumSpec | string | null
): ValidationResult<EnqueueParams> {
  const urlResult = validate(schemas.url, url);
  if (!urlResult.success || urlResult.data === undefined) {
    log.debug('URL rechazada:', url);
    return { valid: false, error: urlResult.error ?? VALIDATIONS.URL.MUST_BE_ABSOLUTE };
  }

  const pathResult = validate(schemas.outputPath, outputPath);
  if (!pathResult.success || pathResult.data === undefined) {
    return { valid: false, error: pathResult.error ?? VALIDATIONS.PATH.CANNOT_BE_EMPTY };
  }

  const checksumResult = normalizeChecksum(checksum);
  if (!checksumResult.valid) {
    return { valid: false, error: checksumResult.error };
  }

  return {
    valid: true,
    data: {
      url: urlResult.data,
      outputPath: path.resolve(pathResult.data),
      checksum: checksumResult.data ?? null,
    },
  };
}

export { VALIDATIONS };

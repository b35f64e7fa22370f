/**
 * @fileoverview Constantes de validación: límites numéricos y mensajes de error de validación.
 * @module constants/validations
 *
 * Usado en schemas Zod y en utils/validation.
 */

// =====================
// LÍMITES NUMÉRICOS
// =====================

/** Longitud máxima de una ruta de destino. */
export const MAX_PATH_LENGTH = 4096;

/** Longitud máxima de una URL aceptada por enqueue. */
export const MAX_URL_LENGTH = 8192;

/** Límite superior de descargas simultáneas configurable. */
export const MAX_PARALLEL_LIMIT = 64;

// =====================
// VALIDACIONES DE ID
// =====================

const ID_VALIDATIONS = {
  MUST_BE_INTEGER: 'El ID debe ser un número entero',
  MUST_BE_POSITIVE: 'El ID debe ser positivo',
} as const;

// =====================
// VALIDACIONES DE URL / RUTA
// =====================

const URL_VALIDATIONS = {
  CANNOT_BE_EMPTY: 'La URL no puede estar vacía',
  TOO_LONG: 'La URL es demasiado larga',
  MUST_BE_ABSOLUTE: 'La URL debe ser absoluta con esquema http o https',
} as const;

const PATH_VALIDATIONS = {
  CANNOT_BE_EMPTY: 'La ruta de destino no puede estar vacía',
  TOO_LONG: 'La ruta es demasiado larga',
  NULL_BYTE: 'La ruta contiene caracteres nulos',
} as const;

// =====================
// VALIDACIONES DE CHECKSUM
// =====================

const CHECKSUM_VALIDATIONS = {
  UNSUPPORTED_ALGORITHM: 'Algoritmo no soportado (md5, sha1, sha256, sha384, sha512)',
  INVALID_HEX: 'El checksum debe ser hexadecimal',
  INVALID_LENGTH: 'La longitud del checksum no corresponde al algoritmo',
  INVALID_FORMAT: 'Formato esperado <algoritmo>:<hex>',
} as const;

// =====================
// VALIDACIONES DE CONFIGURACIÓN
// =====================

const SETTINGS_VALIDATIONS = {
  MAX_PARALLEL_RANGE: `maxParallel debe estar entre 1 y ${MAX_PARALLEL_LIMIT}`,
  RATE_NON_NEGATIVE: 'La tasa debe ser un número de bytes/s mayor o igual a 0',
  POSITIVE_INTERVAL: 'Los intervalos deben ser mayores a 0',
} as const;

// =====================
// GENÉRICOS
// =====================

const GENERIC_VALIDATIONS = {
  VALIDATION_ERROR: 'Error de validación',
} as const;

export const VALIDATIONS = {
  ID: ID_VALIDATIONS,
  URL: URL_VALIDATIONS,
  PATH: PATH_VALIDATIONS,
  CHECKSUM: CHECKSUM_VALIDATIONS,
  SETTINGS: SETTINGS_VALIDATIONS,
  GENERIC: GENERIC_VALIDATIONS,
} as const;

export default VALIDATIONS;

/** Longitud en caracteres hex del digest de cada algoritmo soportado. */
export const CHECKSUM_HEX_LENGTHS = Object.freeze({
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha384: 96,
  sha512: 128,
} as const);

export const CHECKSUM_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha384', 'sha512'] as const;

/**
 * Códigos de resultado que el motor expone a la capa de presentación.
 * @module shared/constants/resultCodes
 *
 * Cada categoría de fallo tiene su propio código para que quien consuma el motor
 * pueda informar de forma específica (red, verificación, sistema de archivos...).
 */

export const ResultCode = Object.freeze({
  SUCCESS: 'success',
  NETWORK_FAILURE: 'network_failure',
  PROTOCOL_FAILURE: 'protocol_failure',
  VERIFICATION_FAILURE: 'verification_failure',
  FILESYSTEM_FAILURE: 'filesystem_failure',
  CANCELLED: 'cancelled',
} as const);

export type ResultCodeValue = (typeof ResultCode)[keyof typeof ResultCode];

/** Equivalente estilo exit code de cada resultado (0 = éxito). */
export const EXIT_CODES: Readonly<Record<ResultCodeValue, number>> = Object.freeze({
  success: 0,
  network_failure: 2,
  verification_failure: 3,
  filesystem_failure: 4,
  protocol_failure: 5,
  cancelled: 6,
});

export function toExitCode(code: ResultCodeValue | null | undefined): number {
  if (!code) return 1;
  return EXIT_CODES[code];
}

export function isResultCode(value: unknown): value is ResultCodeValue {
  return typeof value === 'string' && Object.values(ResultCode).some(code => code === value);
}

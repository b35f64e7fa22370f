/**
 * @fileoverview Clases de error del motor de descargas.
 * @module utils/errors
 *
 * DownloadError: fallo de una transferencia, con código de resultado y si admite reintento.
 * StateStoreError: fallos del documento de estado.
 * EngineCommandError: comandos de la fachada rechazados (ID inexistente, transición inválida...).
 */

import { types } from 'util';
import { ResultCode, type ResultCodeValue } from '../../shared/constants/resultCodes';

export class DownloadError extends Error {
  readonly code: ResultCodeValue;
  readonly retryable: boolean;
  /** Espera pedida por el servidor (Retry-After), si la hubo. */
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    code: ResultCodeValue,
    options: { retryable?: boolean; cause?: unknown; retryAfterMs?: number | null } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'DownloadError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  static network(message: string, cause?: unknown, retryAfterMs?: number | null): DownloadError {
    return new DownloadError(message, ResultCode.NETWORK_FAILURE, {
      retryable: true,
      cause,
      retryAfterMs,
    });
  }

  static protocol(message: string, cause?: unknown): DownloadError {
    return new DownloadError(message, ResultCode.PROTOCOL_FAILURE, { cause });
  }

  static verification(message: string): DownloadError {
    return new DownloadError(message, ResultCode.VERIFICATION_FAILURE);
  }

  static filesystem(message: string, cause?: unknown): DownloadError {
    return new DownloadError(message, ResultCode.FILESYSTEM_FAILURE, { cause });
  }

  static cancelled(message: string): DownloadError {
    return new DownloadError(message, ResultCode.CANCELLED);
  }
}

export type StateStoreErrorCode =
  | 'UPGRADE_REQUIRED'
  | 'LOCK_FAILED'
  | 'WRITE_FAILED'
  | 'INVALID_DOCUMENT'
  | 'MIGRATION_MISSING';

export class StateStoreError extends Error {
  readonly code: StateStoreErrorCode;

  constructor(message: string, code: StateStoreErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = 'StateStoreError';
    this.code = code;
  }
}

export type EngineCommandErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'RETRY_BUDGET_EXHAUSTED'
  | 'INVALID_ARGUMENT'
  | 'DUPLICATE_OUTPUT_PATH'
  | 'NOT_INITIALIZED'
  | 'ENGINE_CLOSED';

export class EngineCommandError extends Error {
  readonly code: EngineCommandErrorCode;

  constructor(message: string, code: EngineCommandErrorCode) {
    super(message);
    this.name = 'EngineCommandError';
    this.code = code;
  }
}

/**
 * true para cualquier Error, también los creados en otro contexto de vm (los de fs, timers
 * o AbortSignal bajo Jest no heredan del Error del sandbox). DOMException no es un error
 * nativo, así que se acepta por forma: name y message string.
 */
export function isError(value: unknown): value is Error {
  if (value instanceof Error || types.isNativeError(value)) return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'message' in value &&
    typeof value.name === 'string' &&
    typeof value.message === 'string'
  );
}

/** Extrae el code de un error de Node (ErrnoException) si existe. */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return isError(error) && (error.name === 'AbortError' || getErrorCode(error) === 'ABORT_ERR');
}

/**
 * Clasificación de errores y utilidades de reintento del motor de descargas.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, ETIMEDOUT, etc.).
 * isFilesystemError: errores de disco que llevan a filesystem_failure sin reintentar.
 * toDownloadError: normaliza cualquier error a DownloadError con su código de resultado.
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 * calculateBackoffDelay: delay exponencial según retryCount y config (1 s, 2 s, 4 s...).
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import { DownloadError, getErrorCode, getErrorMessage, isAbortError } from '../utils/errors';
import { ERRORS } from '../constants/errors';

const TRANSIENT_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'ERR_STREAM_PREMATURE_CLOSE',
  'UND_ERR_SOCKET',
];

const FILESYSTEM_ERROR_CODES: readonly string[] = [
  'EACCES',
  'EPERM',
  'ENOSPC',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EMFILE',
  'EDQUOT',
];

/** Indica si el error es de red transitorio (reintento razonable). */
export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof DownloadError) return error.retryable;
  const errorCode = getErrorCode(error);
  if (errorCode && TRANSIENT_ERROR_CODES.includes(errorCode)) {
    return true;
  }
  const message = getErrorMessage(error);
  return message.includes('socket hang up') || message.includes('aborted');
}

export function isFilesystemError(error: unknown): boolean {
  const errorCode = getErrorCode(error);
  return errorCode !== undefined && FILESYSTEM_ERROR_CODES.includes(errorCode);
}

/**
 * Normaliza un error a DownloadError. Los errores de red desconocidos se tratan como
 * transitorios; los de disco no se reintentan.
 */
export function toDownloadError(error: unknown): DownloadError {
  if (error instanceof DownloadError) return error;
  if (isAbortError(error)) {
    return DownloadError.cancelled(ERRORS.DOWNLOAD.CANCELLED);
  }
  if (isFilesystemError(error)) {
    return DownloadError.filesystem(
      `${ERRORS.FILE.WRITE_FAILED}: ${getErrorCode(error)}: ${getErrorMessage(error)}`,
      error
    );
  }
  const code = getErrorCode(error);
  const message = getErrorMessage(error);
  return DownloadError.network(code ? `${code}: ${message}` : message, error);
}

export interface ParseRetryAfterOptions {
  maxMs?: number;
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms o null. */
export function parseRetryAfter(
  retryAfter: string | string[] | undefined,
  opts: ParseRetryAfterOptions = {}
): number | null {
  if (!retryAfter || typeof retryAfter !== 'string') return null;
  const max = opts.maxMs ?? config.network.maxRetryDelay;
  const s = retryAfter.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, max);
  }
  const date = new Date(s);
  if (!Number.isNaN(date.getTime())) {
    const ms = date.getTime() - Date.now();
    return ms > 0 ? Math.min(ms, max) : null;
  }
  return null;
}

export interface BackoffOptions {
  retryDelay?: number;
  maxRetryDelay?: number;
}

/** Calcula delay de reintento en ms: retryDelay * 2^retryCount acotado por maxRetryDelay. */
export function calculateBackoffDelay(retryCount: number, opts: BackoffOptions = {}): number {
  const baseDelay = opts.retryDelay ?? config.network.retryDelay;
  const maxDelay = opts.maxRetryDelay ?? config.network.maxRetryDelay;
  const exponentialDelay = baseDelay * Math.pow(2, Math.max(0, retryCount));
  return Math.min(exponentialDelay, maxDelay);
}

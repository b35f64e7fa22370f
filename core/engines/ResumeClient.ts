/**
 * Cliente HTTP de reanudación: una petición GET (con Range si hay offset) volcada al
 * archivo parcial.
 *
 * transfer: envía `Range: bytes=<offset>-` cuando offset > 0 e interpreta la respuesta:
 * 206 valida Content-Range y añade al parcial; 200 a una petición con rango trunca y
 * empieza de cero; 416 con parcial significa que ya estaba completo. Sigue redirecciones
 * hasta network.maxRedirects. El cuerpo pasa por el throttle (si lo hay) con backpressure
 * y el progreso se notifica como mucho cada progressUpdateInterval ms.
 *
 * Los errores de E/S del stream dejan el parcial en disco y vuelven como DownloadError
 * reintentable; los de protocolo no se reintentan.
 *
 * @module engines/ResumeClient
 */

import http, { type ClientRequest, type IncomingMessage } from 'http';
import https from 'https';
import fsSync from 'fs';
import path from 'path';
import { Transform, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import config from '../config';
import { logger } from '../utils/logger';
import { DownloadError } from '../utils/errors';
import { createThrottle, type RateLimiter } from '../utils/rateLimiter';
import { ensureDirectory } from '../utils/fileHelpers';
import { ERRORS } from '../constants/errors';
import { parseRetryAfter, toDownloadError } from './DownloadValidator';

const log = logger.child('ResumeClient');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface TransferRequest {
  downloadId: number;
  url: string;
  partialPath: string;
  /** Bytes ya presentes en el parcial. */
  offset: number;
  limiters?: RateLimiter[];
  signal?: AbortSignal;
  onProgress?: (_bytesTransferred: number, _totalBytes: number) => void;
}

export interface TransferOutcome {
  bytesTransferred: number;
  totalBytes: number;
  /** El servidor respondió 416: el parcial ya contenía el recurso completo. */
  alreadyComplete: boolean;
  /** El servidor ignoró el rango y se reescribió desde cero. */
  restarted: boolean;
}

export interface ResumeClientOptions {
  responseTimeout?: number;
  idleTimeout?: number;
  maxRedirects?: number;
  userAgent?: string;
  progressUpdateInterval?: number;
}

export interface ContentRange {
  start: number;
  end: number;
  /** -1 si el servidor envía `*`. */
  total: number;
}

/** Parsea `bytes <start>-<end>/<total|*>`; null si el formato no es válido. */
export function parseContentRange(header: string | undefined): ContentRange | null {
  if (!header) return null;
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) return null;
  const start = Number(match[1]);
  const end = Number(match[2]);
  const total = match[3] === '*' ? -1 : Number(match[3]);
  if (end < start || (total >= 0 && end >= total)) return null;
  return { start, end, total };
}

/** Total de un `Content-Range: bytes *\/<total>` (respuesta 416), o -1. */
function parseUnsatisfiedRangeTotal(header: string | undefined): number {
  if (!header) return -1;
  const match = /^bytes\s+\*\/(\d+)$/i.exec(header.trim());
  return match ? Number(match[1]) : -1;
}

function parseContentLength(header: string | undefined): number {
  if (!header || !/^\d+$/.test(header.trim())) return -1;
  return Number(header.trim());
}

export class ResumeClient {
  private readonly options: Required<ResumeClientOptions>;

  constructor(options: ResumeClientOptions = {}) {
    this.options = {
      responseTimeout: options.responseTimeout ?? config.network.responseTimeout,
      idleTimeout: options.idleTimeout ?? config.network.idleTimeout,
      maxRedirects: options.maxRedirects ?? config.network.maxRedirects,
      userAgent: options.userAgent ?? config.network.userAgent,
      progressUpdateInterval:
        options.progressUpdateInterval ?? config.downloads.progressUpdateInterval,
    };
  }

  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    const { downloadId, partialPath, signal } = request;
    let offset = request.offset;

    const { req, res } = await this.openFollowingRedirects(
      new URL(request.url),
      offset,
      signal,
      this.options.maxRedirects
    );

    const status = res.statusCode ?? 0;

    if (status === 416) {
      res.resume();
      return this.handleRangeNotSatisfiable(downloadId, offset, res);
    }

    let totalBytes: number;
    let restarted = false;

    if (status === 206) {
      const range = parseContentRange(res.headers['content-range']);
      if (!range) {
        res.destroy();
        throw DownloadError.protocol(
          `${ERRORS.PROTOCOL.INVALID_CONTENT_RANGE}: ${res.headers['content-range'] ?? '(ausente)'}`
        );
      }
      if (range.start !== offset) {
        res.destroy();
        throw DownloadError.protocol(
          `${ERRORS.PROTOCOL.RANGE_OFFSET_MISMATCH}: pedido ${offset}, recibido ${range.start}`
        );
      }
      totalBytes = range.total;
    } else if (status === 200) {
      if (offset > 0) {
        log.info(`Descarga ${downloadId}: el servidor ignoró Range; se reinicia desde 0`);
        restarted = true;
        offset = 0;
      }
      totalBytes = parseContentLength(res.headers['content-length']);
    } else {
      res.resume();
      const retryAfterMs =
        status === 429 || status === 503 ? parseRetryAfter(res.headers['retry-after']) : null;
      throw DownloadError.network(`${ERRORS.NETWORK.HTTP_STATUS}: ${status}`, undefined, retryAfterMs);
    }

    if (totalBytes >= 0 && offset > totalBytes) {
      res.destroy();
      throw DownloadError.protocol(ERRORS.PROTOCOL.BODY_EXCEEDS_TOTAL);
    }

    req.setTimeout(this.options.idleTimeout);
    const received = await this.writeBody(res, {
      ...request,
      offset,
      totalBytes,
      append: offset > 0,
    });

    const bytesTransferred = offset + received;
    if (totalBytes >= 0 && bytesTransferred < totalBytes) {
      throw DownloadError.network(
        `${ERRORS.PROTOCOL.INCOMPLETE_BODY}: ${bytesTransferred}/${totalBytes}`
      );
    }

    return {
      bytesTransferred,
      totalBytes: totalBytes >= 0 ? totalBytes : bytesTransferred,
      alreadyComplete: false,
      restarted,
    };
  }

  private handleRangeNotSatisfiable(
    downloadId: number,
    offset: number,
    res: IncomingMessage
  ): TransferOutcome {
    if (offset === 0) {
      throw DownloadError.protocol(ERRORS.PROTOCOL.UNEXPECTED_416);
    }
    const announcedTotal = parseUnsatisfiedRangeTotal(res.headers['content-range']);
    if (announcedTotal >= 0 && announcedTotal !== offset) {
      throw DownloadError.protocol(
        `${ERRORS.PROTOCOL.UNEXPECTED_416}: parcial de ${offset} bytes, recurso de ${announcedTotal}`
      );
    }
    log.info(`Descarga ${downloadId}: 416 con parcial de ${offset} bytes, ya estaba completa`);
    return {
      bytesTransferred: offset,
      totalBytes: offset,
      alreadyComplete: true,
      restarted: false,
    };
  }

  private async openFollowingRedirects(
    url: URL,
    offset: number,
    signal: AbortSignal | undefined,
    redirectsLeft: number
  ): Promise<{ req: ClientRequest; res: IncomingMessage }> {
    const opened = await this.open(url, offset, signal);
    const status = opened.res.statusCode ?? 0;
    if (!REDIRECT_STATUSES.has(status)) {
      return opened;
    }

    opened.res.resume();
    const location = opened.res.headers.location;
    if (!location) {
      throw DownloadError.protocol(`${ERRORS.DOWNLOAD.REDIRECT_WITHOUT_LOCATION} (${status})`);
    }
    if (redirectsLeft <= 0) {
      throw DownloadError.protocol(ERRORS.DOWNLOAD.TOO_MANY_REDIRECTS);
    }
    const target = new URL(location, url);
    log.debug(`Redirección ${status}: ${url.href} -> ${target.href}`);
    return this.openFollowingRedirects(target, offset, signal, redirectsLeft - 1);
  }

  private open(
    url: URL,
    offset: number,
    signal: AbortSignal | undefined
  ): Promise<{ req: ClientRequest; res: IncomingMessage }> {
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return Promise.reject(DownloadError.protocol(`${ERRORS.COMMAND.INVALID_URL}: ${url.href}`));
    }
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      'Accept-Encoding': 'identity',
    };
    if (offset > 0) {
      headers.Range = `bytes=${offset}-`;
    }

    return new Promise<{ req: ClientRequest; res: IncomingMessage }>((resolve, reject) => {
      let response: IncomingMessage | null = null;
      const requestOptions = { method: 'GET', headers, signal };
      const req =
        url.protocol === 'https:'
          ? https.request(url, requestOptions)
          : http.request(url, requestOptions);

      req.setTimeout(this.options.responseTimeout, () => {
        const timeoutError = Object.assign(new Error(ERRORS.NETWORK.TIMEOUT), {
          code: 'ETIMEDOUT',
        });
        req.destroy(timeoutError);
      });

      req.on('error', error => {
        if (response) {
          response.destroy(error);
        } else {
          reject(error);
        }
      });

      req.on('response', res => {
        response = res;
        resolve({ req, res });
      });

      req.end();
    }).catch((error: unknown) => {
      if (signal?.aborted) throw error;
      throw toDownloadError(error);
    });
  }

  private async writeBody(
    res: IncomingMessage,
    request: TransferRequest & { totalBytes: number; append: boolean }
  ): Promise<number> {
    const { partialPath, signal, onProgress, offset, totalBytes } = request;
    const progressInterval = this.options.progressUpdateInterval;

    try {
      await ensureDirectory(path.dirname(partialPath));
    } catch (error) {
      res.destroy();
      throw toDownloadError(error);
    }

    let received = 0;
    let lastProgressAt = 0;

    const counter = new Transform({
      transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
        received += chunk.length;
        const current = offset + received;
        if (totalBytes >= 0 && current > totalBytes) {
          callback(
            DownloadError.protocol(`${ERRORS.PROTOCOL.BODY_EXCEEDS_TOTAL}: ${current}/${totalBytes}`)
          );
          return;
        }
        const now = Date.now();
        if (onProgress && now - lastProgressAt >= progressInterval) {
          lastProgressAt = now;
          onProgress(current, totalBytes);
        }
        callback(null, chunk);
      },
    });

    const fileStream = fsSync.createWriteStream(partialPath, { flags: request.append ? 'a' : 'w' });
    const stages: Array<NodeJS.ReadableStream | NodeJS.WritableStream | NodeJS.ReadWriteStream> = [
      res,
    ];
    if (request.limiters && request.limiters.length > 0) {
      stages.push(createThrottle(request.limiters, signal));
    }
    stages.push(counter, fileStream);

    try {
      await pipeline(stages, { signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw toDownloadError(error);
    }

    onProgress?.(offset + received, totalBytes);
    return received;
  }
}

export default ResumeClient;

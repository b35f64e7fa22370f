/**
 * Ejecuta una descarga ya admitida (estado downloading) hasta un estado estable.
 *
 * Intentos con backoff exponencial para errores de red; los de protocolo, disco y
 * verificación fallan sin reintentar. Con la transferencia completa pasa a verifying,
 * comprueba el checksum (si lo hay) y solo entonces renombra el parcial al destino final.
 * Si el checksum no coincide el parcial se conserva tal cual. Al abortarse la sesión
 * lleva el item a paused, cancelled o queued según el motivo.
 *
 * @module engines/TransferRunner
 */

import { promises as fs } from 'fs';
import path from 'path';
import config from '../config';
import { logger } from '../utils/logger';
import { delay, type RateLimiter } from '../utils/rateLimiter';
import { formatBytes, getFileSize, getPartialPath, safeUnlink } from '../utils/fileHelpers';
import { DownloadError, getErrorMessage } from '../utils/errors';
import { ERRORS } from '../constants/errors';
import { ResultCode } from '../../shared/constants/resultCodes';
import { calculateBackoffDelay, toDownloadError } from './DownloadValidator';
import type { EventBus } from './EventBus';
import type { ResumeClient, TransferOutcome } from './ResumeClient';
import type { SessionHandle, SessionManager } from './SessionManager';
import type { StateStore } from './StateStore';
import type Verifier from './Verifier';
import {
  DownloadState,
  type AbortReason,
  type DownloadItem,
  type DownloadItemUpdates,
  type DownloadStatus,
} from './types';

const log = logger.child('TransferRunner');

export interface TransferRunnerDeps {
  stateStore: StateStore;
  eventBus: EventBus;
  resumeClient: ResumeClient;
  verifier: Verifier;
  sessionManager: SessionManager;
}

export interface TransferRunnerOptions {
  maxRetries?: number;
  retryDelay?: number;
  maxRetryDelay?: number;
  partialSuffix?: string;
}

export interface RunOutcome {
  downloadId: number;
  /** Estado final; null si el item desapareció durante la ejecución. */
  status: DownloadStatus | null;
}

class SessionAborted extends Error {
  constructor() {
    super(ERRORS.DOWNLOAD.INTERRUPTED);
    this.name = 'SessionAborted';
  }
}

export class TransferRunner {
  private readonly deps: TransferRunnerDeps;
  private readonly options: Required<TransferRunnerOptions>;

  constructor(deps: TransferRunnerDeps, options: TransferRunnerOptions = {}) {
    this.deps = deps;
    this.options = {
      maxRetries: options.maxRetries ?? config.downloads.maxRetries,
      retryDelay: options.retryDelay ?? config.network.retryDelay,
      maxRetryDelay: options.maxRetryDelay ?? config.network.maxRetryDelay,
      partialSuffix: options.partialSuffix ?? config.downloads.partialSuffix,
    };
  }

  /**
   * Lleva el item a un estado estable. No rechaza: los errores terminan en failed y los
   * abortos en el estado que corresponda al motivo.
   */
  async run(
    item: DownloadItem,
    session: SessionHandle,
    limiters: RateLimiter[]
  ): Promise<RunOutcome> {
    const { sessionManager } = this.deps;
    const partialPath = getPartialPath(item.outputPath, this.options.partialSuffix);

    try {
      const outcome = await this.transferWithRetries(item, partialPath, session, limiters);
      const status = await this.finalize(item, partialPath, outcome, session);
      return { downloadId: item.id, status };
    } catch (error) {
      if (session.signal.aborted) {
        const reason = sessionManager.getAbortReason(item.id) ?? 'shutdown';
        const status = await this.handleAbort(item, partialPath, reason);
        return { downloadId: item.id, status };
      }
      const status = await this.fail(item.id, toDownloadError(error));
      return { downloadId: item.id, status };
    } finally {
      sessionManager.invalidate(item.id, session.sessionId);
    }
  }

  private async transferWithRetries(
    item: DownloadItem,
    partialPath: string,
    session: SessionHandle,
    limiters: RateLimiter[]
  ): Promise<TransferOutcome> {
    const { stateStore, eventBus, resumeClient } = this.deps;
    const { signal } = session;

    for (let attempt = 0; ; attempt++) {
      signal.throwIfAborted();
      const offset = (await getFileSize(partialPath)) ?? 0;
      await stateStore.updateDownload(item.id, {
        attempts: attempt + 1,
        bytesTransferred: offset,
      });
      if (offset > 0) {
        log.info(`Descarga ${item.id}: reanudando desde byte ${offset} (intento ${attempt + 1})`);
      }

      try {
        return await resumeClient.transfer({
          downloadId: item.id,
          url: item.url,
          partialPath,
          offset,
          limiters,
          signal,
          onProgress: (bytesTransferred, totalBytes) => {
            stateStore.updateProgress(item.id, bytesTransferred, totalBytes);
            eventBus.emitDownloadProgress(item.id, bytesTransferred, totalBytes);
          },
        });
      } catch (error) {
        if (signal.aborted) throw error;
        const downloadError = toDownloadError(error);
        if (!downloadError.retryable || attempt >= this.options.maxRetries) {
          if (downloadError.retryable) {
            throw new DownloadError(
              `${ERRORS.DOWNLOAD.MULTIPLE_RETRIES_FAILED} (${attempt + 1}): ${downloadError.message}`,
              downloadError.code,
              { cause: downloadError }
            );
          }
          throw downloadError;
        }
        const waitMs =
          downloadError.retryAfterMs ??
          calculateBackoffDelay(attempt, {
            retryDelay: this.options.retryDelay,
            maxRetryDelay: this.options.maxRetryDelay,
          });
        log.warn(
          `Descarga ${item.id}: intento ${attempt + 1} fallido (${downloadError.message}); reintento en ${waitMs}ms`
        );
        await stateStore.updateDownload(item.id, { lastError: downloadError.message });
        await delay(waitMs, signal);
      }
    }
  }

  private async finalize(
    item: DownloadItem,
    partialPath: string,
    outcome: TransferOutcome,
    session: SessionHandle
  ): Promise<DownloadStatus | null> {
    const { stateStore, eventBus, verifier, sessionManager } = this.deps;

    session.signal.throwIfAborted();
    await stateStore.transitionState(item.id, DownloadState.VERIFYING, {
      from: DownloadState.DOWNLOADING,
      updates: {
        bytesTransferred: outcome.bytesTransferred,
        totalBytes: outcome.totalBytes,
        lastError: null,
      },
    });

    const checksum = item.checksum;
    if (checksum) {
      eventBus.emitVerificationStarted(item.id, checksum.algorithm);
      // pause y cancel no interrumpen la verificación; solo el cierre del motor.
      const result = await verifier.verifyChecksum(partialPath, checksum);
      if (sessionManager.getAbortReason(item.id) === 'shutdown') {
        throw new SessionAborted();
      }
      if (!result.valid) {
        const message = result.error
          ? `${ERRORS.VERIFICATION.VERIFY_FAILED}: ${result.error}`
          : `${ERRORS.VERIFICATION.CHECKSUM_MISMATCH}: ${checksum.algorithm} esperado ${result.expectedHex}, obtenido ${result.actualHex ?? '-'}`;
        return this.fail(item.id, DownloadError.verification(message));
      }
    }

    try {
      await fs.mkdir(path.dirname(item.outputPath), { recursive: true });
      await fs.rename(partialPath, item.outputPath);
    } catch (error) {
      return this.fail(
        item.id,
        DownloadError.filesystem(`${ERRORS.FILE.RENAME_FAILED}: ${getErrorMessage(error)}`, error)
      );
    }

    const updates: DownloadItemUpdates = {
      completedAt: Date.now(),
      resultCode: ResultCode.SUCCESS,
      lastError: null,
    };
    if (checksum) {
      updates.checksum = { ...checksum, verified: true };
    }
    await stateStore.transitionState(item.id, DownloadState.COMPLETED, {
      from: DownloadState.VERIFYING,
      updates,
    });
    log.info(`Descarga ${item.id} completada: ${item.outputPath} (${formatBytes(outcome.totalBytes)})`);
    eventBus.emitDownloadCompleted(item.id, item.outputPath);
    return DownloadState.COMPLETED;
  }

  /** Lleva el item a failed registrando el error; devuelve el estado final. */
  private async fail(id: number, error: DownloadError): Promise<DownloadStatus | null> {
    const { stateStore, eventBus } = this.deps;
    const current = stateStore.getDownload(id);
    if (!current) return null;
    if (!stateStore.canTransition(current.status, DownloadState.FAILED)) {
      log.warn(`Descarga ${id}: no se puede marcar como fallida desde ${current.status}`);
      return current.status;
    }
    await stateStore.transitionState(id, DownloadState.FAILED, {
      updates: { lastError: error.message, resultCode: error.code },
    });
    log.error(`Descarga ${id} fallida [${error.code}]: ${error.message}`);
    eventBus.emitDownloadFailed(id, error, error.code);
    return DownloadState.FAILED;
  }

  private async handleAbort(
    item: DownloadItem,
    partialPath: string,
    reason: AbortReason
  ): Promise<DownloadStatus | null> {
    const { stateStore } = this.deps;
    const current = stateStore.getDownload(item.id);
    if (!current) return null;

    const partialSize = (await getFileSize(partialPath)) ?? 0;
    const target: DownloadStatus =
      reason === 'pause'
        ? DownloadState.PAUSED
        : reason === 'cancel'
          ? DownloadState.CANCELLED
          : DownloadState.QUEUED;

    if (!stateStore.canTransition(current.status, target)) {
      // verifying interrumpido por cierre: se recupera a queued en el próximo arranque.
      log.info(`Descarga ${item.id} interrumpida en ${current.status} (${reason})`);
      await stateStore.flush();
      return current.status;
    }

    if (reason === 'cancel') {
      await stateStore.transitionState(item.id, target, {
        updates: { bytesTransferred: 0, resultCode: ResultCode.CANCELLED, lastError: null },
      });
      await safeUnlink(partialPath);
      log.info(`Descarga ${item.id} cancelada; parcial eliminado`);
      return target;
    }

    await stateStore.transitionState(item.id, target, {
      updates: { bytesTransferred: partialSize },
    });
    log.info(`Descarga ${item.id} ${reason === 'pause' ? 'pausada' : 'devuelta a la cola'} en ${partialSize} bytes`);
    return target;
  }
}

export default TransferRunner;

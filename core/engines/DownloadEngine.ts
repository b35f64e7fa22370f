/**
 * Fachada del motor de descargas: orquesta StateStore, Scheduler, SessionManager,
 * TransferRunner y EventBus.
 *
 * - Cola persistente en StateStore (documento JSON versionado).
 * - processQueue admite items `queued` por orden de id mientras el Scheduler tenga hueco;
 *   corre bajo un guard single-flight y cada admisión cambia el estado en memoria antes
 *   de ceder el control, así el recuento de activos nunca supera maxParallel.
 * - pause/cancel abortan la sesión del item y esperan a que su runner termine.
 * - Rate limit en dos ámbitos combinables: un bucket global compartido y uno por item.
 *
 * @module DownloadEngine
 */

import path from 'path';
import { createConfig } from '../config';
import type { AppConfig } from '../config.d';
import { logger } from '../utils/logger';
import { EngineCommandError, getErrorMessage } from '../utils/errors';
import { getPartialPath, renameIfExists, safeUnlink } from '../utils/fileHelpers';
import { RateLimiter } from '../utils/rateLimiter';
import { validateRateLimitSettings } from '../utils/schemas';
import { validateDownloadId, validateEnqueueParams } from '../utils/validation';
import { ERRORS } from '../constants/errors';
import { formatPurgeSummary } from '../constants/messages';
import { ResultCode } from '../../shared/constants/resultCodes';
import { getStateOrder } from '../../shared/constants/queueStateOrder';
import type { ManifestEntry } from '../../shared/types';
import { EventBus } from './EventBus';
import ResumeClient from './ResumeClient';
import Scheduler from './Scheduler';
import SessionManager from './SessionManager';
import { StateStore, type LoadResult, type SnapshotSummary } from './StateStore';
import { TransferRunner, type RunOutcome } from './TransferRunner';
import Verifier, { isWeakAlgorithm } from './Verifier';
import {
  DownloadState,
  type ChecksumSpec,
  type DownloadItem,
  type DownloadItemUpdates,
  type ListFilter,
} from './types';

const log = logger.child('DownloadEngine');

/** Dependencias inyectables (tests o composición propia). */
export interface DownloadEngineDeps {
  config?: AppConfig;
  stateStore?: StateStore;
  eventBus?: EventBus;
  sessionManager?: SessionManager;
  scheduler?: Scheduler;
  resumeClient?: ResumeClient;
  verifier?: Verifier;
}

export interface RateLimitSettings {
  globalBytesPerSecond?: number;
  perItemBytesPerSecond?: number;
  burstBytes?: number | null;
}

export interface ListOptions {
  /** Activas primero y completadas al final; a igualdad de estado, por id. */
  orderByState?: boolean;
}

export interface PurgeResult {
  items: number;
  partials: number;
}

export class DownloadEngine {
  readonly config: AppConfig;
  readonly eventBus: EventBus;
  readonly stateStore: StateStore;
  readonly sessionManager: SessionManager;
  readonly scheduler: Scheduler;
  readonly verifier: Verifier;
  readonly resumeClient: ResumeClient;

  private readonly runner: TransferRunner;
  private readonly globalLimiter: RateLimiter;
  private readonly itemLimiters = new Map<number, RateLimiter>();
  private readonly running = new Map<number, Promise<RunOutcome>>();
  private perItemBytesPerSecond: number;
  private burstBytes: number | null;

  private loadResult: LoadResult | null = null;
  private isProcessing = false;
  private purging = false;
  private closed = false;
  private processingInterval: ReturnType<typeof setInterval> | null = null;
  private _processQueueTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(deps: DownloadEngineDeps = {}) {
    const cfg = deps.config ?? createConfig();
    this.config = cfg;
    this.eventBus = deps.eventBus ?? new EventBus();
    this.stateStore =
      deps.stateStore ??
      new StateStore({
        statePath: path.join(cfg.paths.stateDir, cfg.paths.stateFileName),
        progressFlushInterval: cfg.downloads.progressFlushInterval,
        lockRetries: cfg.timing.lockRetries,
        lockRetryMinTimeout: cfg.timing.lockRetryMinTimeout,
        lockStaleMs: cfg.timing.lockStaleMs,
        onCorruption: info => {
          this.eventBus.emitStateRecovered(info.statePath, info.corruptPath, info.reason);
        },
      });
    this.sessionManager = deps.sessionManager ?? new SessionManager();
    this.scheduler = deps.scheduler ?? new Scheduler(cfg.downloads.maxParallel);
    this.verifier = deps.verifier ?? new Verifier(cfg.downloads.verifyBufferSize);
    this.resumeClient =
      deps.resumeClient ??
      new ResumeClient({
        responseTimeout: cfg.network.responseTimeout,
        idleTimeout: cfg.network.idleTimeout,
        maxRedirects: cfg.network.maxRedirects,
        userAgent: cfg.network.userAgent,
        progressUpdateInterval: cfg.downloads.progressUpdateInterval,
      });

    this.perItemBytesPerSecond = cfg.rateLimit.perItemBytesPerSecond;
    this.burstBytes = cfg.rateLimit.burstBytes;
    this.globalLimiter = new RateLimiter(cfg.rateLimit.globalBytesPerSecond, this.burstBytes);

    this.runner = new TransferRunner(
      {
        stateStore: this.stateStore,
        eventBus: this.eventBus,
        resumeClient: this.resumeClient,
        verifier: this.verifier,
        sessionManager: this.sessionManager,
      },
      {
        maxRetries: cfg.downloads.maxRetries,
        retryDelay: cfg.network.retryDelay,
        maxRetryDelay: cfg.network.maxRetryDelay,
        partialSuffix: cfg.downloads.partialSuffix,
      }
    );
  }

  get isInitialized(): boolean {
    return this.loadResult !== null && !this.closed;
  }

  /** Descargas con un runner en marcha (downloading o verifying). */
  get activeCount(): number {
    return this.running.size;
  }

  /**
   * Carga (o crea, migra o recupera) el documento de estado, devuelve a la cola lo que
   * quedó a medias y arranca el procesamiento periódico de la cola.
   */
  async initialize(): Promise<LoadResult> {
    if (this.closed) {
      throw new EngineCommandError(ERRORS.GENERAL.ENGINE_CLOSED, 'ENGINE_CLOSED');
    }
    if (this.loadResult) return this.loadResult;

    log.info('Inicializando DownloadEngine...');
    const result = await this.stateStore.initialize();

    this.stateStore.setTransitionHooks({
      onEnter: (id, toState, fromState) => {
        this.eventBus.emitStateChanged(id, fromState, toState);
      },
    });

    this.loadResult = result;
    const summary = this.stateStore.getSummary();
    log.info(
      `DownloadEngine inicializado: ${summary.total} descargas (${summary.queued} en cola, ${summary.paused} pausadas)`
    );
    this.startQueueProcessing();
    return result;
  }

  /** Inicia el intervalo que llama a processQueue periódicamente; idempotente. */
  startQueueProcessing(): void {
    if (this.processingInterval) {
      log.warn('Procesamiento de cola ya está iniciado');
      return;
    }
    const interval = this.config.timing.queueProcessInterval;
    this.processingInterval = setInterval(() => {
      this.processQueue().catch((error: unknown) => {
        log.error('Error procesando cola:', getErrorMessage(error));
      });
    }, interval);
    log.debug(`Procesamiento de cola iniciado (intervalo: ${interval}ms)`);
    this._scheduleProcessQueue(0);
  }

  stopQueueProcessing(): void {
    if (this.processingInterval) {
      clearInterval(this.processingInterval);
      this.processingInterval = null;
    }
    if (this._processQueueTimer) {
      clearTimeout(this._processQueueTimer);
      this._processQueueTimer = null;
    }
  }

  /** processQueue diferido; si ya hay uno pendiente no se programa otro. */
  private _scheduleProcessQueue(delayMs = 100): void {
    if (this.closed || this._processQueueTimer) return;
    this._processQueueTimer = setTimeout(() => {
      this._processQueueTimer = null;
      this.processQueue().catch((error: unknown) => {
        log.error('[scheduleProcessQueue] Error en procesamiento programado:', getErrorMessage(error));
      });
    }, delayMs);
  }

  /**
   * Admite descargas en cola mientras haya hueco. Devuelve cuántas arrancó.
   */
  async processQueue(): Promise<number> {
    if (this.closed || this.purging || !this.loadResult) return 0;
    if (this.isProcessing) {
      log.debug('[processQueue] Saltando: ya se está procesando la cola');
      return 0;
    }

    this.isProcessing = true;
    try {
      const candidates = this.scheduler.selectDownloadsToStart(this.stateStore.listDownloads());
      let started = 0;
      for (const item of candidates) {
        if (this.closed) break;
        this.startDownload(item);
        started++;
      }
      if (started > 0) {
        log.debug(`[processQueue] ${started} descarga(s) admitida(s)`);
      }
      return started;
    } finally {
      this.isProcessing = false;
    }
  }

  /**
   * queued → downloading y lanza el runner. La sesión se crea antes de la transición
   * para que un pause o cancel que llegue durante la escritura ya encuentre su señal.
   */
  private startDownload(item: DownloadItem): void {
    const session = this.sessionManager.createSession(item.id);
    const itemLimiter = new RateLimiter(this.perItemBytesPerSecond, this.burstBytes);
    this.itemLimiters.set(item.id, itemLimiter);

    const admission = this.stateStore.transitionState(item.id, DownloadState.DOWNLOADING, {
      from: DownloadState.QUEUED,
      updates: { attempts: 0, resultCode: null },
    });

    const task: Promise<RunOutcome> = admission
      .then(admitted => this.runner.run(admitted, session, [this.globalLimiter, itemLimiter]))
      .catch((error: unknown): RunOutcome => {
        this.sessionManager.invalidate(item.id, session.sessionId);
        log.error(`[startDownload] Descarga ${item.id}: ${getErrorMessage(error)}`);
        return { downloadId: item.id, status: this.stateStore.getDownload(item.id)?.status ?? null };
      })
      .finally(() => {
        if (this.running.get(item.id) === task) {
          this.running.delete(item.id);
          this.itemLimiters.delete(item.id);
        }
        this._scheduleProcessQueue(0);
      });

    this.running.set(item.id, task);
  }

  // ---------------------------------------------------------------------------
  // Comandos
  // ---------------------------------------------------------------------------

  private ensureReady(): void {
    if (this.closed) {
      throw new EngineCommandError(ERRORS.GENERAL.ENGINE_CLOSED, 'ENGINE_CLOSED');
    }
    if (!this.loadResult) {
      throw new EngineCommandError(ERRORS.GENERAL.NOT_INITIALIZED, 'NOT_INITIALIZED');
    }
  }

  private requireItem(id: number): DownloadItem {
    const idCheck = validateDownloadId(id);
    if (!idCheck.valid) {
      throw new EngineCommandError(
        `${idCheck.error ?? ERRORS.GENERAL.UNKNOWN}: ${id}`,
        'INVALID_ARGUMENT'
      );
    }
    const item = this.stateStore.getDownload(id);
    if (!item) {
      throw new EngineCommandError(`${ERRORS.COMMAND.NOT_FOUND}: ${id}`, 'NOT_FOUND');
    }
    return item;
  }

  private partialPathOf(item: DownloadItem): string {
    return getPartialPath(item.outputPath, this.config.downloads.partialSuffix);
  }

  /**
   * Añade una descarga a la cola y devuelve su id. `checksum` admite
   * `{ algorithm, expectedHex }` o la notación `"sha256:<hex>"`.
   */
  async enqueue(
    url: string,
    outputPath: string,
    checksum?: ChecksumSpec | string | null
  ): Promise<number> {
    this.ensureReady();
    const validation = validateEnqueueParams(url, outputPath, checksum);
    if (!validation.valid || !validation.data) {
      throw new EngineCommandError(
        validation.error ?? ERRORS.GENERAL.UNKNOWN,
        'INVALID_ARGUMENT'
      );
    }
    const params = validation.data;

    const duplicate = this.stateStore
      .listDownloads()
      .find(
        item =>
          item.outputPath === params.outputPath &&
          item.status !== DownloadState.COMPLETED &&
          item.status !== DownloadState.CANCELLED
      );
    if (duplicate) {
      throw new EngineCommandError(
        `${ERRORS.COMMAND.DUPLICATE_OUTPUT_PATH}: ${params.outputPath} (id ${duplicate.id})`,
        'DUPLICATE_OUTPUT_PATH'
      );
    }

    const item = await this.stateStore.addDownload(params);

    if (params.checksum && isWeakAlgorithm(params.checksum.algorithm)) {
      const message = `${ERRORS.VERIFICATION.WEAK_ALGORITHM}: ${params.checksum.algorithm}`;
      log.warn(`Descarga ${item.id}: ${message}`);
      this.eventBus.emitChecksumWarning(item.id, params.checksum.algorithm, message);
    }

    this._scheduleProcessQueue(0);
    return item.id;
  }

  /**
   * Encola las entradas de un manifiesto en orden. Se detiene en la primera inválida;
   * las anteriores quedan encoladas.
   */
  async enqueueAll(entries: readonly ManifestEntry[]): Promise<number[]> {
    const ids: number[] = [];
    for (const entry of entries) {
      ids.push(await this.enqueue(entry.url, entry.outputPath, entry.checksum));
    }
    return ids;
  }

  list(filter: ListFilter = {}, options: ListOptions = {}): DownloadItem[] {
    const items = this.stateStore.listDownloads(filter);
    if (options.orderByState) {
      items.sort((a, b) => getStateOrder(a.status) - getStateOrder(b.status) || a.id - b.id);
    }
    return items;
  }

  getDownload(id: number): DownloadItem | null {
    return this.stateStore.getDownload(id);
  }

  getSummary(): SnapshotSummary {
    return this.stateStore.getSummary();
  }

  /**
   * Pausa una descarga. En curso: aborta la sesión y espera al runner (el parcial se
   * conserva). En cola: pasa directamente a paused.
   */
  async pause(id: number): Promise<DownloadItem> {
    this.ensureReady();
    const item = this.requireItem(id);
    const task = this.running.get(id);

    if (item.status === DownloadState.DOWNLOADING && task) {
      log.info(`[pause] Pausando descarga ${id}`);
      this.sessionManager.abort(id, 'pause');
      await task;
      return this.requireItem(id);
    }

    return this.stateStore.transitionState(id, DownloadState.PAUSED);
  }

  /**
   * paused o cancelled → queued. Sobre una descarga fallida equivale a retry.
   */
  async resume(id: number): Promise<DownloadItem> {
    this.ensureReady();
    const item = this.requireItem(id);
    if (item.status === DownloadState.FAILED || item.status === DownloadState.CANCELLED) {
      return this.retry(id);
    }
    const resumed = await this.stateStore.transitionState(id, DownloadState.QUEUED, {
      from: DownloadState.PAUSED,
    });
    log.info(`[resume] Descarga ${id} reanudada desde ${resumed.bytesTransferred} bytes`);
    this._scheduleProcessQueue(0);
    return resumed;
  }

  /**
   * Cancela una descarga y borra su parcial. En curso: aborta la sesión y el runner
   * borra el parcial al detenerse.
   */
  async cancel(id: number): Promise<DownloadItem> {
    this.ensureReady();
    const item = this.requireItem(id);
    const task = this.running.get(id);

    if (item.status === DownloadState.DOWNLOADING && task) {
      log.info(`[cancel] Cancelando descarga ${id}`);
      this.sessionManager.abort(id, 'cancel');
      await task;
      return this.requireItem(id);
    }

    const cancelled = await this.stateStore.transitionState(id, DownloadState.CANCELLED, {
      updates: { bytesTransferred: 0, resultCode: ResultCode.CANCELLED, lastError: null },
    });
    await safeUnlink(this.partialPathOf(item));
    log.info(`[cancel] Descarga ${id} cancelada`);
    return cancelled;
  }

  /**
   * Vuelve a encolar una descarga fallida o cancelada. Las fallidas consumen un reintento
   * manual (máximo downloads.maxRetryCommands); las canceladas empiezan de cero. Tras un
   * checksum incorrecto el parcial se aparta como `<parcial>.mismatch` y se descarga de nuevo.
   */
  async retry(id: number): Promise<DownloadItem> {
    this.ensureReady();
    const item = this.requireItem(id);

    const updates: DownloadItemUpdates = { resultCode: null, attempts: 0 };
    if (item.status === DownloadState.FAILED) {
      const limit = this.config.downloads.maxRetryCommands;
      if (item.retryCount >= limit) {
        throw new EngineCommandError(
          `${ERRORS.COMMAND.RETRY_BUDGET_EXHAUSTED} (${item.retryCount}/${limit})`,
          'RETRY_BUDGET_EXHAUSTED'
        );
      }
      updates.retryCount = item.retryCount + 1;
      if (item.resultCode === ResultCode.VERIFICATION_FAILURE) {
        const partialPath = this.partialPathOf(item);
        if (await renameIfExists(partialPath, `${partialPath}.mismatch`)) {
          log.info(`[retry] Descarga ${id}: parcial con checksum incorrecto apartado como .mismatch`);
        }
        updates.bytesTransferred = 0;
      }
    } else if (item.status === DownloadState.CANCELLED) {
      updates.bytesTransferred = 0;
      updates.lastError = null;
    } else {
      throw new EngineCommandError(
        `${ERRORS.COMMAND.INVALID_TRANSITION}: ${item.status} → ${DownloadState.QUEUED}`,
        'INVALID_TRANSITION'
      );
    }

    const queued = await this.stateStore.transitionState(id, DownloadState.QUEUED, {
      from: item.status,
      updates,
    });
    log.info(`[retry] Descarga ${id} reencolada (reintentos manuales: ${queued.retryCount})`);
    this._scheduleProcessQueue(0);
    return queued;
  }

  /**
   * Quita una descarga de la cola. Si está en curso la detiene antes; el parcial se borra
   * salvo que la descarga esté completada (el archivo final nunca se toca).
   */
  async remove(id: number): Promise<DownloadItem> {
    this.ensureReady();
    this.requireItem(id);
    const task = this.running.get(id);
    if (task) {
      this.sessionManager.abort(id, 'cancel');
      await task;
    }

    const current = this.requireItem(id);
    if (current.status !== DownloadState.COMPLETED) {
      await safeUnlink(this.partialPathOf(current));
    }
    return this.stateStore.removeDownload(id);
  }

  /**
   * Detiene todas las descargas, borra todos los parciales y el documento de estado.
   * El contador de ids se conserva mientras el motor siga vivo.
   */
  async purge(): Promise<PurgeResult> {
    this.ensureReady();
    // Sin admisiones hasta vaciar el estado.
    this.purging = true;
    try {
      this.sessionManager.abortAll('shutdown');
      await Promise.all(this.running.values());

      let partials = 0;
      for (const item of this.stateStore.listDownloads()) {
        if (await safeUnlink(this.partialPathOf(item))) {
          partials++;
        }
      }
      const items = await this.stateStore.clear();
      log.info(`[purge] ${formatPurgeSummary(items, partials)}`);
      return { items, partials };
    } finally {
      this.purging = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Ajustes en caliente
  // ---------------------------------------------------------------------------

  /** Cambia el límite de descargas simultáneas; bajarlo no interrumpe las que corren. */
  setMaxParallel(n: number): void {
    this.scheduler.setMaxParallel(n);
    this._scheduleProcessQueue(0);
  }

  /** Ajusta el techo global y/o por item; los buckets de transferencias en curso también. */
  setRateLimit(settings: RateLimitSettings): void {
    const validation = validateRateLimitSettings(settings);
    if (!validation.success || !validation.data) {
      throw new EngineCommandError(
        validation.error ?? ERRORS.GENERAL.UNKNOWN,
        'INVALID_ARGUMENT'
      );
    }
    const { globalBytesPerSecond, perItemBytesPerSecond, burstBytes } = validation.data;

    if (burstBytes !== undefined) {
      this.burstBytes = burstBytes;
    }
    if (globalBytesPerSecond !== undefined || burstBytes !== undefined) {
      this.globalLimiter.setRate(
        globalBytesPerSecond ?? this.globalLimiter.getStats().bytesPerSecond,
        this.burstBytes
      );
    }
    if (perItemBytesPerSecond !== undefined || burstBytes !== undefined) {
      this.perItemBytesPerSecond = perItemBytesPerSecond ?? this.perItemBytesPerSecond;
      for (const limiter of this.itemLimiters.values()) {
        limiter.setRate(this.perItemBytesPerSecond, this.burstBytes);
      }
    }
  }

  /**
   * Espera a que no quede nada que admitir ni en curso. Las descargas pausadas o
   * fallidas no cuentan.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.closed) return;
      if (this.running.size === 0) {
        await this.processQueue();
        if (this.running.size === 0) return;
      }
      await Promise.all(this.running.values());
    }
  }

  /**
   * Detiene el procesamiento y las transferencias en curso (vuelven a queued en el
   * siguiente arranque), vuelca el estado y libera los timers.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stopQueueProcessing();

    const aborted = this.sessionManager.abortAll('shutdown');
    if (aborted.length > 0) {
      log.info(`Cerrando: deteniendo ${aborted.length} descarga(s) en curso`);
    }
    await Promise.all(this.running.values());

    if (this.loadResult) {
      await this.stateStore.close();
    }
    this.eventBus.clear();
    log.info('DownloadEngine cerrado');
  }
}

/** Crea un motor con la configuración efectiva (defaults + entorno + overrides). */
export function createDownloadEngine(deps: DownloadEngineDeps = {}): DownloadEngine {
  return new DownloadEngine(deps);
}

export default DownloadEngine;

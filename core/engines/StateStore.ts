/**
 * Almacén de estado de la cola de descargas (documento JSON versionado, `<stateDir>/queue.json`).
 *
 * Cada escritura serializa el estado completo a un temporal en el mismo directorio, hace
 * fsync y lo renombra sobre el documento: quien lo lea ve la versión anterior o la nueva,
 * nunca una mitad. Las escrituras pasan por una cola de un solo escritor (p-limit(1)) y un
 * lock consultivo entre procesos (proper-lockfile). Con el lock tomado se relee el documento
 * y se fusiona con la copia en memoria: los items que esta instancia cambió ganan, los que
 * añadió otra instancia se adoptan y los IDs nuevos se asignan sobre el documento releído.
 *
 * Las transiciones de estado se persisten al momento; el progreso se acumula en memoria y
 * se vuelca cada progressFlushInterval ms. Al cargar: migra versiones antiguas (con copia
 * `.v<versión>.bak` de cada paso), aparta documentos corruptos como `.corrupt`, rechaza
 * versiones más nuevas y devuelve a `queued` las descargas interrumpidas.
 *
 * @module StateStore
 */

import { promises as fs } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { lock } from 'proper-lockfile';
import config from '../config';
import { logger } from '../utils/logger';
import { readTextFile, safeUnlink, serializeJSON, writeJSONAtomic } from '../utils/fileHelpers';
import { schemas, validate } from '../utils/schemas';
import { EngineCommandError, StateStoreError, getErrorMessage } from '../utils/errors';
import { ERRORS } from '../constants/errors';
import { formatMigrationApplied } from '../constants/messages';
import { canTransition, isActiveState } from './DownloadStateMachine';
import {
  CURRENT_SCHEMA_VERSION,
  compareSemver,
  detectSchemaVersion,
  planMigrations,
} from './StateMigrations';
import {
  DownloadState,
  type ChecksumSpec,
  type DownloadItem,
  type DownloadItemUpdates,
  type DownloadStatus,
  type ListFilter,
  type QueueState,
} from './types';

const log = logger.child('StateStore');

/** Hooks opcionales por transición: side-effects al cambiar de estado (onExit/onEnter). */
export interface TransitionHooks {
  onExit?: (_id: number, _fromState: DownloadStatus, _toState: DownloadStatus) => void;
  onEnter?: (_id: number, _toState: DownloadStatus, _fromState: DownloadStatus) => void;
}

export interface StateStoreOptions {
  /** Ruta del documento; por defecto `<paths.stateDir>/<paths.stateFileName>`. */
  statePath?: string;
  progressFlushInterval?: number;
  lockRetries?: number;
  lockRetryMinTimeout?: number;
  lockStaleMs?: number;
  /** Se llama cuando un documento corrupto se aparta y se empieza con una cola vacía. */
  onCorruption?: (_info: { statePath: string; corruptPath: string; reason: string }) => void;
}

export interface LoadResult {
  itemCount: number;
  /** true si no había documento y se creó uno vacío. */
  created: boolean;
  /** Versión de origen si se aplicaron migraciones. */
  migratedFrom: string | null;
  recoveredFromCorruption: boolean;
  corruptPath: string | null;
  /** Descargas que estaban en curso y volvieron a la cola. */
  recoveredInterrupted: number;
}

export type SnapshotSummary = Record<DownloadStatus, number> & { total: number };

export interface AddDownloadInput {
  url: string;
  outputPath: string;
  checksum: ChecksumSpec | null;
}

export interface TransitionOptions {
  /** Solo transiciona si el estado actual es este (evita carreras con comandos externos). */
  from?: DownloadStatus | readonly DownloadStatus[];
  updates?: DownloadItemUpdates;
}

function emptyState(lastAssignedId = 0): QueueState {
  return { schemaVersion: CURRENT_SCHEMA_VERSION, items: [], lastAssignedId };
}

/** Reconstruye el item con el orden de claves canónico del documento. */
function canonicalItem(item: DownloadItem): DownloadItem {
  return {
    id: item.id,
    url: item.url,
    outputPath: item.outputPath,
    status: item.status,
    bytesTransferred: item.bytesTransferred,
    totalBytes: item.totalBytes,
    checksum: item.checksum
      ? {
          algorithm: item.checksum.algorithm,
          expectedHex: item.checksum.expectedHex,
          verified: item.checksum.verified,
        }
      : null,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
    completedAt: item.completedAt,
    lastError: item.lastError,
    resultCode: item.resultCode,
    retryCount: item.retryCount,
    attempts: item.attempts,
  };
}

export function toDocument(state: QueueState): QueueState {
  return {
    schemaVersion: state.schemaVersion,
    items: state.items.map(canonicalItem),
    lastAssignedId: state.lastAssignedId,
  };
}

export class StateStore {
  readonly statePath: string;
  private state: QueueState | null = null;
  private _transitionHooks: TransitionHooks = {};
  private readonly writeQueue = pLimit(1);
  private readonly options: Required<Omit<StateStoreOptions, 'statePath' | 'onCorruption'>>;
  private readonly onCorruption: StateStoreOptions['onCorruption'];

  /** Items cambiados en memoria desde la última escritura. */
  private dirtyIds = new Set<number>();
  private removedIds = new Set<number>();
  private progressDirty = false;
  private progressTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  constructor(options: StateStoreOptions = {}) {
    this.statePath =
      options.statePath ?? path.join(config.paths.stateDir, config.paths.stateFileName);
    this.options = {
      progressFlushInterval:
        options.progressFlushInterval ?? config.downloads.progressFlushInterval,
      lockRetries: options.lockRetries ?? config.timing.lockRetries,
      lockRetryMinTimeout: options.lockRetryMinTimeout ?? config.timing.lockRetryMinTimeout,
      lockStaleMs: options.lockStaleMs ?? config.timing.lockStaleMs,
    };
    this.onCorruption = options.onCorruption;
  }

  get isInitialized(): boolean {
    return this.state !== null;
  }

  private get current(): QueueState {
    if (!this.state) {
      throw new EngineCommandError(ERRORS.GENERAL.NOT_INITIALIZED, 'NOT_INITIALIZED');
    }
    return this.state;
  }

  // ---------------------------------------------------------------------------
  // Carga
  // ---------------------------------------------------------------------------

  async initialize(): Promise<LoadResult> {
    const endOperation = log.startOperation(`Cargando estado desde ${this.statePath}`);
    const result: LoadResult = {
      itemCount: 0,
      created: false,
      migratedFrom: null,
      recoveredFromCorruption: false,
      corruptPath: null,
      recoveredInterrupted: 0,
    };

    this.closed = false;
    const raw = await readTextFile(this.statePath);
    let needsWrite = false;

    if (raw === null) {
      this.state = emptyState();
      result.created = true;
      needsWrite = true;
    } else {
      const loaded = await this.loadDocument(raw, result);
      this.state = loaded.state;
      needsWrite = loaded.needsWrite;
    }

    result.recoveredInterrupted = this.recoverInterruptedDownloads();
    if (result.recoveredInterrupted > 0) needsWrite = true;

    if (needsWrite) {
      await this.persist();
    }

    result.itemCount = this.current.items.length;
    endOperation(`${result.itemCount} descargas`);
    return result;
  }

  private async loadDocument(
    raw: string,
    result: LoadResult
  ): Promise<{ state: QueueState; needsWrite: boolean }> {
    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (error) {
      return this.quarantine(result, `JSON inválido: ${getErrorMessage(error)}`);
    }

    const version = detectSchemaVersion(doc);
    if (version === null) {
      return this.quarantine(result, 'schemaVersion ausente o con formato desconocido');
    }

    if (compareSemver(version, CURRENT_SCHEMA_VERSION) > 0) {
      log.error(`${ERRORS.STATE.UPGRADE_REQUIRED} (${version} > ${CURRENT_SCHEMA_VERSION})`);
      throw new StateStoreError(
        `${ERRORS.STATE.UPGRADE_REQUIRED} (${version} > ${CURRENT_SCHEMA_VERSION})`,
        'UPGRADE_REQUIRED'
      );
    }

    let migrated = false;
    if (compareSemver(version, CURRENT_SCHEMA_VERSION) < 0) {
      try {
        doc = await this.applyMigrations(doc, raw, version);
      } catch (error) {
        if (error instanceof StateStoreError && error.code === 'INVALID_DOCUMENT') {
          return this.quarantine(result, error.message);
        }
        throw error;
      }
      result.migratedFrom = version;
      migrated = true;
    }

    const validation = validate(schemas.queueState, doc);
    if (!validation.success || !validation.data) {
      return this.quarantine(result, `${ERRORS.STATE.INVALID_DOCUMENT}: ${validation.error ?? ''}`);
    }

    return { state: toDocument(validation.data), needsWrite: migrated };
  }

  private async applyMigrations(doc: unknown, raw: string, fromVersion: string): Promise<unknown> {
    let current = doc;
    let currentRaw: string | null = raw;
    for (const step of planMigrations(fromVersion)) {
      const backupPath = `${this.statePath}.v${step.from}.bak`;
      await fs.writeFile(backupPath, currentRaw ?? serializeJSON(current), 'utf8');
      current = step.migrate(current);
      currentRaw = null;
      log.info(formatMigrationApplied(step.from, step.to));
    }
    return current;
  }

  private async quarantine(
    result: LoadResult,
    reason: string
  ): Promise<{ state: QueueState; needsWrite: boolean }> {
    const corruptPath = `${this.statePath}.corrupt`;
    await fs.rename(this.statePath, corruptPath);
    log.error(`${ERRORS.STATE.CORRUPT_DOCUMENT} (${reason}); copia en ${corruptPath}`);
    result.recoveredFromCorruption = true;
    result.corruptPath = corruptPath;
    this.onCorruption?.({ statePath: this.statePath, corruptPath, reason });
    return { state: emptyState(), needsWrite: true };
  }

  /** Al cargar, pasa a queued las descargas que quedaron en downloading/verifying. */
  private recoverInterruptedDownloads(): number {
    const now = Date.now();
    let recovered = 0;
    for (const item of this.current.items) {
      if (isActiveState(item.status)) {
        item.status = DownloadState.QUEUED;
        item.updatedAt = now;
        this.dirtyIds.add(item.id);
        recovered++;
      }
    }
    if (recovered > 0) log.info(`Recuperadas ${recovered} descargas interrumpidas`);
    return recovered;
  }

  // ---------------------------------------------------------------------------
  // Lectura
  // ---------------------------------------------------------------------------

  getDownload(id: number): DownloadItem | null {
    const item = this.findItem(id);
    return item ? structuredClone(item) : null;
  }

  listDownloads(filter: ListFilter = {}): DownloadItem[] {
    const statuses =
      filter.status === undefined
        ? null
        : new Set<DownloadStatus>(Array.isArray(filter.status) ? filter.status : [filter.status]);
    const ids = filter.ids ? new Set(filter.ids) : null;
    return this.current.items
      .filter(item => (!statuses || statuses.has(item.status)) && (!ids || ids.has(item.id)))
      .map(item => structuredClone(item));
  }

  getSummary(): SnapshotSummary {
    const summary: SnapshotSummary = {
      queued: 0,
      downloading: 0,
      paused: 0,
      verifying: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      total: 0,
    };
    for (const item of this.current.items) {
      summary[item.status]++;
      summary.total++;
    }
    return summary;
  }

  private findItem(id: number): DownloadItem | undefined {
    return this.current.items.find(item => item.id === id);
  }

  private requireItem(id: number): DownloadItem {
    const item = this.findItem(id);
    if (!item) {
      throw new EngineCommandError(`${ERRORS.COMMAND.NOT_FOUND}: ${id}`, 'NOT_FOUND');
    }
    return item;
  }

  canTransition(fromState: string, toState: string): boolean {
    return canTransition(fromState, toState);
  }

  // ---------------------------------------------------------------------------
  // Escritura
  // ---------------------------------------------------------------------------

  /** Asigna el siguiente ID sobre el documento releído bajo el lock y lo persiste. */
  async addDownload(input: AddDownloadInput): Promise<DownloadItem> {
    let assignedId = 0;
    try {
      const item = await this.writeQueue(() =>
        this.writeDocument(state => {
          const now = Date.now();
          const id = state.lastAssignedId + 1;
          const created: DownloadItem = {
            id,
            url: input.url,
            outputPath: input.outputPath,
            status: DownloadState.QUEUED,
            bytesTransferred: 0,
            totalBytes: -1,
            checksum: input.checksum
              ? {
                  algorithm: input.checksum.algorithm,
                  expectedHex: input.checksum.expectedHex.toLowerCase(),
                  verified: false,
                }
              : null,
            createdAt: now,
            updatedAt: now,
            completedAt: null,
            lastError: null,
            resultCode: null,
            retryCount: 0,
            attempts: 0,
          };
          assignedId = id;
          state.lastAssignedId = id;
          state.items.push(created);
          return created;
        })
      );
      log.info(`Descarga agregada: ${item.id} -> ${input.outputPath}`);
      return structuredClone(item);
    } catch (error) {
      // El ID queda consumido; el item no llegó al disco.
      if (assignedId > 0 && this.state) {
        this.state.items = this.state.items.filter(entry => entry.id !== assignedId);
      }
      throw error;
    }
  }

  /** Registra hooks que se ejecutan al transicionar (onExit desde estado anterior, onEnter al nuevo). */
  setTransitionHooks(hooks: TransitionHooks): void {
    this._transitionHooks = hooks;
  }

  /**
   * Cambia el estado en memoria de forma síncrona y persiste el documento. Si la escritura
   * falla el item vuelve a como estaba. Los hooks se ejecutan tras persistir.
   * Lanza EngineCommandError si el item no existe o la transición no está permitida.
   */
  async transitionState(
    id: number,
    newState: DownloadStatus,
    options: TransitionOptions = {}
  ): Promise<DownloadItem> {
    const item = this.requireItem(id);
    const currentState = item.status;
    const expected = options.from;
    const fromMismatch =
      expected !== undefined &&
      (typeof expected === 'string' ? expected !== currentState : !expected.includes(currentState));

    if (fromMismatch || !canTransition(currentState, newState)) {
      log.warn(`Transición inválida para descarga ${id}: ${currentState} → ${newState}`);
      throw new EngineCommandError(
        `${ERRORS.COMMAND.INVALID_TRANSITION}: ${currentState} → ${newState}`,
        'INVALID_TRANSITION'
      );
    }

    const previous = structuredClone(item);
    item.status = newState;
    Object.assign(item, options.updates ?? {});
    item.updatedAt = Date.now();
    this.dirtyIds.add(id);
    const snapshot = structuredClone(item);

    try {
      await this.persist();
    } catch (error) {
      this.rollback(previous, snapshot);
      throw error;
    }

    try {
      this._transitionHooks.onExit?.(id, currentState, newState);
      this._transitionHooks.onEnter?.(id, newState, currentState);
    } catch (hookErr) {
      log.warn(`Hook de transición para descarga ${id}:`, getErrorMessage(hookErr));
    }
    return snapshot;
  }

  /** Deshace una transición no persistida, salvo que el item haya cambiado después. */
  private rollback(previous: DownloadItem, applied: DownloadItem): void {
    const item = this.state?.items.find(entry => entry.id === previous.id);
    if (!item || item.status !== applied.status || item.updatedAt !== applied.updatedAt) return;
    Object.assign(item, previous);
    log.warn(`Descarga ${previous.id}: transición a ${applied.status} revertida (${previous.status})`);
  }

  /** Actualiza campos sin cambiar el estado y persiste al momento. */
  async updateDownload(id: number, updates: DownloadItemUpdates): Promise<DownloadItem> {
    const item = this.requireItem(id);
    Object.assign(item, updates);
    item.updatedAt = Date.now();
    this.dirtyIds.add(id);
    const snapshot = structuredClone(item);
    await this.persist();
    return snapshot;
  }

  /**
   * Progreso de una transferencia: se aplica en memoria y se vuelca al disco como mucho
   * cada progressFlushInterval ms.
   */
  updateProgress(id: number, bytesTransferred: number, totalBytes?: number): void {
    const item = this.findItem(id);
    if (!item) return;
    item.bytesTransferred = bytesTransferred;
    if (totalBytes !== undefined) item.totalBytes = totalBytes;
    item.updatedAt = Date.now();
    this.dirtyIds.add(id);
    this.progressDirty = true;
    this.scheduleProgressFlush();
  }

  private scheduleProgressFlush(): void {
    if (this.progressTimer || this.closed) return;
    this.progressTimer = setTimeout(() => {
      this.progressTimer = null;
      if (!this.progressDirty) return;
      this.persist().catch((error: unknown) => {
        this.progressDirty = true;
        log.error('Error en flush de progreso:', getErrorMessage(error));
      });
    }, this.options.progressFlushInterval);
  }

  async removeDownload(id: number): Promise<DownloadItem> {
    const state = this.current;
    const item = this.requireItem(id);
    state.items = state.items.filter(entry => entry.id !== id);
    this.dirtyIds.delete(id);
    this.removedIds.add(id);
    log.info(`Descarga eliminada: ${id}`);
    await this.persist();
    return structuredClone(item);
  }

  /**
   * Borra el documento de estado y vacía la cola. El contador de IDs se conserva en memoria
   * para no reutilizar IDs mientras el proceso siga vivo.
   */
  async clear(): Promise<number> {
    const state = this.current;
    const removed = state.items.length;
    this.cancelProgressFlush();
    await this.writeQueue(async () => {
      this.state = emptyState(state.lastAssignedId);
      this.dirtyIds.clear();
      this.removedIds.clear();
      await safeUnlink(this.statePath);
    });
    log.info(`Estado vaciado: ${removed} descargas`);
    return removed;
  }

  /** Vuelca inmediatamente cualquier progreso pendiente. */
  async flush(): Promise<void> {
    this.cancelProgressFlush();
    if (this.progressDirty) {
      await this.persist();
    }
  }

  private cancelProgressFlush(): void {
    if (this.progressTimer) {
      clearTimeout(this.progressTimer);
      this.progressTimer = null;
    }
  }

  /** Encola una escritura del documento completo tal como esté al ejecutarse. */
  persist(): Promise<void> {
    return this.writeQueue(() => this.writeDocument(() => undefined));
  }

  /**
   * Lectura-modificación-escritura bajo el lock: fusiona con el documento en disco, aplica
   * `mutate` y escribe. Si algo falla los cambios pendientes quedan para la próxima.
   */
  private async writeDocument<T>(mutate: (_state: QueueState) => T): Promise<T> {
    const state = this.current;
    await fs.mkdir(path.dirname(this.statePath), { recursive: true });
    const release = await this.acquireLock();

    const dirty = this.dirtyIds;
    const removed = this.removedIds;
    this.dirtyIds = new Set();
    this.removedIds = new Set();
    this.progressDirty = false;

    try {
      await this.mergeFromDisk(state, dirty, removed);
      const result = mutate(state);
      await writeJSONAtomic(this.statePath, toDocument(state));
      return result;
    } catch (error) {
      for (const id of dirty) this.dirtyIds.add(id);
      for (const id of removed) this.removedIds.add(id);
      this.progressDirty = true;
      throw new StateStoreError(
        `${ERRORS.STATE.WRITE_FAILED}: ${getErrorMessage(error)}`,
        'WRITE_FAILED',
        error
      );
    } finally {
      await release();
    }
  }

  private async acquireLock(): Promise<() => Promise<void>> {
    try {
      return await lock(this.statePath, {
        realpath: false,
        stale: this.options.lockStaleMs,
        retries: {
          retries: this.options.lockRetries,
          minTimeout: this.options.lockRetryMinTimeout,
        },
        onCompromised: error => {
          log.error(`Lock del documento comprometido: ${error.message}`);
        },
      });
    } catch (error) {
      throw new StateStoreError(
        `${ERRORS.STATE.LOCK_FAILED}: ${getErrorMessage(error)}`,
        'LOCK_FAILED',
        error
      );
    }
  }

  /**
   * Incorpora lo que otra instancia escribió: items nuevos, cambios en items que esta no
   * tocó, bajas y el contador de IDs.
   */
  private async mergeFromDisk(
    state: QueueState,
    dirty: ReadonlySet<number>,
    removed: ReadonlySet<number>
  ): Promise<void> {
    const stored = await this.readStoredState();
    if (!stored) return;

    const isDirty = (id: number): boolean => dirty.has(id) || this.dirtyIds.has(id);
    const isRemoved = (id: number): boolean => removed.has(id) || this.removedIds.has(id);
    const onDisk = new Map(stored.items.map(item => [item.id, item]));

    const merged: DownloadItem[] = [];
    for (const item of state.items) {
      const storedItem = onDisk.get(item.id);
      onDisk.delete(item.id);
      if (storedItem) {
        if (!isDirty(item.id)) Object.assign(item, storedItem);
        merged.push(item);
      } else if (isDirty(item.id)) {
        merged.push(item);
      } else {
        log.info(`Descarga ${item.id} eliminada por otra instancia`);
      }
    }

    let adopted = 0;
    for (const storedItem of onDisk.values()) {
      if (isRemoved(storedItem.id)) continue;
      merged.push(storedItem);
      adopted++;
    }
    if (adopted > 0) {
      merged.sort((a, b) => a.id - b.id);
      log.info(`Adoptadas ${adopted} descargas escritas por otra instancia`);
    }

    state.items = merged;
    state.lastAssignedId = Math.max(state.lastAssignedId, stored.lastAssignedId);
  }

  /** Documento actual en disco, o null si no existe o no está en la versión vigente. */
  private async readStoredState(): Promise<QueueState | null> {
    const raw = await readTextFile(this.statePath);
    if (raw === null) return null;
    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (error) {
      log.warn(`Documento en disco ilegible, se sobrescribe: ${getErrorMessage(error)}`);
      return null;
    }
    if (detectSchemaVersion(doc) !== CURRENT_SCHEMA_VERSION) return null;
    const validation = validate(schemas.queueState, doc);
    if (!validation.success || !validation.data) {
      log.warn(`Documento en disco no válido, se sobrescribe: ${validation.error ?? ''}`);
      return null;
    }
    return validation.data;
  }

  async close(): Promise<void> {
    await this.flush();
    this.closed = true;
    await this.writeQueue(async () => undefined);
    log.info('StateStore cerrado');
  }
}

export default StateStore;

/**
 * Planificador de la cola: decide cuántas descargas pueden estar activas y cuáles arrancar.
 *
 * No guarda estado de los items: cuenta los activos sobre la instantánea del StateStore y
 * selecciona los `queued` en orden FIFO por id mientras haya hueco. Sin reordenación por
 * prioridad. setMaxParallel cambia el límite en caliente; bajarlo no interrumpe
 * transferencias en curso, solo frena nuevas admisiones.
 *
 * @module Scheduler
 */

import { logger } from '../utils/logger';
import config from '../config';
import { MAX_PARALLEL_LIMIT, VALIDATIONS } from '../constants/validations';
import { EngineCommandError } from '../utils/errors';
import { isActiveState } from './DownloadStateMachine';
import { DownloadState, type DownloadItem } from './types';

const log = logger.child('Scheduler');

/** Resultado de canStartDownload: si hay hueco y cuántos quedan. */
export interface CanStartResult {
  canStart: boolean;
  reason?: string;
  slotsAvailable: number;
}

type SchedulableItem = Pick<DownloadItem, 'id' | 'status'>;

export default class Scheduler {
  private _maxParallel: number;

  constructor(maxParallel: number = config.downloads.maxParallel) {
    this._maxParallel = Scheduler.checkLimit(maxParallel);
  }

  get maxParallel(): number {
    return this._maxParallel;
  }

  private static checkLimit(n: number): number {
    if (!Number.isInteger(n) || n < 1 || n > MAX_PARALLEL_LIMIT) {
      throw new EngineCommandError(VALIDATIONS.SETTINGS.MAX_PARALLEL_RANGE, 'INVALID_ARGUMENT');
    }
    return n;
  }

  /** Actualiza el límite de descargas simultáneas (1–MAX_PARALLEL_LIMIT). */
  setMaxParallel(n: number): void {
    this._maxParallel = Scheduler.checkLimit(n);
    log.info(`Scheduler: maxParallel actualizado a ${this._maxParallel}`);
  }

  /** Items que ocupan un hueco: descargando o verificando. */
  countActive(items: readonly SchedulableItem[]): number {
    return items.filter(item => isActiveState(item.status)).length;
  }

  canStartDownload(currentActiveCount: number): CanStartResult {
    if (currentActiveCount >= this._maxParallel) {
      return {
        canStart: false,
        reason: 'Límite global de descargas alcanzado',
        slotsAvailable: 0,
      };
    }
    return { canStart: true, slotsAvailable: this._maxParallel - currentActiveCount };
  }

  /**
   * Devuelve, en orden de id, los items en cola que caben en los huecos libres.
   */
  selectDownloadsToStart<T extends SchedulableItem>(items: readonly T[]): T[] {
    const availability = this.canStartDownload(this.countActive(items));
    if (!availability.canStart) {
      return [];
    }
    return items
      .filter(item => item.status === DownloadState.QUEUED)
      .sort((a, b) => a.id - b.id)
      .slice(0, availability.slotsAvailable);
  }
}

export { Scheduler };

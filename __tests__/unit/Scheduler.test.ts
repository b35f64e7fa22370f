/**
 * Tests unitarios para core/engines/Scheduler.ts
 *
 * Cubre: countActive, canStartDownload, selectDownloadsToStart (FIFO por id) y setMaxParallel.
 */
import Scheduler from '../../core/engines/Scheduler';
import { EngineCommandError } from '../../core/utils/errors';
import type { DownloadItem } from '../../core/engines/types';

type Item = Pick<DownloadItem, 'id' | 'status'>;

describe('Scheduler', () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    scheduler = new Scheduler(2);
  });

  describe('countActive', () => {
    it('cuenta downloading y verifying como activos', () => {
      const items: Item[] = [
        { id: 1, status: 'downloading' },
        { id: 2, status: 'verifying' },
        { id: 3, status: 'queued' },
        { id: 4, status: 'paused' },
        { id: 5, status: 'completed' },
      ];
      expect(scheduler.countActive(items)).toBe(2);
    });
  });

  describe('canStartDownload', () => {
    it('indica los huecos libres', () => {
      expect(scheduler.canStartDownload(0)).toEqual({ canStart: true, slotsAvailable: 2 });
      expect(scheduler.canStartDownload(1)).toEqual({ canStart: true, slotsAvailable: 1 });
    });

    it('rechaza al alcanzar el límite', () => {
      const result = scheduler.canStartDownload(2);
      expect(result.canStart).toBe(false);
      expect(result.slotsAvailable).toBe(0);
      expect(result.reason).toBe('Límite global de descargas alcanzado');
    });
  });

  describe('selectDownloadsToStart', () => {
    it('devuelve los queued en orden de id hasta llenar los huecos', () => {
      const items: Item[] = [
        { id: 7, status: 'queued' },
        { id: 3, status: 'queued' },
        { id: 5, status: 'paused' },
        { id: 4, status: 'queued' },
      ];
      expect(scheduler.selectDownloadsToStart(items).map(i => i.id)).toEqual([3, 4]);
    });

    it('descuenta los activos', () => {
      const items: Item[] = [
        { id: 1, status: 'downloading' },
        { id: 2, status: 'queued' },
        { id: 3, status: 'queued' },
      ];
      expect(scheduler.selectDownloadsToStart(items).map(i => i.id)).toEqual([2]);
    });

    it('no devuelve nada si no hay hueco', () => {
      const items: Item[] = [
        { id: 1, status: 'downloading' },
        { id: 2, status: 'verifying' },
        { id: 3, status: 'queued' },
      ];
      expect(scheduler.selectDownloadsToStart(items)).toEqual([]);
    });

    it('no modifica el array recibido', () => {
      const items: Item[] = [
        { id: 2, status: 'queued' },
        { id: 1, status: 'queued' },
      ];
      scheduler.selectDownloadsToStart(items);
      expect(items.map(i => i.id)).toEqual([2, 1]);
    });
  });

  describe('setMaxParallel', () => {
    it('actualiza el límite', () => {
      scheduler.setMaxParallel(5);
      expect(scheduler.maxParallel).toBe(5);
    });

    it.each([0, -1, 1.5, 65])('rechaza %p', value => {
      expect(() => scheduler.setMaxParallel(value)).toThrow(EngineCommandError);
      expect(scheduler.maxParallel).toBe(2);
    });

    it('bajar el límite no cuenta como hueco negativo', () => {
      scheduler.setMaxParallel(1);
      const items: Item[] = [
        { id: 1, status: 'downloading' },
        { id: 2, status: 'downloading' },
        { id: 3, status: 'queued' },
      ];
      expect(scheduler.selectDownloadsToStart(items)).toEqual([]);
    });
  });
});

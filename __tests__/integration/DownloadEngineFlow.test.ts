/**
 * Tests de integración del motor de descargas.
 *
 * Componentes reales (StateStore sobre un directorio temporal, Scheduler, SessionManager,
 * TransferRunner, ResumeClient, Verifier y EventBus) contra un servidor HTTP en proceso.
 */
import crypto from 'crypto';
import path from 'path';
import { promises as fs } from 'fs';
import { DownloadEngine } from '../../core/engines/DownloadEngine';
import type { StateChangedEvent } from '../../core/engines/EventBus';
import { StateStore } from '../../core/engines/StateStore';
import { EngineCommandError, StateStoreError } from '../../core/utils/errors';
import type { ConfigOverrides } from '../../core/config.d';
import { TestServer, generateData, sha256Hex } from '../helpers/testServer';
import { makeTempDir, removeTempDir, testConfig, waitFor } from '../helpers/tempDir';

const SLOW = { chunkSize: 16 * 1024, chunkDelayMs: 20 };

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function elapsedMs(action: () => Promise<unknown>): Promise<number> {
  const start = Date.now();
  await action();
  return Date.now() - start;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('se esperaba un rechazo');
}

describe('DownloadEngine Integration Flow', () => {
  let server: TestServer;
  let dir: string;
  let engines: DownloadEngine[];

  const out = (name: string): string => path.join(dir, 'downloads', name);

  async function startEngine(overrides: ConfigOverrides = {}): Promise<DownloadEngine> {
    const engine = new DownloadEngine({ config: testConfig(dir, overrides) });
    engines.push(engine);
    await engine.initialize();
    return engine;
  }

  beforeEach(async () => {
    server = new TestServer();
    await server.start();
    dir = await makeTempDir();
    engines = [];
  });

  afterEach(async () => {
    for (const engine of engines) {
      await engine.close();
    }
    await server.stop();
    await removeTempDir(dir);
  });

  describe('Ciclo completo', () => {
    it('debe descargar, verificar sha256 y mover el parcial al destino', async () => {
      const data = generateData(200 * 1024, 11);
      const url = server.add('/a.bin', data);
      const engine = await startEngine();
      const changes: StateChangedEvent[] = [];
      const completed = jest.fn();
      const verification = jest.fn();
      engine.eventBus.subscribe('stateChanged', event => changes.push(event));
      engine.eventBus.subscribe('downloadCompleted', completed);
      engine.eventBus.subscribe('verificationStarted', verification);

      const id = await engine.enqueue(url, out('a.bin'), `sha256:${sha256Hex(data)}`);
      await engine.whenIdle();

      const item = engine.getDownload(id);
      expect(item).toMatchObject({
        status: 'completed',
        bytesTransferred: data.length,
        totalBytes: data.length,
        resultCode: 'success',
        lastError: null,
        checksum: { algorithm: 'sha256', expectedHex: sha256Hex(data), verified: true },
      });
      expect(typeof item?.completedAt).toBe('number');
      expect((await fs.readFile(out('a.bin'))).equals(data)).toBe(true);
      expect(await exists(`${out('a.bin')}.part`)).toBe(false);

      expect(changes.map(c => `${c.from}>${c.to}`)).toEqual([
        'queued>downloading',
        'downloading>verifying',
        'verifying>completed',
      ]);
      expect(completed).toHaveBeenCalledWith(
        expect.objectContaining({ downloadId: id, outputPath: out('a.bin') })
      );
      expect(verification).toHaveBeenCalledWith(
        expect.objectContaining({ downloadId: id, algorithm: 'sha256' })
      );
    });

    it('debe completar sin checksum', async () => {
      const data = generateData(10 * 1024, 2);
      const url = server.add('/plain.bin', data);
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('plain.bin'));
      await engine.whenIdle();

      expect(engine.getDownload(id)).toMatchObject({ status: 'completed', checksum: null });
      expect((await fs.readFile(out('plain.bin'))).equals(data)).toBe(true);
    });

    it('debe avisar de un algoritmo débil y aun así verificarlo', async () => {
      const data = generateData(4096, 5);
      const url = server.add('/legacy.bin', data);
      const engine = await startEngine();
      const warning = jest.fn();
      engine.eventBus.subscribe('checksumWarning', warning);

      const md5 = crypto.createHash('md5').update(data).digest('hex');
      const id = await engine.enqueue(url, out('legacy.bin'), { algorithm: 'md5', expectedHex: md5 });

      expect(warning).toHaveBeenCalledWith(expect.objectContaining({ downloadId: id, algorithm: 'md5' }));
      await engine.whenIdle();
      expect(engine.getDownload(id)?.status).toBe('completed');
    });
  });

  describe('Pausa, reanudación y cancelación', () => {
    it('debe pausar conservando el parcial y reanudar con Range', async () => {
      const data = generateData(512 * 1024, 21);
      const url = server.add('/big.bin', data, SLOW);
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('big.bin'), `sha256:${sha256Hex(data)}`);
      await waitFor(() => (engine.getDownload(id)?.bytesTransferred ?? 0) >= 64 * 1024);

      const paused = await engine.pause(id);
      expect(paused.status).toBe('paused');
      expect(paused.bytesTransferred).toBeGreaterThan(0);
      expect(paused.bytesTransferred).toBeLessThan(data.length);
      expect(await exists(`${out('big.bin')}.part`)).toBe(true);
      expect(engine.activeCount).toBe(0);

      const resumed = await engine.resume(id);
      expect(resumed.status).toBe('queued');
      await engine.whenIdle();

      expect(engine.getDownload(id)?.status).toBe('completed');
      expect((await fs.readFile(out('big.bin'))).equals(data)).toBe(true);
      const requests = server.requestsFor('/big.bin');
      expect(requests[0].range).toBeNull();
      expect(requests[requests.length - 1].range).toMatch(/^bytes=[1-9]\d*-$/);
    });

    it('debe cancelar una descarga en curso y borrar el parcial', async () => {
      const data = generateData(512 * 1024, 22);
      const url = server.add('/c.bin', data, SLOW);
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('c.bin'));
      await waitFor(() => (engine.getDownload(id)?.bytesTransferred ?? 0) > 0);

      const cancelled = await engine.cancel(id);
      expect(cancelled).toMatchObject({
        status: 'cancelled',
        bytesTransferred: 0,
        resultCode: 'cancelled',
      });
      expect(await exists(`${out('c.bin')}.part`)).toBe(false);
      expect(await exists(out('c.bin'))).toBe(false);
    });

    it('debe cancelar y reintentar una descarga en cola', async () => {
      const data = generateData(512 * 1024, 23);
      const first = server.add('/first.bin', data, SLOW);
      const second = server.add('/second.bin', generateData(2048, 24));
      const engine = await startEngine({ downloads: { maxParallel: 1 } });

      const a = await engine.enqueue(first, out('first.bin'));
      const b = await engine.enqueue(second, out('second.bin'));
      await waitFor(() => engine.getDownload(a)?.status === 'downloading');
      expect(engine.getDownload(b)?.status).toBe('queued');

      expect((await engine.cancel(b)).status).toBe('cancelled');
      const requeued = await engine.retry(b);
      expect(requeued).toMatchObject({ status: 'queued', bytesTransferred: 0, retryCount: 0 });

      await engine.cancel(a);
      await engine.whenIdle();
      expect(engine.getDownload(b)?.status).toBe('completed');
    });

    it('debe pausar directamente una descarga en cola', async () => {
      const slow = server.add('/slow.bin', generateData(512 * 1024, 25), SLOW);
      const other = server.add('/other.bin', generateData(1024, 26));
      const engine = await startEngine({ downloads: { maxParallel: 1 } });

      const a = await engine.enqueue(slow, out('slow.bin'));
      const b = await engine.enqueue(other, out('other.bin'));
      await waitFor(() => engine.getDownload(a)?.status === 'downloading');

      expect((await engine.pause(b)).status).toBe('paused');
      await engine.cancel(a);
      await engine.whenIdle();
      expect(engine.getDownload(b)?.status).toBe('paused');
      expect(server.requestsFor('/other.bin')).toHaveLength(0);
    });
  });

  describe('Errores y reintentos', () => {
    it('debe reintentar errores de red y completar', async () => {
      const data = generateData(8192, 31);
      const url = server.add('/flaky.bin', data, { failTimes: 2 });
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('flaky.bin'));
      await engine.whenIdle();

      expect(engine.getDownload(id)).toMatchObject({ status: 'completed', attempts: 3 });
      expect(server.requestsFor('/flaky.bin')).toHaveLength(3);
    });

    it('debe reanudar tras un corte de conexión', async () => {
      const data = generateData(64 * 1024, 32);
      const url = server.add('/reset.bin', data, { resetTimes: 1, resetAfterBytes: 20000 });
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('reset.bin'), `sha256:${sha256Hex(data)}`);
      await engine.whenIdle();

      expect(engine.getDownload(id)?.status).toBe('completed');
      expect((await fs.readFile(out('reset.bin'))).equals(data)).toBe(true);
      expect(server.requestsFor('/reset.bin')).toHaveLength(2);
    });

    it('debe fallar sin reintentar un error de protocolo', async () => {
      const url = server.add('/loop', Buffer.alloc(0), { redirectTo: '/loop' });
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('loop.bin'));
      await engine.whenIdle();

      expect(engine.getDownload(id)).toMatchObject({
        status: 'failed',
        resultCode: 'protocol_failure',
        lastError: 'Demasiadas redirecciones',
        attempts: 1,
      });
      expect(server.requestsFor('/loop')).toHaveLength(6);
    });

    it('debe agotar los reintentos automáticos y luego el presupuesto manual', async () => {
      const url = server.add('/down.bin', generateData(100, 33), { failTimes: 100 });
      const engine = await startEngine({ downloads: { maxRetries: 1, maxRetryCommands: 1 } });
      const failed = jest.fn();
      engine.eventBus.subscribe('downloadFailed', failed);

      const id = await engine.enqueue(url, out('down.bin'));
      await engine.whenIdle();

      expect(engine.getDownload(id)).toMatchObject({
        status: 'failed',
        resultCode: 'network_failure',
        lastError: 'Error después de múltiples reintentos (2): Respuesta HTTP no esperada: 503',
        retryCount: 0,
      });
      expect(failed).toHaveBeenCalledTimes(1);

      expect((await engine.retry(id)).retryCount).toBe(1);
      await engine.whenIdle();
      expect(engine.getDownload(id)?.status).toBe('failed');

      const error = await captureError(engine.retry(id));
      expect(error).toBeInstanceOf(EngineCommandError);
      expect(error).toMatchObject({ code: 'RETRY_BUDGET_EXHAUSTED' });
      expect(server.requestsFor('/down.bin')).toHaveLength(4);
    });

    it('retry tras un checksum incorrecto debe apartar el parcial y descargar desde cero', async () => {
      const good = generateData(64 * 1024, 34);
      const bad = generateData(64 * 1024, 35);
      const url = server.add('/swap.bin', bad);
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('swap.bin'), `sha256:${sha256Hex(good)}`);
      await engine.whenIdle();
      expect(engine.getDownload(id)).toMatchObject({
        status: 'failed',
        resultCode: 'verification_failure',
      });

      server.add('/swap.bin', good);
      await engine.retry(id);
      await engine.whenIdle();

      expect(engine.getDownload(id)).toMatchObject({
        status: 'completed',
        retryCount: 1,
        bytesTransferred: good.length,
      });
      expect((await fs.readFile(out('swap.bin'))).equals(good)).toBe(true);
      expect((await fs.readFile(`${out('swap.bin')}.part.mismatch`)).equals(bad)).toBe(true);
      expect(server.requestsFor('/swap.bin').map(r => r.range)).toEqual([null, null]);
    });

    it('debe devolver a queued una admisión que no se pudo escribir', async () => {
      const data = generateData(8192, 36);
      const url = server.add('/admit.bin', data);
      const config = testConfig(dir);
      const stateStore = new StateStore({
        statePath: path.join(config.paths.stateDir, config.paths.stateFileName),
        progressFlushInterval: config.downloads.progressFlushInterval,
      });
      const engine = new DownloadEngine({ config, stateStore });
      engines.push(engine);
      await engine.initialize();
      const changes: StateChangedEvent[] = [];
      engine.eventBus.subscribe('stateChanged', event => changes.push(event));

      const persist = jest
        .spyOn(stateStore, 'persist')
        .mockRejectedValueOnce(new StateStoreError('disco lleno', 'WRITE_FAILED'));

      const id = await engine.enqueue(url, out('admit.bin'));
      await engine.whenIdle();

      expect(persist).toHaveBeenCalled();
      expect(engine.activeCount).toBe(0);
      expect(engine.getDownload(id)?.status).toBe('completed');
      expect(changes.map(c => `${c.from}>${c.to}`)).toEqual([
        'queued>downloading',
        'downloading>verifying',
        'verifying>completed',
      ]);
    });

    it('debe fallar con resume sobre una descarga sin presupuesto', async () => {
      const url = server.add('/gone.bin', Buffer.alloc(10), { failTimes: 100 });
      const engine = await startEngine({ downloads: { maxRetries: 0, maxRetryCommands: 0 } });

      const id = await engine.enqueue(url, out('gone.bin'));
      await engine.whenIdle();

      await expect(engine.resume(id)).rejects.toMatchObject({ code: 'RETRY_BUDGET_EXHAUSTED' });
    });
  });

  describe('Comandos y validación', () => {
    it('debe rechazar comandos antes de initialize y después de close', async () => {
      const engine = new DownloadEngine({ config: testConfig(dir) });
      engines.push(engine);
      await expect(engine.enqueue('http://127.0.0.1/x', out('x'))).rejects.toMatchObject({
        code: 'NOT_INITIALIZED',
      });

      await engine.initialize();
      await engine.close();
      await expect(engine.enqueue('http://127.0.0.1/x', out('x'))).rejects.toMatchObject({
        code: 'ENGINE_CLOSED',
      });
    });

    it('debe rechazar argumentos inválidos sin tocar la cola', async () => {
      const engine = await startEngine();
      await expect(engine.enqueue('ftp://host/x', out('x'))).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
      await expect(
        engine.enqueue('http://127.0.0.1/x', out('x'), 'sha256:1234')
      ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
      expect(engine.list()).toEqual([]);
    });

    it('debe rechazar una ruta de destino ya usada por una descarga viva', async () => {
      const engine = await startEngine();
      const url = server.add('/dup.bin', generateData(512 * 1024, 41), SLOW);

      await engine.enqueue(url, out('dup.bin'));
      await expect(engine.enqueue(url, out('dup.bin'))).rejects.toMatchObject({
        code: 'DUPLICATE_OUTPUT_PATH',
      });
    });

    it('debe lanzar NOT_FOUND e INVALID_TRANSITION', async () => {
      const engine = await startEngine();
      await expect(engine.pause(42)).rejects.toMatchObject({ code: 'NOT_FOUND' });
      await expect(engine.cancel(0)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
      await expect(engine.resume(1.5)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });

      const url = server.add('/done.bin', generateData(100, 42));
      const id = await engine.enqueue(url, out('done.bin'));
      await engine.whenIdle();
      await expect(engine.retry(id)).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
      await expect(engine.pause(id)).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
    });

    it('enqueueAll debe encolar en orden y list debe ordenar por estado', async () => {
      const engine = await startEngine({ downloads: { maxParallel: 1 } });
      const slow = server.add('/m1.bin', generateData(512 * 1024, 51), SLOW);
      const fast = server.add('/m2.bin', generateData(100, 52));

      const ids = await engine.enqueueAll([
        { url: slow, outputPath: out('m1.bin') },
        { url: fast, outputPath: out('m2.bin') },
        { url: fast, outputPath: out('m3.bin') },
      ]);
      expect(ids).toEqual([1, 2, 3]);
      await waitFor(() => engine.getDownload(1)?.status === 'downloading');
      await engine.pause(2);

      expect(engine.list({}, { orderByState: true }).map(i => i.status)).toEqual([
        'downloading',
        'queued',
        'paused',
      ]);
      expect(engine.list({ status: 'paused' }).map(i => i.id)).toEqual([2]);
      expect(engine.getSummary()).toMatchObject({ downloading: 1, queued: 1, paused: 1, total: 3 });
    });

    it('remove debe quitar la descarga y su parcial', async () => {
      const engine = await startEngine();
      const url = server.add('/r.bin', generateData(512 * 1024, 61), SLOW);
      const id = await engine.enqueue(url, out('r.bin'));
      await waitFor(() => (engine.getDownload(id)?.bytesTransferred ?? 0) > 0);

      await engine.remove(id);
      expect(engine.getDownload(id)).toBeNull();
      expect(await exists(`${out('r.bin')}.part`)).toBe(false);
    });

    it('setMaxParallel debe admitir más descargas en caliente', async () => {
      const engine = await startEngine({ downloads: { maxParallel: 1 } });
      const a = await engine.enqueue(server.add('/s1.bin', generateData(512 * 1024, 43), SLOW), out('s1.bin'));
      const b = await engine.enqueue(server.add('/s2.bin', generateData(512 * 1024, 44), SLOW), out('s2.bin'));
      await waitFor(() => engine.getDownload(a)?.status === 'downloading');
      expect(engine.getDownload(b)?.status).toBe('queued');

      expect(() => engine.setMaxParallel(0)).toThrow(EngineCommandError);
      engine.setMaxParallel(2);
      await waitFor(() => engine.getDownload(b)?.status === 'downloading');
      expect(engine.activeCount).toBe(2);
    });

    it('setRateLimit debe validar los valores', async () => {
      const engine = await startEngine();
      expect(() => engine.setRateLimit({ globalBytesPerSecond: -1 })).toThrow(EngineCommandError);
      expect(() => engine.setRateLimit({ globalBytesPerSecond: 1000, perItemBytesPerSecond: 0 })).not.toThrow();
    });
  });

  describe('Límite de tasa', () => {
    it('el techo global se reparte entre descargas simultáneas', async () => {
      const engine = await startEngine({
        rateLimit: { globalBytesPerSecond: 32 * 1024, burstBytes: 4096 },
      });

      const single = await elapsedMs(async () => {
        await engine.enqueue(server.add('/g1.bin', generateData(32 * 1024, 81)), out('g1.bin'));
        await engine.whenIdle();
      });
      const pair = await elapsedMs(async () => {
        await engine.enqueue(server.add('/g2.bin', generateData(32 * 1024, 82)), out('g2.bin'));
        await engine.enqueue(server.add('/g3.bin', generateData(32 * 1024, 83)), out('g3.bin'));
        await engine.whenIdle();
      });

      // (32768 - 4096) / 32768 s para una; el doble de bytes con el mismo bucket para dos.
      expect(single).toBeGreaterThanOrEqual(700);
      expect(pair).toBeGreaterThanOrEqual(1600);
      expect(engine.getSummary().completed).toBe(3);
    });

    it('el límite por descarga se aplica a cada una y se combina con el global', async () => {
      const engine = await startEngine({
        rateLimit: { perItemBytesPerSecond: 16 * 1024, burstBytes: 4096 },
      });

      const perItemOnly = await elapsedMs(async () => {
        await engine.enqueue(server.add('/p1.bin', generateData(16 * 1024, 84)), out('p1.bin'));
        await engine.enqueue(server.add('/p2.bin', generateData(16 * 1024, 85)), out('p2.bin'));
        await engine.whenIdle();
      });
      // Cada una con su bucket: ~750 ms en paralelo, no la suma.
      expect(perItemOnly).toBeGreaterThanOrEqual(650);
      expect(perItemOnly).toBeLessThan(1400);

      engine.setRateLimit({ globalBytesPerSecond: 16 * 1024 });
      const combined = await elapsedMs(async () => {
        await engine.enqueue(server.add('/p3.bin', generateData(16 * 1024, 86)), out('p3.bin'));
        await engine.enqueue(server.add('/p4.bin', generateData(16 * 1024, 87)), out('p4.bin'));
        await engine.whenIdle();
      });
      // El global limita el total: (32768 - 4096) / 16384 s.
      expect(combined).toBeGreaterThanOrEqual(1500);
      expect(engine.getSummary().completed).toBe(4);
    });

    it('setRateLimit frena una transferencia en curso', async () => {
      const data = generateData(128 * 1024, 88);
      const url = server.add('/live.bin', data, SLOW);
      const engine = await startEngine();

      const id = await engine.enqueue(url, out('live.bin'));
      await waitFor(() => engine.getDownload(id)?.status === 'downloading');
      const throttled = await elapsedMs(async () => {
        engine.setRateLimit({ perItemBytesPerSecond: 64 * 1024, burstBytes: 16 * 1024 });
        await engine.whenIdle();
      });

      expect(engine.getDownload(id)?.status).toBe('completed');
      expect((await fs.readFile(out('live.bin'))).equals(data)).toBe(true);
      // Sin límite tarda ~160 ms; con 64 KiB/s lo que queda por encima del burst tarda más de 0,7 s.
      expect(throttled).toBeGreaterThanOrEqual(700);
    });
  });

  describe('Persistencia entre arranques', () => {
    it('debe devolver a la cola lo que estaba en curso al cerrar y reanudarlo', async () => {
      const data = generateData(512 * 1024, 71);
      const url = server.add('/persist.bin', data, SLOW);
      const first = await startEngine();
      const id = await first.enqueue(url, out('persist.bin'), `sha256:${sha256Hex(data)}`);
      await waitFor(() => (first.getDownload(id)?.bytesTransferred ?? 0) >= 32 * 1024);
      await first.close();

      const second = await startEngine();
      const reloaded = second.getDownload(id);
      expect(reloaded?.status).toBe('queued');
      expect(reloaded?.bytesTransferred).toBeGreaterThan(0);

      await second.whenIdle();
      expect(second.getDownload(id)?.status).toBe('completed');
      expect((await fs.readFile(out('persist.bin'))).equals(data)).toBe(true);
      const requests = server.requestsFor('/persist.bin');
      expect(requests[requests.length - 1].range).toMatch(/^bytes=[1-9]\d*-$/);
    });

    it('purge debe vaciar la cola, borrar parciales y no reutilizar ids', async () => {
      const engine = await startEngine({ downloads: { maxParallel: 1 } });
      const url = server.add('/p1.bin', generateData(512 * 1024, 81), SLOW);
      const other = server.add('/p2.bin', generateData(100, 82));
      await engine.enqueue(url, out('p1.bin'));
      await engine.enqueue(other, out('p2.bin'));
      await waitFor(() => (engine.getDownload(1)?.bytesTransferred ?? 0) > 0);

      expect(await engine.purge()).toEqual({ items: 2, partials: 1 });
      expect(engine.list()).toEqual([]);
      expect(await exists(`${out('p1.bin')}.part`)).toBe(false);
      expect(await exists(path.join(dir, 'state', 'queue.json'))).toBe(false);

      expect(await engine.enqueue(other, out('p3.bin'))).toBe(3);
    });
  });
});

/**
 * Tests unitarios para core/engines/ResumeClient.ts contra un servidor HTTP local.
 */
import path from 'path';
import { promises as fs } from 'fs';
import { ResumeClient, parseContentRange } from '../../core/engines/ResumeClient';
import { DownloadError } from '../../core/utils/errors';
import { RateLimiter } from '../../core/utils/rateLimiter';
import { TestServer, generateData } from '../helpers/testServer';
import { makeTempDir, removeTempDir } from '../helpers/tempDir';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('se esperaba un rechazo');
}

describe('parseContentRange', () => {
  it('interpreta rangos con total conocido y desconocido', () => {
    expect(parseContentRange('bytes 100-199/200')).toEqual({ start: 100, end: 199, total: 200 });
    expect(parseContentRange('bytes 0-9/*')).toEqual({ start: 0, end: 9, total: -1 });
  });

  it('rechaza rangos mal formados o incoherentes', () => {
    expect(parseContentRange(undefined)).toBeNull();
    expect(parseContentRange('bytes */200')).toBeNull();
    expect(parseContentRange('bytes 10-5/200')).toBeNull();
    expect(parseContentRange('bytes 0-200/200')).toBeNull();
  });
});

describe('ResumeClient', () => {
  const data = generateData(64 * 1024, 7);
  let server: TestServer;
  let dir: string;
  let partialPath: string;
  let client: ResumeClient;

  beforeEach(async () => {
    server = new TestServer();
    await server.start();
    dir = await makeTempDir();
    partialPath = path.join(dir, 'out', 'file.bin.part');
    client = new ResumeClient({ progressUpdateInterval: 0, maxRedirects: 2 });
  });

  afterEach(async () => {
    await server.stop();
    await removeTempDir(dir);
  });

  it('descarga completa desde cero sin Range', async () => {
    const url = server.add('/file.bin', data);
    const onProgress = jest.fn();

    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: 0, onProgress });

    expect(outcome).toEqual({
      bytesTransferred: data.length,
      totalBytes: data.length,
      alreadyComplete: false,
      restarted: false,
    });
    expect((await fs.readFile(partialPath)).equals(data)).toBe(true);
    expect(server.requestsFor('/file.bin')).toEqual([{ path: '/file.bin', range: null }]);
    expect(onProgress).toHaveBeenLastCalledWith(data.length, data.length);
  });

  it('reanuda con Range y añade al parcial', async () => {
    const url = server.add('/file.bin', data);
    await fs.mkdir(path.dirname(partialPath), { recursive: true });
    await fs.writeFile(partialPath, data.subarray(0, 1000));

    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: 1000 });

    expect(outcome.bytesTransferred).toBe(data.length);
    expect(outcome.restarted).toBe(false);
    expect(server.requestsFor('/file.bin')[0].range).toBe('bytes=1000-');
    expect((await fs.readFile(partialPath)).equals(data)).toBe(true);
  });

  it('empieza de cero si el servidor ignora Range', async () => {
    const url = server.add('/file.bin', data, { ignoreRange: true });
    await fs.mkdir(path.dirname(partialPath), { recursive: true });
    await fs.writeFile(partialPath, Buffer.alloc(500, 0xff));

    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: 500 });

    expect(outcome.restarted).toBe(true);
    expect(outcome.bytesTransferred).toBe(data.length);
    expect((await fs.readFile(partialPath)).equals(data)).toBe(true);
  });

  it('416 con el parcial completo se considera terminado', async () => {
    const url = server.add('/file.bin', data);
    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: data.length });
    expect(outcome).toEqual({
      bytesTransferred: data.length,
      totalBytes: data.length,
      alreadyComplete: true,
      restarted: false,
    });
  });

  it('416 con un parcial más grande que el recurso es error de protocolo', async () => {
    const url = server.add('/file.bin', data);
    const error = await captureError(
      client.transfer({ downloadId: 1, url, partialPath, offset: data.length + 10 })
    );
    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ code: 'protocol_failure', retryable: false });
  });

  it('Content-Range con otro inicio es error de protocolo', async () => {
    const url = server.add('/file.bin', data, { rangeStartSkew: 10 });
    const error = await captureError(
      client.transfer({ downloadId: 1, url, partialPath, offset: 100 })
    );
    expect(error).toMatchObject({
      code: 'protocol_failure',
      retryable: false,
      message: 'Content-Range no coincide con el offset solicitado: pedido 100, recibido 110',
    });
  });

  it('sigue redirecciones relativas', async () => {
    server.add('/file.bin', data);
    const url = server.add('/old.bin', Buffer.alloc(0), { redirectTo: '/file.bin', redirectStatus: 301 });

    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: 0 });

    expect(outcome.bytesTransferred).toBe(data.length);
    expect(server.requests.map(r => r.path)).toEqual(['/old.bin', '/file.bin']);
  });

  it('corta tras maxRedirects redirecciones', async () => {
    const url = server.add('/loop', Buffer.alloc(0), { redirectTo: '/loop' });
    const error = await captureError(client.transfer({ downloadId: 1, url, partialPath, offset: 0 }));
    expect(error).toMatchObject({
      code: 'protocol_failure',
      message: 'Demasiadas redirecciones',
    });
    expect(server.requestsFor('/loop')).toHaveLength(3);
  });

  it('503 es reintentable y respeta Retry-After', async () => {
    const url = server.add('/file.bin', data, { failTimes: 1, retryAfter: '2' });
    const error = await captureError(client.transfer({ downloadId: 1, url, partialPath, offset: 0 }));
    expect(error).toMatchObject({
      code: 'network_failure',
      retryable: true,
      retryAfterMs: 2000,
      message: 'Respuesta HTTP no esperada: 503',
    });
  });

  it('un corte de conexión deja el parcial y es reintentable', async () => {
    const url = server.add('/file.bin', data, { resetTimes: 1, resetAfterBytes: 1000 });
    const error = await captureError(client.transfer({ downloadId: 1, url, partialPath, offset: 0 }));

    expect(error).toMatchObject({ code: 'network_failure', retryable: true });
    const stat = await fs.stat(partialPath);
    expect(stat.size).toBeLessThanOrEqual(1000);
  });

  it('sin Content-Length toma como total lo recibido', async () => {
    const url = server.add('/file.bin', data, { omitContentLength: true });
    const outcome = await client.transfer({ downloadId: 1, url, partialPath, offset: 0 });
    expect(outcome.totalBytes).toBe(data.length);
    expect(outcome.bytesTransferred).toBe(data.length);
  });

  it('rechaza esquemas distintos de http y https', async () => {
    const error = await captureError(
      client.transfer({ downloadId: 1, url: 'ftp://127.0.0.1/file.bin', partialPath, offset: 0 })
    );
    expect(error).toMatchObject({ code: 'protocol_failure', retryable: false });
  });

  it('el abort conserva los bytes escritos', async () => {
    const url = server.add('/file.bin', data, { chunkSize: 4096, chunkDelayMs: 20 });
    const controller = new AbortController();
    const onProgress = jest.fn((bytes: number) => {
      if (bytes >= 8192) controller.abort();
    });

    const error = await captureError(
      client.transfer({ downloadId: 1, url, partialPath, offset: 0, signal: controller.signal, onProgress })
    );

    expect(controller.signal.aborted).toBe(true);
    expect(error).not.toBeInstanceOf(DownloadError);
    const stat = await fs.stat(partialPath);
    expect(stat.size).toBeGreaterThan(0);
    expect(stat.size).toBeLessThan(data.length);
  });

  it('aplica los limitadores de velocidad', async () => {
    const payload = generateData(60 * 1000, 3);
    const url = server.add('/slow.bin', payload);
    const limiter = new RateLimiter(100 * 1000, 10 * 1000);

    const started = Date.now();
    await client.transfer({ downloadId: 1, url, partialPath, offset: 0, limiters: [limiter] });

    expect(Date.now() - started).toBeGreaterThanOrEqual(400);
    expect((await fs.readFile(partialPath)).equals(payload)).toBe(true);
  });
});

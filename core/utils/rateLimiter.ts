/**
 * @fileoverview Rate Limiter - token bucket de bytes por segundo y stream de throttling
 * @module rateLimiter
 *
 * Un RateLimiter global lo comparten todas las transferencias; cada transferencia puede
 * además crear el suyo. createThrottle encadena los buckets en un Transform que deja
 * pasar los bytes a medida que hay tokens.
 */

import { Transform, type TransformCallback } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { logger } from './logger';
import { isError } from './errors';

const log = logger.child('RateLimiter');

export interface RateLimiterStats {
  bytesPerSecond: number;
  capacity: number;
  availableTokens: number;
  waiting: number;
}

/** Espera cancelable; rechaza con AbortError si la señal se aborta. */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}

export class RateLimiter {
  private bytesPerSecond: number;
  private capacity: number;
  private tokens: number;
  private lastRefill = Date.now();
  private waiting = 0;
  private tail: Promise<void> = Promise.resolve();

  /**
   * @param bytesPerSecond - Tasa de reposición; 0 = sin límite.
   * @param burst - Capacidad del bucket; por defecto igual a la tasa.
   */
  constructor(bytesPerSecond: number, burst?: number | null) {
    if (!Number.isFinite(bytesPerSecond) || bytesPerSecond < 0) {
      throw new Error('bytesPerSecond debe ser un número mayor o igual a 0');
    }
    this.bytesPerSecond = bytesPerSecond;
    this.capacity = RateLimiter.resolveCapacity(bytesPerSecond, burst);
    this.tokens = this.capacity;
  }

  private static resolveCapacity(bytesPerSecond: number, burst?: number | null): number {
    if (bytesPerSecond === 0) return 0;
    return Math.max(1, Math.floor(burst ?? bytesPerSecond));
  }

  get isUnlimited(): boolean {
    return this.bytesPerSecond === 0;
  }

  /** Tamaño máximo que se puede debitar de una vez (capacidad), o Infinity sin límite. */
  get maxSlice(): number {
    return this.isUnlimited ? Infinity : this.capacity;
  }

  /**
   * Espera hasta tener `bytes` tokens y los descuenta. Las peticiones mayores que la
   * capacidad se sirven en porciones. Los llamadores se atienden en orden de llegada.
   */
  acquire(bytes: number, signal?: AbortSignal): Promise<void> {
    if (bytes <= 0 || (this.isUnlimited && this.waiting === 0)) {
      return Promise.resolve();
    }
    this.waiting++;
    const turn = this.tail.then(() => this.take(bytes, signal));
    // El error llega al llamador a través de `turn`; la cola continúa con el siguiente.
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );
    return turn.finally(() => {
      this.waiting--;
    });
  }

  private async take(bytes: number, signal?: AbortSignal): Promise<void> {
    let remaining = bytes;
    while (remaining > 0) {
      signal?.throwIfAborted();
      if (this.isUnlimited) return;

      this.refill();
      const slice = Math.min(remaining, this.capacity);
      if (this.tokens >= slice) {
        this.tokens -= slice;
        remaining -= slice;
        continue;
      }
      const waitMs = Math.ceil(((slice - this.tokens) / this.bytesPerSecond) * 1000);
      await delay(Math.max(1, waitMs), signal);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.lastRefill = now;
    if (elapsed <= 0 || this.isUnlimited) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.bytesPerSecond);
  }

  /** Ajusta la tasa en caliente. Las esperas en curso recalculan con la nueva tasa. */
  setRate(bytesPerSecond: number, burst?: number | null): void {
    if (!Number.isFinite(bytesPerSecond) || bytesPerSecond < 0) {
      throw new Error('bytesPerSecond debe ser un número mayor o igual a 0');
    }
    const wasUnlimited = this.isUnlimited;
    this.refill();
    this.bytesPerSecond = bytesPerSecond;
    this.capacity = RateLimiter.resolveCapacity(bytesPerSecond, burst);
    this.tokens = wasUnlimited ? this.capacity : Math.min(this.tokens, this.capacity);
    log.info(
      bytesPerSecond === 0
        ? 'RateLimiter sin límite'
        : `RateLimiter: ${bytesPerSecond} B/s (burst ${this.capacity})`
    );
  }

  getStats(): RateLimiterStats {
    this.refill();
    return {
      bytesPerSecond: this.bytesPerSecond,
      capacity: this.capacity,
      availableTokens: Math.floor(this.tokens),
      waiting: this.waiting,
    };
  }
}

/**
 * Transform que retiene cada chunk hasta que todos los buckets concedan sus bytes.
 * Los chunks mayores que la capacidad más pequeña se parten para que el progreso fluya.
 */
export function createThrottle(limiters: RateLimiter[], signal?: AbortSignal): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      const sliceSize = Math.min(chunk.length, ...limiters.map(limiter => limiter.maxSlice));
      const pushSlices = async (): Promise<void> => {
        for (let offset = 0; offset < chunk.length; offset += sliceSize) {
          const slice = chunk.subarray(offset, Math.min(offset + sliceSize, chunk.length));
          for (const limiter of limiters) {
            await limiter.acquire(slice.length, signal);
          }
          this.push(slice);
        }
      };
      pushSlices().then(
        () => callback(),
        (error: unknown) => callback(isError(error) ? error : new Error(String(error)))
      );
    },
  });
}

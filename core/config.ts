/**
 * Configuración por defecto del motor de descargas (valores de runtime).
 *
 * Aquí se definen timeouts, reintentos, límites de cola, rate limit y rutas del documento
 * de estado. createConfig mezcla, en este orden, los valores por defecto, las variables
 * de entorno DOWNLOAD_ENGINE_* y los overrides del llamador, y valida el resultado con Zod.
 *
 * @module config
 */

import os from 'os';
import path from 'path';
import type { AppConfig, ConfigOverrides } from './config.d';
import { schemas, validate } from './utils/schemas';

const stateHome = process.env.XDG_STATE_HOME ?? path.join(os.homedir(), '.local', 'state');

const config: AppConfig = {
  network: {
    responseTimeout: 30000,
    idleTimeout: 60000,
    retryDelay: 1000,
    maxRetryDelay: 30000,
    maxRedirects: 5,
    userAgent: 'resumable-download-engine/1.0',
  },

  downloads: {
    maxParallel: 3,
    maxRetries: 3,
    maxRetryCommands: 5,
    progressUpdateInterval: 500,
    progressFlushInterval: 1000,
    verifyBufferSize: 1024 * 1024,
    partialSuffix: '.part',
  },

  // Ambos ámbitos se pueden combinar; 0 desactiva cada uno.
  rateLimit: {
    globalBytesPerSecond: 0,
    perItemBytesPerSecond: 0,
    burstBytes: null,
  },

  timing: {
    queueProcessInterval: 2000,
    lockRetries: 10,
    lockRetryMinTimeout: 25,
    lockStaleMs: 10000,
  },

  paths: {
    stateDir: path.join(stateHome, 'download-engine'),
    stateFileName: 'queue.json',
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: object, patch: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/** Lee los overrides DOWNLOAD_ENGINE_* del entorno (valores vacíos se ignoran). */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.DOWNLOAD_ENGINE_STATE_DIR) {
    overrides.paths = { stateDir: env.DOWNLOAD_ENGINE_STATE_DIR };
  }
  if (env.DOWNLOAD_ENGINE_MAX_PARALLEL) {
    overrides.downloads = { maxParallel: Number(env.DOWNLOAD_ENGINE_MAX_PARALLEL) };
  }
  if (env.DOWNLOAD_ENGINE_RATE_LIMIT) {
    overrides.rateLimit = { globalBytesPerSecond: Number(env.DOWNLOAD_ENGINE_RATE_LIMIT) };
  }
  return overrides;
}

/**
 * Construye la configuración efectiva. Lanza si el resultado no pasa la validación
 * (p. ej. maxParallel 0 o una tasa negativa).
 */
export function createConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const merged = deepMerge(deepMerge(config, readEnvOverrides(env)), overrides);
  const result = validate(schemas.appConfig, merged);
  if (!result.success || !result.data) {
    throw new Error(`Configuración inválida: ${result.error ?? 'desconocido'}`);
  }
  return result.data;
}

export default config;

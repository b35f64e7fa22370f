/**
 * Tipos para la configuración centralizada del motor de descargas.
 *
 * La implementación concreta y los valores por defecto están en config.ts.
 */
export interface NetworkConfig {
  /** Timeout de conexión/primera respuesta (ms). */
  responseTimeout: number;
  /** Tiempo máximo sin recibir datos antes de abortar el stream (ms). */
  idleTimeout: number;
  /** Base del backoff exponencial (ms). */
  retryDelay: number;
  /** Techo del backoff exponencial (ms). */
  maxRetryDelay: number;
  maxRedirects: number;
  userAgent: string;
}

export interface DownloadsConfig {
  /** Descargas simultáneas en estado downloading. */
  maxParallel: number;
  /** Reintentos automáticos ante errores de red transitorios. */
  maxRetries: number;
  /** Reintentos manuales (comando retry) permitidos por descarga. */
  maxRetryCommands: number;
  /** Cadencia de reporte de progreso en memoria (ms). */
  progressUpdateInterval: number;
  /** Cadencia de volcado del progreso al documento de estado (ms). */
  progressFlushInterval: number;
  /** Tamaño del buffer de lectura del Verifier (bytes). */
  verifyBufferSize: number;
  /** Sufijo del archivo parcial junto a outputPath. */
  partialSuffix: string;
}

export interface RateLimitConfig {
  /** Techo agregado para todas las transferencias (bytes/s, 0 = sin límite). */
  globalBytesPerSecond: number;
  /** Techo por transferencia (bytes/s, 0 = sin límite). */
  perItemBytesPerSecond: number;
  /** Capacidad del bucket; null = igual a la tasa. */
  burstBytes: number | null;
}

export interface TimingConfig {
  /** Intervalo del barrido periódico de la cola (ms). */
  queueProcessInterval: number;
  /** Reintentos del lock entre procesos. */
  lockRetries: number;
  /** Espera mínima entre reintentos del lock (ms). */
  lockRetryMinTimeout: number;
  /** Antigüedad a partir de la cual un lock se considera abandonado (ms). */
  lockStaleMs: number;
}

export interface PathsConfig {
  /** Directorio del documento de estado. */
  stateDir: string;
  /** Nombre del documento de estado dentro de stateDir. */
  stateFileName: string;
}

export interface AppConfig {
  network: NetworkConfig;
  downloads: DownloadsConfig;
  rateLimit: RateLimitConfig;
  timing: TimingConfig;
  paths: PathsConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<AppConfig>;

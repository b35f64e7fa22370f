/**
 * Entrada pública del paquete: el motor, su configuración y las constantes de resultado.
 *
 * @module download-engine
 */

export * from './engines';
export { createConfig, readEnvOverrides } from './config';
export type { AppConfig, ConfigOverrides } from './config.d';
export {
  configureLogger,
  cleanOldLogs,
  DownloadError,
  StateStoreError,
  EngineCommandError,
  parseChecksum,
  formatChecksum,
  RateLimiter,
} from './utils';
export { ResultCode, EXIT_CODES } from '../shared/constants/resultCodes';
export type { ManifestEntry } from '../shared/types';

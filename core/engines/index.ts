/**
 * Punto de entrada del motor de descargas: reexporta DownloadEngine y sus componentes
 * (StateStore, Scheduler, SessionManager, EventBus, ResumeClient, Verifier,
 * TransferRunner), las migraciones y los tipos compartidos.
 *
 * @module engines
 */

export { default as DownloadEngine, createDownloadEngine } from './DownloadEngine';
export type {
  DownloadEngineDeps,
  RateLimitSettings,
  ListOptions,
  PurgeResult,
} from './DownloadEngine';
export { EventBus } from './EventBus';
export type { EngineEvents, EngineEventName } from './EventBus';
export { StateStore, toDocument } from './StateStore';
export type { LoadResult, SnapshotSummary, AddDownloadInput, StateStoreOptions } from './StateStore';
export {
  CURRENT_SCHEMA_VERSION,
  detectSchemaVersion,
  migrateToCurrent,
  compareSemver,
} from './StateMigrations';
export { default as Scheduler } from './Scheduler';
export type { CanStartResult } from './Scheduler';
export { SessionManager } from './SessionManager';
export type { SessionHandle } from './SessionManager';
export { ResumeClient, parseContentRange } from './ResumeClient';
export type { TransferRequest, TransferOutcome, ResumeClientOptions } from './ResumeClient';
export { default as Verifier, getAlgorithmSecurity, isWeakAlgorithm } from './Verifier';
export type { VerifyChecksumResult, AlgorithmSecurity } from './Verifier';
export { TransferRunner } from './TransferRunner';
export type { RunOutcome } from './TransferRunner';
export {
  isTransientNetworkError,
  isFilesystemError,
  toDownloadError,
  parseRetryAfter,
  calculateBackoffDelay,
} from './DownloadValidator';
export { canTransition, isActiveState, isTerminalState } from './DownloadStateMachine';
export { DownloadState } from './types';
export type {
  DownloadItem,
  DownloadStatus,
  QueueState,
  ChecksumSpec,
  ItemChecksum,
  ChecksumAlgorithm,
  ListFilter,
  ResultCodeValue,
  AbortReason,
} from './types';

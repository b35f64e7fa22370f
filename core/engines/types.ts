/**
 * Tipos y constantes compartidos por el motor de descargas.
 *
 * Define los estados de descarga, reexporta el modelo de datos de shared/types y
 * declara los contratos mínimos entre el orquestador y el TransferRunner para no
 * acoplar el runner al DownloadEngine completo.
 *
 * @module engines/types
 */

import type {
  DownloadItem,
  DownloadStatus,
  QueueState,
  ChecksumSpec,
  ItemChecksum,
  ChecksumAlgorithm,
  ListFilter,
  ResultCodeValue,
} from '../../shared/types';

export type {
  DownloadItem,
  DownloadStatus,
  QueueState,
  ChecksumSpec,
  ItemChecksum,
  ChecksumAlgorithm,
  ListFilter,
  ResultCodeValue,
};

/** Estados posibles de una descarga en el motor. */
export const DownloadState = Object.freeze({
  QUEUED: 'queued',
  DOWNLOADING: 'downloading',
  PAUSED: 'paused',
  VERIFYING: 'verifying',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const satisfies Record<string, DownloadStatus>);

export type DownloadStateType = (typeof DownloadState)[keyof typeof DownloadState];

/** Campos que el motor puede modificar de un item (id, url y createdAt son inmutables). */
export type DownloadItemUpdates = Partial<
  Pick<
    DownloadItem,
    | 'bytesTransferred'
    | 'totalBytes'
    | 'checksum'
    | 'completedAt'
    | 'lastError'
    | 'resultCode'
    | 'retryCount'
    | 'attempts'
  >
>;

/** Motivo por el que se abortó la señal de una sesión. */
export type AbortReason = 'pause' | 'cancel' | 'shutdown';

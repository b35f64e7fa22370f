/**
 * @fileoverview Tipos compartidos entre el motor de descargas y sus colaboradores externos
 * (capa de presentación, parser de manifiestos).
 * @module shared/types
 */

import type { ResultCodeValue } from '../constants/resultCodes';

export type DownloadStatus =
  | 'queued'
  | 'downloading'
  | 'paused'
  | 'completed'
  | 'failed'
  | 'verifying'
  | 'cancelled';

export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256' | 'sha384' | 'sha512';

/** Checksum esperado tal como lo entrega el llamador. */
export interface ChecksumSpec {
  algorithm: ChecksumAlgorithm;
  expectedHex: string;
}

/** Checksum guardado en el item; verified solo pasa a true cuando el Verifier coincide. */
export interface ItemChecksum extends ChecksumSpec {
  verified: boolean;
}

export interface DownloadItem {
  id: number;
  url: string;
  outputPath: string;
  status: DownloadStatus;
  bytesTransferred: number;
  /** -1 mientras el servidor no informe el tamaño. */
  totalBytes: number;
  checksum: ItemChecksum | null;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
  lastError: string | null;
  resultCode: ResultCodeValue | null;
  /** Reintentos manuales (comando retry) consumidos. */
  retryCount: number;
  /** Intentos automáticos de transferencia en la última ejecución. */
  attempts: number;
}

export interface QueueState {
  schemaVersion: string;
  items: DownloadItem[];
  lastAssignedId: number;
}

export interface ListFilter {
  status?: DownloadStatus | DownloadStatus[];
  ids?: number[];
}

/** Tupla que produce un parser de manifiestos y consume Engine.enqueue. */
export interface ManifestEntry {
  url: string;
  outputPath: string;
  checksum?: ChecksumSpec | string | null;
}

export type { ResultCodeValue };

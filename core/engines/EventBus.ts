/**
 * Bus de eventos del motor de descargas hacia la capa de presentación.
 *
 * Emite: stateChanged, downloadProgress, downloadCompleted, downloadFailed,
 * verificationStarted, checksumWarning, stateRecovered. Complementa el sondeo de
 * Engine.list(), no lo sustituye. Cada motor tiene su propia instancia.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type { ChecksumAlgorithm, DownloadStatus, ResultCodeValue } from './types';

export interface StateChangedEvent {
  downloadId: number;
  from: DownloadStatus;
  to: DownloadStatus;
  timestamp: number;
}

export interface DownloadProgressEvent {
  downloadId: number;
  bytesTransferred: number;
  totalBytes: number;
  timestamp: number;
}

export interface DownloadCompletedEvent {
  downloadId: number;
  outputPath: string;
  timestamp: number;
}

export interface DownloadFailedEvent {
  downloadId: number;
  error: string;
  resultCode: ResultCodeValue;
  timestamp: number;
}

export interface VerificationStartedEvent {
  downloadId: number;
  algorithm: ChecksumAlgorithm;
  timestamp: number;
}

export interface ChecksumWarningEvent {
  downloadId: number;
  algorithm: ChecksumAlgorithm;
  message: string;
  timestamp: number;
}

export interface StateRecoveredEvent {
  statePath: string;
  corruptPath: string;
  reason: string;
  timestamp: number;
}

export interface EngineEvents {
  stateChanged: StateChangedEvent;
  downloadProgress: DownloadProgressEvent;
  downloadCompleted: DownloadCompletedEvent;
  downloadFailed: DownloadFailedEvent;
  verificationStarted: VerificationStartedEvent;
  checksumWarning: ChecksumWarningEvent;
  stateRecovered: StateRecoveredEvent;
}

export type EngineEventName = keyof EngineEvents;

export class EventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  /** Suscripción tipada; devuelve la función para darse de baja. */
  subscribe<K extends EngineEventName>(
    event: K,
    listener: (payload: EngineEvents[K]) => void
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  private publish<K extends EngineEventName>(event: K, payload: EngineEvents[K]): void {
    this.emit(event, payload);
  }

  emitStateChanged(downloadId: number, from: DownloadStatus, to: DownloadStatus): void {
    this.publish('stateChanged', { downloadId, from, to, timestamp: Date.now() });
  }

  emitDownloadProgress(downloadId: number, bytesTransferred: number, totalBytes: number): void {
    this.publish('downloadProgress', {
      downloadId,
      bytesTransferred,
      totalBytes,
      timestamp: Date.now(),
    });
  }

  emitDownloadCompleted(downloadId: number, outputPath: string): void {
    this.publish('downloadCompleted', { downloadId, outputPath, timestamp: Date.now() });
  }

  emitDownloadFailed(downloadId: number, error: Error | string, resultCode: ResultCodeValue): void {
    const errorMessage = typeof error === 'string' ? error : error.message;
    this.publish('downloadFailed', {
      downloadId,
      error: errorMessage,
      resultCode,
      timestamp: Date.now(),
    });
  }

  emitVerificationStarted(downloadId: number, algorithm: ChecksumAlgorithm): void {
    this.publish('verificationStarted', { downloadId, algorithm, timestamp: Date.now() });
  }

  emitChecksumWarning(downloadId: number, algorithm: ChecksumAlgorithm, message: string): void {
    this.publish('checksumWarning', { downloadId, algorithm, message, timestamp: Date.now() });
  }

  emitStateRecovered(statePath: string, corruptPath: string, reason: string): void {
    this.publish('stateRecovered', { statePath, corruptPath, reason, timestamp: Date.now() });
  }

  /** Quita todos los listeners (usado en close del motor). */
  clear(): void {
    this.removeAllListeners();
  }
}

export default EventBus;

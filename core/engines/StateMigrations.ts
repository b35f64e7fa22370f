/**
 * Migraciones del documento de estado de la cola.
 *
 * Cadena ordenada de funciones puras `0.0.0 → 1.0.0 → 2.0.0`. Cada paso recibe el
 * documento de la versión anterior y devuelve el de la siguiente; el StateStore hace la
 * copia de seguridad de cada versión intermedia y valida el resultado final con el schema
 * actual. Un documento sin schemaVersion pero con `downloads` es la versión 0.0.0.
 *
 * @module engines/StateMigrations
 */

import { schemas, validate, type QueueStateV0, type QueueStateV1 } from '../utils/schemas';
import { parseChecksum } from '../utils/validation';
import { StateStoreError } from '../utils/errors';
import { ERRORS } from '../constants/errors';
import { ResultCode } from '../../shared/constants/resultCodes';
import { isDownloadState } from './DownloadStateMachine';
import { DownloadState, type DownloadItem, type DownloadStatus, type QueueState } from './types';

export const CURRENT_SCHEMA_VERSION = '2.0.0';
const LEGACY_SCHEMA_VERSION = '0.0.0';

const SEMVER_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/** Compara dos versiones semver (solo major.minor.patch). Negativo si a < b. */
export function compareSemver(a: string, b: string): number {
  const pa = SEMVER_PATTERN.exec(a);
  const pb = SEMVER_PATTERN.exec(b);
  if (!pa || !pb) {
    throw new StateStoreError(`Versión de schema inválida: ${pa ? b : a}`, 'INVALID_DOCUMENT');
  }
  for (let i = 1; i <= 3; i++) {
    const diff = Number(pa[i]) - Number(pb[i]);
    if (diff !== 0) return diff;
  }
  return 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Versión declarada por el documento, LEGACY_SCHEMA_VERSION para el formato sin versión,
 * o null si no se reconoce la forma.
 */
export function detectSchemaVersion(doc: unknown): string | null {
  if (!isRecord(doc)) return null;
  if (typeof doc.schemaVersion === 'string') {
    return SEMVER_PATTERN.test(doc.schemaVersion) ? doc.schemaVersion : null;
  }
  if (doc.schemaVersion === undefined && Array.isArray(doc.downloads)) {
    return LEGACY_SCHEMA_VERSION;
  }
  return null;
}

const LEGACY_STATUS_MAP: Readonly<Record<string, DownloadStatus>> = {
  pending: DownloadState.QUEUED,
  waiting: DownloadState.QUEUED,
  queued: DownloadState.QUEUED,
  active: DownloadState.DOWNLOADING,
  downloading: DownloadState.DOWNLOADING,
  verifying: DownloadState.VERIFYING,
  paused: DownloadState.PAUSED,
  done: DownloadState.COMPLETED,
  complete: DownloadState.COMPLETED,
  completed: DownloadState.COMPLETED,
  error: DownloadState.FAILED,
  failed: DownloadState.FAILED,
  cancelled: DownloadState.CANCELLED,
  canceled: DownloadState.CANCELLED,
};

function mapLegacyStatus(status: string): DownloadStatus {
  return LEGACY_STATUS_MAP[status.toLowerCase()] ?? DownloadState.QUEUED;
}

function parseLegacyDate(value: string, field: string, id: number): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new StateStoreError(
      `${ERRORS.STATE.INVALID_DOCUMENT}: ${field} inválido en el item ${id}`,
      'INVALID_DOCUMENT'
    );
  }
  return parsed;
}

function parseOrThrow<T>(result: { success: boolean; data?: T; error?: string }, version: string): T {
  if (!result.success || result.data === undefined) {
    throw new StateStoreError(
      `${ERRORS.STATE.INVALID_DOCUMENT} (${version}): ${result.error ?? ''}`,
      'INVALID_DOCUMENT'
    );
  }
  return result.data;
}

/** 0.0.0 → 1.0.0: renombra campos, checksum sha256 a notación y fechas ISO. */
export function migrateV0ToV1(doc: unknown): QueueStateV1 {
  const legacy: QueueStateV0 = parseOrThrow(validate(schemas.queueStateV0, doc), '0.0.0');
  const epoch = new Date(0).toISOString();

  const items: QueueStateV1['items'] = legacy.downloads.map(entry => {
    const createdAt = entry.created ?? epoch;
    return {
      id: entry.id,
      url: entry.url,
      outputPath: entry.output,
      status: mapLegacyStatus(entry.status),
      bytesTransferred: entry.downloaded ?? 0,
      totalBytes: entry.size ?? -1,
      checksum: entry.sha256 ? `sha256:${entry.sha256.toLowerCase()}` : null,
      createdAt,
      updatedAt: createdAt,
      lastError: entry.error ?? null,
    };
  });

  return {
    schemaVersion: '1.0.0',
    items,
    lastAssignedId: items.reduce((max, item) => Math.max(max, item.id), 0),
  };
}

/** 1.0.0 → 2.0.0: fechas a epoch ms, checksum como objeto, campos de resultado y reintentos. */
export function migrateV1ToV2(doc: unknown): QueueState {
  const v1: QueueStateV1 = parseOrThrow(validate(schemas.queueStateV1, doc), '1.0.0');

  const items: DownloadItem[] = v1.items.map(entry => {
    const status: DownloadStatus = isDownloadState(entry.status)
      ? entry.status
      : mapLegacyStatus(entry.status);
    const createdAt = parseLegacyDate(entry.createdAt, 'createdAt', entry.id);
    const updatedAt = parseLegacyDate(entry.updatedAt, 'updatedAt', entry.id);

    let checksum: DownloadItem['checksum'] = null;
    if (entry.checksum) {
      const parsed = parseChecksum(entry.checksum);
      if (!parsed.valid || !parsed.data) {
        throw new StateStoreError(
          `${ERRORS.STATE.INVALID_DOCUMENT}: checksum del item ${entry.id}: ${parsed.error ?? ''}`,
          'INVALID_DOCUMENT'
        );
      }
      // En 1.0.0 solo se marcaba completed tras verificar.
      checksum = { ...parsed.data, verified: status === DownloadState.COMPLETED };
    }

    const totalBytes = Math.trunc(entry.totalBytes);
    const bytesTransferred = Math.trunc(entry.bytesTransferred);
    const completed = status === DownloadState.COMPLETED;

    return {
      id: entry.id,
      url: entry.url,
      outputPath: entry.outputPath,
      status,
      bytesTransferred: totalBytes >= 0 ? Math.min(bytesTransferred, totalBytes) : bytesTransferred,
      totalBytes: totalBytes >= 0 ? totalBytes : -1,
      checksum,
      createdAt,
      updatedAt,
      completedAt: completed ? updatedAt : null,
      lastError: entry.lastError,
      resultCode: completed ? ResultCode.SUCCESS : null,
      retryCount: 0,
      attempts: 0,
    };
  });

  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    items,
    lastAssignedId: Math.max(
      v1.lastAssignedId,
      items.reduce((max, item) => Math.max(max, item.id), 0)
    ),
  };
}

export interface MigrationStep {
  from: string;
  to: string;
  migrate: (_doc: unknown) => unknown;
}

/** Pasos registrados, en orden. */
export const MIGRATIONS: readonly MigrationStep[] = Object.freeze([
  { from: '0.0.0', to: '1.0.0', migrate: migrateV0ToV1 },
  { from: '1.0.0', to: CURRENT_SCHEMA_VERSION, migrate: migrateV1ToV2 },
]);

/**
 * Pasos a aplicar para llevar un documento de `fromVersion` a la versión actual.
 * Lanza MIGRATION_MISSING si algún tramo de la cadena no existe.
 */
export function planMigrations(fromVersion: string): MigrationStep[] {
  const steps: MigrationStep[] = [];
  let version = fromVersion;
  while (compareSemver(version, CURRENT_SCHEMA_VERSION) < 0) {
    const step = MIGRATIONS.find(m => m.from === version);
    if (!step) {
      throw new StateStoreError(`${ERRORS.STATE.MIGRATION_MISSING} ${version}`, 'MIGRATION_MISSING');
    }
    steps.push(step);
    version = step.to;
  }
  return steps;
}

/** Aplica toda la cadena sin efectos secundarios (sin copias de seguridad). */
export function migrateToCurrent(doc: unknown, fromVersion: string): unknown {
  return planMigrations(fromVersion).reduce<unknown>((current, step) => step.migrate(current), doc);
}

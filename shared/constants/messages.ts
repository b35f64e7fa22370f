/**
 * @fileoverview Mensajes informativos del motor de descargas.
 * @module shared/constants/messages
 */

export const SUCCESS_MESSAGES = {
  DOWNLOAD_COMPLETED: 'Descarga completada',
  DOWNLOAD_VERIFIED: 'Checksum verificado',
  QUEUE_PURGED: 'Cola purgada',
} as const;

/**
 * Formatea el resumen de una purga: cuántas descargas y archivos parciales se eliminaron.
 */
export function formatPurgeSummary(items: number, partials: number): string {
  return `${items} descarga(s) eliminada(s), ${partials} archivo(s) parcial(es) borrado(s)`;
}

/**
 * Formatea el aviso de migración del documento de estado.
 */
export function formatMigrationApplied(fromVersion: string, toVersion: string): string {
  return `Documento de estado migrado de ${fromVersion} a ${toVersion}`;
}

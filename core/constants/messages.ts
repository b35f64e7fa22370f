/**
 * @fileoverview Reexporta los mensajes definidos en shared para uso en el motor.
 * @module constants/messages
 *
 * La fuente de verdad es shared/constants/messages.ts.
 */

export {
  SUCCESS_MESSAGES,
  formatPurgeSummary,
  formatMigrationApplied,
} from '../../shared/constants/messages';

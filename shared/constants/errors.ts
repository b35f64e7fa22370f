/**
 * @fileoverview Constantes de mensajes de error del motor de descargas.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. El motor (core) reexporta este módulo
 * desde core/constants/errors para poder importar desde sus propias rutas.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  NOT_INITIALIZED: 'El motor de descargas no está inicializado',
  ENGINE_CLOSED: 'El motor de descargas está cerrado',
} as const;

// =====================
// ERRORES DE COMANDOS (facade)
// =====================

export const COMMAND_ERRORS = {
  NOT_FOUND: 'Descarga no encontrada',
  INVALID_TRANSITION: 'Transición de estado no permitida',
  RETRY_BUDGET_EXHAUSTED: 'Se agotó el número de reintentos permitidos',
  INVALID_URL: 'URL inválida: debe ser absoluta (http o https)',
  INVALID_OUTPUT_PATH: 'Ruta de destino inválida',
  INVALID_CHECKSUM: 'Checksum inválido',
  UNSUPPORTED_ALGORITHM: 'Algoritmo de checksum no soportado',
  DUPLICATE_OUTPUT_PATH: 'Ya existe una descarga activa con la misma ruta de destino',
} as const;

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS = {
  CANCELLED: 'Descarga cancelada',
  PAUSED: 'Descarga pausada',
  INTERRUPTED: 'Descarga interrumpida por cierre del motor',
  MULTIPLE_RETRIES_FAILED: 'Error después de múltiples reintentos',
  TOO_MANY_REDIRECTS: 'Demasiadas redirecciones',
  REDIRECT_WITHOUT_LOCATION: 'Redirección sin cabecera Location',
} as const;

// =====================
// ERRORES DE PROTOCOLO (Range)
// =====================

export const PROTOCOL_ERRORS = {
  RANGE_OFFSET_MISMATCH: 'Content-Range no coincide con el offset solicitado',
  INVALID_CONTENT_RANGE: 'Cabecera Content-Range ausente o inválida',
  UNEXPECTED_416: 'Range Not Satisfiable sin datos locales que reanudar',
  BODY_EXCEEDS_TOTAL: 'El servidor envió más bytes de los anunciados',
  INCOMPLETE_BODY: 'La respuesta terminó antes de completar el tamaño anunciado',
} as const;

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS = {
  HTTP_STATUS: 'Respuesta HTTP no esperada',
  TIMEOUT: 'Tiempo de espera agotado',
  CONNECTION_RESET: 'Conexión reiniciada por el servidor',
  CONNECTION_CLOSED: 'Conexión cerrada inesperadamente',
} as const;

// =====================
// ERRORES DE VERIFICACIÓN
// =====================

export const VERIFICATION_ERRORS = {
  CHECKSUM_MISMATCH: 'checksum mismatch',
  VERIFY_FAILED: 'Error al verificar archivo',
  WEAK_ALGORITHM: 'Algoritmo de checksum débil (solo compatibilidad heredada)',
} as const;

// =====================
// ERRORES DE ARCHIVOS
// =====================

export const FILE_ERRORS = {
  CREATE_DIRECTORY_FAILED: 'Error creando directorio',
  DELETE_FAILED: 'Error eliminando archivo',
  WRITE_FAILED: 'Error escribiendo archivo',
  RENAME_FAILED: 'Error moviendo el archivo parcial a su ruta final',
} as const;

// =====================
// ERRORES DE PERSISTENCIA
// =====================

export const STATE_ERRORS = {
  UPGRADE_REQUIRED: 'upgrade required: el documento de estado es de una versión más nueva',
  CORRUPT_DOCUMENT: 'Documento de estado corrupto; se movió a un lado y se inicia una cola vacía',
  INVALID_DOCUMENT: 'El documento de estado no supera la validación',
  LOCK_FAILED: 'No se pudo adquirir el lock del documento de estado',
  WRITE_FAILED: 'Error escribiendo el documento de estado',
  MIGRATION_MISSING: 'No hay migración registrada para la versión',
} as const;

// =====================
// OBJETO UNIFICADO
// =====================

export const ERRORS = {
  GENERAL: GENERAL_ERRORS,
  COMMAND: COMMAND_ERRORS,
  DOWNLOAD: DOWNLOAD_ERRORS,
  PROTOCOL: PROTOCOL_ERRORS,
  NETWORK: NETWORK_ERRORS,
  VERIFICATION: VERIFICATION_ERRORS,
  FILE: FILE_ERRORS,
  STATE: STATE_ERRORS,
} as const;

export type ErrorsMap = typeof ERRORS;

export default ERRORS;

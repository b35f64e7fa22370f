/**
 * Orden de estados de la cola de descargas (única fuente de verdad para ordenar listados).
 * Valores menores = mayor prioridad visual (aparecen antes en la lista ordenada).
 *
 * @module shared/constants/queueStateOrder
 */

/** Mapa estado → orden numérico para ordenar la cola (downloading primero, completed al final). */
export const STATE_ORDER: Record<string, number> = {
  downloading: 0,
  verifying: 0,
  queued: 1,
  paused: 2,
  cancelled: 3,
  failed: 4,
  completed: 5,
};

/**
 * Devuelve el orden numérico de un estado para ordenar la cola.
 * Estados desconocidos devuelven 99 (se muestran al final).
 */
export function getStateOrder(state: string | undefined): number {
  if (!state) return 99;
  return STATE_ORDER[state.toLowerCase()] ?? 99;
}

/**
 * Máquina de estados explícita para descargas (transiciones permitidas).
 *
 * Las transiciones inválidas son imposibles: StateStore.transition consulta canTransition
 * antes de escribir. La entrada a DOWNLOADING solo la pide el Scheduler (vía
 * DownloadEngine.processQueue); los demás cambios los provocan el TransferRunner y los
 * comandos externos (pause/resume/cancel/retry).
 *
 * @module DownloadStateMachine
 */

import { DownloadState, type DownloadStateType } from './types';

export const STATE = DownloadState;

export type StateValue = DownloadStateType;

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 * Cualquier transición no listada es inválida. COMPLETED es terminal.
 */
const TRANSITIONS: Readonly<Record<StateValue, readonly StateValue[]>> = {
  [STATE.QUEUED]: [STATE.DOWNLOADING, STATE.PAUSED, STATE.CANCELLED],
  [STATE.DOWNLOADING]: [
    STATE.VERIFYING,
    STATE.FAILED,
    STATE.PAUSED,
    STATE.CANCELLED,
    STATE.QUEUED,
  ],
  [STATE.VERIFYING]: [STATE.COMPLETED, STATE.FAILED],
  [STATE.PAUSED]: [STATE.QUEUED, STATE.CANCELLED],
  [STATE.FAILED]: [STATE.QUEUED, STATE.CANCELLED],
  [STATE.CANCELLED]: [STATE.QUEUED],
  [STATE.COMPLETED]: [],
};

export function isDownloadState(value: unknown): value is StateValue {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(TRANSITIONS, value);
}

/**
 * Indica si una transición de fromState a toState está permitida.
 * Los estados se comparan en minúsculas (como en el documento persistido).
 */
export function canTransition(fromState: string, toState: string): boolean {
  const from = fromState.toLowerCase();
  const to = toState.toLowerCase();
  if (!isDownloadState(from) || !isDownloadState(to)) return false;
  return TRANSITIONS[from].includes(to);
}

/** Estados en los que hay trabajo en curso (red o disco). */
export const ACTIVE_STATES: readonly StateValue[] = [STATE.DOWNLOADING, STATE.VERIFYING];

export function isActiveState(state: string): boolean {
  const normalized = state.toLowerCase();
  return ACTIVE_STATES.some(s => s === normalized);
}

/** Estados que no cambian sin un comando externo. */
export const TERMINAL_STATES: readonly StateValue[] = [
  STATE.COMPLETED,
  STATE.FAILED,
  STATE.CANCELLED,
];

export function isTerminalState(state: string): boolean {
  const normalized = state.toLowerCase();
  return TERMINAL_STATES.some(s => s === normalized);
}

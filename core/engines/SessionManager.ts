/**
 * Sesiones por descarga para cancelar operaciones al pausar, cancelar o cerrar.
 *
 * createSession(downloadId) genera un sessionId único y un AbortController cuya señal
 * recorre todas las esperas de la transferencia (red, tokens, backoff). abort() guarda el
 * motivo para que el runner sepa a qué estado llevar el item. invalidate con sessionId solo
 * borra la sesión si sigue siendo la activa.
 *
 * @module engines/SessionManager
 */

import type { AbortReason } from './types';

interface Session {
  sessionId: string;
  controller: AbortController;
  reason: AbortReason | null;
}

export interface SessionHandle {
  sessionId: string;
  signal: AbortSignal;
}

export class SessionManager {
  private sessions = new Map<number, Session>();
  private counter = 0;

  createSession(downloadId: number): SessionHandle {
    const previous = this.sessions.get(downloadId);
    if (previous && !previous.controller.signal.aborted) {
      previous.controller.abort();
    }
    const sessionId = `${Date.now()}-${++this.counter}`;
    const controller = new AbortController();
    this.sessions.set(downloadId, { sessionId, controller, reason: null });
    return { sessionId, signal: controller.signal };
  }

  /** Aborta la sesión activa. Devuelve false si no había ninguna. */
  abort(downloadId: number, reason: AbortReason): boolean {
    const session = this.sessions.get(downloadId);
    if (!session) return false;
    if (session.reason === null) {
      session.reason = reason;
    }
    session.controller.abort();
    return true;
  }

  abortAll(reason: AbortReason): number[] {
    const ids = [...this.sessions.keys()];
    for (const id of ids) {
      this.abort(id, reason);
    }
    return ids;
  }

  getAbortReason(downloadId: number): AbortReason | null {
    return this.sessions.get(downloadId)?.reason ?? null;
  }

  /** Elimina la sesión; con sessionId solo si sigue siendo la activa. */
  invalidate(downloadId: number, sessionId?: string): void {
    const session = this.sessions.get(downloadId);
    if (!session) return;
    if (sessionId && session.sessionId !== sessionId) return;
    this.sessions.delete(downloadId);
  }

  has(downloadId: number): boolean {
    return this.sessions.has(downloadId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export default SessionManager;

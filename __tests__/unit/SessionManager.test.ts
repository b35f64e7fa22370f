import { SessionManager } from '../../core/engines/SessionManager';

describe('SessionManager', () => {
  let sessions: SessionManager;

  beforeEach(() => {
    sessions = new SessionManager();
  });

  it('debe crear sesiones con ids distintos', () => {
    const a = sessions.createSession(1);
    const b = sessions.createSession(2);
    expect(a.sessionId).not.toBe(b.sessionId);
    expect(sessions.size).toBe(2);
    expect(sessions.has(1)).toBe(true);
  });

  it('debe abortar la sesión anterior al crear otra para la misma descarga', () => {
    const first = sessions.createSession(1);
    const second = sessions.createSession(1);
    expect(first.signal.aborted).toBe(true);
    expect(second.signal.aborted).toBe(false);
    sessions.invalidate(1, first.sessionId);
    expect(sessions.has(1)).toBe(true);
  });

  it('debe conservar el primer motivo de abort', () => {
    const handle = sessions.createSession(1);
    expect(sessions.abort(1, 'pause')).toBe(true);
    sessions.abort(1, 'cancel');
    expect(handle.signal.aborted).toBe(true);
    expect(sessions.getAbortReason(1)).toBe('pause');
  });

  it('debe devolver false al abortar una descarga sin sesión', () => {
    expect(sessions.abort(9, 'cancel')).toBe(false);
    expect(sessions.getAbortReason(9)).toBeNull();
  });

  it('abortAll debe abortar todas y devolver sus ids', () => {
    const a = sessions.createSession(1);
    const b = sessions.createSession(2);
    expect(sessions.abortAll('shutdown')).toEqual([1, 2]);
    expect(a.signal.aborted && b.signal.aborted).toBe(true);
    expect(sessions.getAbortReason(2)).toBe('shutdown');
  });

  it('invalidate con sessionId solo borra la sesión activa', () => {
    const old = sessions.createSession(1);
    const current = sessions.createSession(1);
    sessions.invalidate(1, old.sessionId);
    expect(sessions.has(1)).toBe(true);
    sessions.invalidate(1, current.sessionId);
    expect(sessions.has(1)).toBe(false);
    expect(sessions.getAbortReason(1)).toBeNull();
  });
});

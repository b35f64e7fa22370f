import { EventBus } from '../../core/engines/EventBus';

describe('EventBus', () => {
  it('debe entregar eventos tipados a los suscriptores', () => {
    const bus = new EventBus();
    const listener = jest.fn();
    bus.subscribe('stateChanged', listener);

    bus.emitStateChanged(3, 'queued', 'downloading');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ downloadId: 3, from: 'queued', to: 'downloading' });
    expect(typeof listener.mock.calls[0][0].timestamp).toBe('number');
  });

  it('debe dar de baja con la función devuelta', () => {
    const bus = new EventBus();
    const listener = jest.fn();
    const unsubscribe = bus.subscribe('downloadProgress', listener);
    bus.emitDownloadProgress(1, 10, 100);
    unsubscribe();
    bus.emitDownloadProgress(1, 20, 100);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('debe convertir el error de downloadFailed en mensaje', () => {
    const bus = new EventBus();
    const listener = jest.fn();
    bus.subscribe('downloadFailed', listener);
    bus.emitDownloadFailed(2, new Error('checksum mismatch'), 'verification_failure');
    expect(listener.mock.calls[0][0]).toMatchObject({
      downloadId: 2,
      error: 'checksum mismatch',
      resultCode: 'verification_failure',
    });
  });

  it('clear debe quitar todos los listeners', () => {
    const bus = new EventBus();
    bus.subscribe('checksumWarning', jest.fn());
    bus.subscribe('stateRecovered', jest.fn());
    bus.clear();
    expect(bus.listenerCount('checksumWarning')).toBe(0);
    expect(bus.listenerCount('stateRecovered')).toBe(0);
  });
});

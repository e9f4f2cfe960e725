import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runDirectMethodSender } from '../../scripts/direct-method-sender/app';
import { ConnectionOpenError } from '../../scripts/direct-method-sender/errors';
import type { ConnectionHandle } from '../../scripts/direct-method-sender/client';
import type { SenderConfig } from '../../scripts/direct-method-sender/config';
import type { MethodResponse } from '../../scripts/direct-method-sender/types';
import { FakeConnection, FakeSignalSource } from './helpers/fake-connection';

const config: SenderConfig = {
  intervalMs: 1000,
  target: { deviceId: 'edge-device-01', moduleId: 'DirectMethodReceiver' },
  transportType: 'Mqtt_Tcp_Only',
};

describe('runDirectMethodSender', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs three attempts, shuts down on SIGTERM and exits with 0', async () => {
    const connection = new FakeConnection([200]);
    const source = new FakeSignalSource();
    const openConnection = vi.fn(async () => connection);
    const onForceExit = vi.fn();

    const run = runDirectMethodSender({ config, openConnection, signalSource: source, onForceExit, env: {} });
    await vi.advanceTimersByTimeAsync(2500);
    source.send('SIGTERM');
    const code = await run;
    await vi.advanceTimersByTimeAsync(10000);

    expect(code).toBe(0);
    expect(openConnection).toHaveBeenCalledTimes(1);
    expect(openConnection).toHaveBeenCalledWith('Mqtt_Tcp_Only');
    expect(connection.invocations).toHaveLength(3);
    expect(connection.published).toHaveLength(3);
    expect(connection.closeCalls).toBe(1);
    expect(connection.events.at(-1)).toBe('close');
    expect(onForceExit).not.toHaveBeenCalled();
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });

  it('keeps going while every invoke fails and exits only on the signal', async () => {
    const connection = new FakeConnection([new Error('hub unreachable')]);
    const source = new FakeSignalSource();
    const onError = vi.fn();

    const run = runDirectMethodSender({
      config,
      openConnection: async () => connection,
      signalSource: source,
      onForceExit: vi.fn(),
      onError,
      env: {},
    });
    await vi.advanceTimersByTimeAsync(9500);
    expect(connection.closeCalls).toBe(0);
    source.send('SIGINT');

    await expect(run).resolves.toBe(0);
    expect(onError).toHaveBeenCalledTimes(10);
    expect(connection.published).toEqual([]);
  });

  it('lets an in-flight invoke finish before closing the connection', async () => {
    const events: string[] = [];
    let respond: (response: MethodResponse) => void = () => {};
    const connection: ConnectionHandle = {
      invoke: vi.fn(() => {
        events.push('invoke');
        return new Promise<MethodResponse>((resolve) => {
          respond = resolve;
        });
      }),
      publish: vi.fn(async () => {
        events.push('publish');
      }),
      close: vi.fn(async () => {
        events.push('close');
      }),
    };
    const source = new FakeSignalSource();

    const run = runDirectMethodSender({
      config,
      openConnection: async () => connection,
      signalSource: source,
      onForceExit: vi.fn(),
      env: {},
    });
    await vi.advanceTimersByTimeAsync(0);
    source.send('SIGTERM');
    await vi.advanceTimersByTimeAsync(100);
    expect(connection.close).not.toHaveBeenCalled();
    respond({ status: 200, payload: null });

    await expect(run).resolves.toBe(0);
    expect(events).toEqual(['invoke', 'publish', 'close']);
  });

  it('forces exit when closing the connection hangs past the grace period', async () => {
    const connection = new FakeConnection([200]);
    connection.close = () => new Promise<void>(() => {});
    const source = new FakeSignalSource();
    const onForceExit = vi.fn();

    void runDirectMethodSender({
      config,
      openConnection: async () => connection,
      signalSource: source,
      onForceExit,
      gracePeriodMs: 2000,
      env: {},
    });
    await vi.advanceTimersByTimeAsync(100);
    source.send('SIGTERM');
    await vi.advanceTimersByTimeAsync(1999);
    expect(onForceExit).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);

    expect(onForceExit).toHaveBeenCalledTimes(1);
  });

  it('propagates a connection-open failure before arming shutdown', async () => {
    const source = new FakeSignalSource();
    const failure = new ConnectionOpenError('Failed to open module client over Mqtt_Tcp_Only', {
      transport: 'Mqtt_Tcp_Only',
      cause: new Error('ECONNREFUSED'),
    });

    await expect(
      runDirectMethodSender({
        config,
        openConnection: async () => {
          throw failure;
        },
        signalSource: source,
        onForceExit: vi.fn(),
        env: {},
      }),
    ).rejects.toBe(failure);
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });

  it('still closes the connection when a substituted error policy throws', async () => {
    const connection = new FakeConnection([new Error('unknown target')]);
    const source = new FakeSignalSource();

    await expect(
      runDirectMethodSender({
        config,
        openConnection: async () => connection,
        signalSource: source,
        onForceExit: vi.fn(),
        onError: (error) => {
          throw error;
        },
        env: {},
      }),
    ).rejects.toThrow('unknown target');
    expect(connection.closeCalls).toBe(1);
    expect(source.listenerCount('SIGINT')).toBe(0);
  });
});

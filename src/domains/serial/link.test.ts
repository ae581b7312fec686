import { describe, it, expect, vi, afterEach } from 'vitest';
import { SerialLink } from './link';
import { MockSerialDriver } from './drivers/mock-serial';
import { createSerialDriver } from './drivers/factory';
import type { Frame, LinkStatus } from './types';
import { mockDriverFactory, serialOptions, silentLogger } from '../../testing/fakes';

const text = (frame: Frame) => Buffer.from(frame).toString();

describe('SerialLink', () => {
  const links: SerialLink[] = [];

  function createLink(...args: Parameters<typeof mockDriverFactory>) {
    const factory = mockDriverFactory(...args);
    const link = new SerialLink(serialOptions(), factory.create, silentLogger);
    links.push(link);
    return { link, state: factory.state };
  }

  afterEach(async () => {
    await Promise.all(links.splice(0).map((link) => link.close()));
  });

  it('should report a missing device as OPEN_FAILED and stay disconnected from clients', async () => {
    const factory = mockDriverFactory({ openError: new Error('No such file or directory') });
    const link = new SerialLink(serialOptions({ path: '/dev/ttyFAKE0' }), factory.create, silentLogger);

    const result = await link.open();

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('OPEN_FAILED');
    expect(result.error.message).toBe('Failed to open serial port /dev/ttyFAKE0: No such file or directory');
    expect(link.getStatus()).toBe('error');
    expect(link.uartStatus()).toEqual({
      connected: false,
      port: '/dev/ttyFAKE0',
      baudrate: 115200,
      bytesize: 8,
      stopbits: 1,
      parity: 'N',
    });
    expect(link.state().lastError).toBe(result.error.message);
  });

  it('should treat a second close as a no-op', async () => {
    const { link, state } = createLink();
    const statuses: LinkStatus[] = [];
    link.events.on('status', ({ status }) => statuses.push(status));

    expect(await link.open()).toEqual({ success: true });
    await link.close();
    await link.close();

    expect(statuses).toEqual(['connecting', 'connected', 'disconnected']);
    expect(state.drivers[0]?.isOpen).toBe(false);
  });

  it('should refuse writes while not connected', async () => {
    const { link, state } = createLink();

    const result = await link.write(Uint8Array.from([1]));

    expect(result).toMatchObject({ success: false, error: { code: 'NOT_CONNECTED' } });
    expect(state.drivers).toHaveLength(0);
  });

  it('should time out a slow write without degrading the link and keep later writes behind it', async () => {
    const factory = mockDriverFactory({ writeDelayMs: 150 });
    const link = new SerialLink(serialOptions({ writeTimeoutMs: 20 }), factory.create, silentLogger);
    links.push(link);
    await link.open();

    const first = await link.write(Uint8Array.from([1]));
    const second = await link.write(Uint8Array.from([2]));

    expect(first).toMatchObject({ success: false, error: { code: 'TIMEOUT' } });
    expect(second).toMatchObject({ success: false, error: { code: 'TIMEOUT' } });
    expect(link.getStatus()).toBe('connected');

    await vi.waitFor(() => {
      expect(factory.state.drivers[0]?.writes.map((w) => Array.from(w))).toEqual([[1]]);
    });
  });

  it('should degrade to error on a write I/O failure and report the fault once', async () => {
    const { link, state } = createLink();
    const faults: string[] = [];
    link.events.on('fault', ({ reason }) => faults.push(reason));
    await link.open();

    state.drivers[0]?.failNextWrite(new Error('EIO'));
    const result = await link.write(Uint8Array.from([1]));
    const retry = await link.write(Uint8Array.from([2]));

    expect(result).toMatchObject({
      success: false,
      error: { code: 'IO_ERROR', message: 'I/O error on mock://test: EIO' },
    });
    expect(retry).toMatchObject({ success: false, error: { code: 'NOT_CONNECTED' } });
    expect(link.getStatus()).toBe('error');
    expect(faults).toEqual(['I/O error on mock://test: EIO']);
  });

  it('should relay incoming data to the frame handler', async () => {
    const { link, state } = createLink();
    await link.open();
    const frames: string[] = [];

    const loop = link.readLoop((frame) => frames.push(text(frame)));
    state.drivers[0]?.simulateIncoming('Hello');

    await vi.waitFor(() => expect(frames).toEqual(['Hello']));
    await link.close();
    await loop;
    expect(link.isReading()).toBe(false);
  });

  it('should coalesce chunks that are waiting when the reader wakes', async () => {
    const { link, state } = createLink();
    await link.open();
    const frames: string[] = [];

    const loop = link.readLoop((frame) => frames.push(text(frame)));
    state.drivers[0]?.simulateIncoming('Hel');
    state.drivers[0]?.simulateIncoming('lo');

    await vi.waitFor(() => expect(frames).toEqual(['Hello']));
    await link.close();
    await loop;
  });

  it('should refuse a second read loop', async () => {
    const { link } = createLink();
    await link.open();

    const loop = link.readLoop(() => {});
    await expect(link.readLoop(() => {})).rejects.toThrow('A read loop is already running on mock://test');

    await link.close();
    await loop;
  });

  it('should end the read loop with a single fault when the device fails', async () => {
    const { link, state } = createLink();
    const faults: string[] = [];
    link.events.on('fault', ({ reason }) => faults.push(reason));
    await link.open();

    const loop = link.readLoop(() => {});
    state.drivers[0]?.simulateFault(new Error('Device disconnected'));
    await loop;

    expect(link.getStatus()).toBe('error');
    expect(link.state().lastError).toBe('I/O error on mock://test: Device disconnected');
    expect(faults).toEqual(['I/O error on mock://test: Device disconnected']);
  });

  it('should wait for the old reader to exit before reopening on reconnect', async () => {
    const { link, state } = createLink();
    const faults: string[] = [];
    link.events.on('fault', ({ reason }) => faults.push(reason));
    await link.open();

    let loopDone = false;
    const loop = link.readLoop(() => {}).then(() => {
      loopDone = true;
    });
    expect(MockSerialDriver.activeReaders('mock://test')).toBe(1);

    const result = await link.reconnect();

    expect(result).toEqual({ success: true });
    expect(loopDone).toBe(true);
    expect(link.isReading()).toBe(false);
    expect(MockSerialDriver.activeReaders('mock://test')).toBe(0);
    expect(state.drivers).toHaveLength(2);
    expect(state.drivers[0]?.isOpen).toBe(false);
    expect(state.drivers[1]?.isOpen).toBe(true);

    const frames: string[] = [];
    const next = link.readLoop((frame) => frames.push(text(frame)));
    state.drivers[1]?.simulateIncoming('again');
    await vi.waitFor(() => expect(frames).toEqual(['again']));

    await link.close();
    await Promise.all([loop, next]);
    expect(faults).toEqual([]);
  });

  it('should report a reconnect that cannot reopen the device', async () => {
    const { link, state } = createLink();
    await link.open();
    state.failOpen = new Error('Device busy');

    const result = await link.reconnect();

    expect(result).toMatchObject({ success: false, error: { code: 'OPEN_FAILED' } });
    expect(link.getStatus()).toBe('error');
  });

  it('should echo writes back through a loopback device', async () => {
    const link = new SerialLink(serialOptions({ path: 'mock://loopback' }), createSerialDriver, silentLogger);
    links.push(link);
    await link.open();
    const frames: number[][] = [];

    const loop = link.readLoop((frame) => frames.push(Array.from(frame)));
    expect(await link.write(Uint8Array.from([0x01, 0x02, 0x03]))).toEqual({ success: true });

    await vi.waitFor(() => expect(frames).toEqual([[0x01, 0x02, 0x03]]));
    await link.close();
    await loop;
  });
});

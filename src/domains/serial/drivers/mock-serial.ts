import { Channel } from '../../../core/channel';
import type { SerialDriver } from './types';

export interface MockScenarioStep {
  match: string | RegExp;
  reply: string | Uint8Array;
  delay?: number;
}

export interface MockSerialOptions {
  // Echo every write back as incoming data
  loopback?: boolean;
  scenario?: MockScenarioStep[];
  // Reject open() with this error
  openError?: Error;
  // Delay before a write settles
  writeDelayMs?: number;
}

export const MOCK_PATH_PREFIX = 'mock://';

// Readers currently inside read(), per device path
const activeReaders = new Map<string, number>();

/**
 * In-process stand-in for a serial device. `mock://loopback` echoes writes back;
 * other paths answer only through the scenario or `simulateIncoming`.
 *
 * A second concurrent read on the same path throws, so a test that ever runs two
 * readers against one device fails loudly.
 */
export class MockSerialDriver implements SerialDriver {
  public readonly type = 'mock-serial';
  public readonly path: string;
  public readonly writes: Uint8Array[] = [];

  private connected = false;
  private channel = new Channel<Uint8Array>(1024);
  private pendingFault: Error | null = null;
  private timers = new Set<NodeJS.Timeout>();

  constructor(path: string, private options: MockSerialOptions = {}) {
    this.path = path;
  }

  static activeReaders(path: string): number {
    return activeReaders.get(path) ?? 0;
  }

  get isOpen(): boolean {
    return this.connected;
  }

  async open(): Promise<void> {
    if (this.options.openError) throw this.options.openError;
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
    this.channel.close();
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }

  async read(timeoutMs: number, signal?: AbortSignal): Promise<Uint8Array | null> {
    if (MockSerialDriver.activeReaders(this.path) > 0) {
      throw new Error(`Re-entrant read on ${this.path}`);
    }
    activeReaders.set(this.path, 1);
    try {
      const first = await this.channel.take(timeoutMs, signal);
      if (!first) return null;
      const rest = this.channel.drain();
      return rest.length === 0 ? first : concat([first, ...rest]);
    } finally {
      activeReaders.delete(this.path);
    }
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new Error(`Device ${this.path} is not connected`);
    }
    if (this.pendingFault) {
      const fault = this.pendingFault;
      this.pendingFault = null;
      throw fault;
    }

    if (this.options.writeDelayMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.writeDelayMs));
    }

    const copy = Uint8Array.from(data);
    this.writes.push(copy);

    if (this.options.loopback) {
      this.channel.push(copy);
      return;
    }

    const input = Buffer.from(copy).toString();
    for (const step of this.options.scenario ?? []) {
      const matched = typeof step.match === 'string' ? input.includes(step.match) : step.match.test(input);
      if (matched) {
        const reply = typeof step.reply === 'string' ? Buffer.from(step.reply) : step.reply;
        this.schedule(() => this.simulateIncoming(reply), step.delay ?? 0);
        break;
      }
    }
  }

  // Simulate unsolicited data from the device
  simulateIncoming(data: string | Uint8Array) {
    if (!this.connected) return;
    this.channel.push(typeof data === 'string' ? Buffer.from(data) : Uint8Array.from(data));
  }

  // Simulate the device failing (unplugged cable, driver error)
  simulateFault(error: Error = new Error('Device disconnected')) {
    this.channel.fail(error);
  }

  failNextWrite(error: Error = new Error('Write failed')) {
    this.pendingFault = error;
  }

  private schedule(fn: () => void, delay: number) {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delay);
    this.timers.add(timer);
  }
}

function concat(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, c) => sum + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

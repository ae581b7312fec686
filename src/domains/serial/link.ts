import mitt, { type Emitter } from 'mitt';
import { AsyncMutex } from '../../core/mutex';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import { LinkError, type LinkResult } from './errors';
import type { SerialDriver, SerialDriverFactory } from './drivers/types';
import { toUartStatus, type Frame, type LinkStatus, type SerialLinkState, type SerialOptions, type UartStatus } from './types';

type SerialLinkEvents = {
  status: { status: LinkStatus; previous: LinkStatus };
  fault: { reason: string };
};

interface ActiveReader {
  controller: AbortController;
  done: Promise<void>;
}

const OK: LinkResult = { success: true };

/**
 * Owns the single serial handle.
 *
 * Lifecycle transitions (open/close/reconnect) are serialized by one mutex, writes
 * by another. The read loop runs on its own and is stopped cooperatively through an
 * AbortSignal; close() does not return until it has exited.
 */
export class SerialLink {
  public readonly events: Emitter<SerialLinkEvents> = mitt<SerialLinkEvents>();

  private options: SerialOptions;
  private driver: SerialDriver | null = null;
  private status: LinkStatus = 'disconnected';
  private lastError: string | null = null;
  private reader: ActiveReader | null = null;
  private lifecycleLock = new AsyncMutex();
  private writeLock = new AsyncMutex();
  private logger: Logger;

  constructor(
    options: SerialOptions,
    private createDriver: SerialDriverFactory,
    logger: Logger = rootLogger
  ) {
    this.options = { ...options };
    this.logger = logger.child({ component: 'SerialLink' });
  }

  async open(options?: SerialOptions): Promise<LinkResult> {
    return this.lifecycleLock.runExclusive(async () => {
      if (options) this.options = { ...options };
      return this.openLocked();
    });
  }

  async close(): Promise<void> {
    await this.lifecycleLock.runExclusive(() => this.closeLocked());
  }

  /**
   * Close and reopen with the last-known options. The previous read loop has fully
   * exited before the device is opened again.
   */
  async reconnect(): Promise<LinkResult> {
    return this.lifecycleLock.runExclusive(async () => {
      this.logger.info(`Reconnecting ${this.options.path}`);
      await this.closeLocked();
      return this.openLocked();
    });
  }

  /**
   * Relay incoming frames to `onFrame` until the link leaves the connected state,
   * close() is called, or the device reports a hard error (link → error, one
   * `fault` event). Resolves once the loop has exited.
   */
  async readLoop(onFrame: (frame: Frame) => void): Promise<void> {
    if (this.reader) {
      throw new Error(`A read loop is already running on ${this.options.path}`);
    }
    const driver = this.driver;
    if (!driver || this.status !== 'connected') {
      this.logger.warn('Read loop not started: link is not connected', { status: this.status });
      return;
    }

    const controller = new AbortController();
    const done = this.runReader(driver, controller.signal, onFrame);
    const reader: ActiveReader = { controller, done };
    this.reader = reader;
    try {
      await done;
    } finally {
      if (this.reader === reader) this.reader = null;
    }
  }

  async write(frame: Frame): Promise<LinkResult> {
    if (this.status !== 'connected' || !this.driver) {
      return { success: false, error: LinkError.notConnected(this.options.path) };
    }

    const timeoutMs = this.options.writeTimeoutMs;
    const deadline = new Deadline(timeoutMs);
    const acquiring = this.writeLock.acquire();

    try {
      const release = await deadline.race(acquiring);
      if (release === TIMED_OUT) {
        // Give the lock back as soon as it is granted
        void acquiring.then((r) => r());
        return { success: false, error: LinkError.timeout(this.options.path, timeoutMs) };
      }

      const driver = this.driver;
      if (this.status !== 'connected' || !driver) {
        release();
        return { success: false, error: LinkError.notConnected(this.options.path) };
      }

      const writing = driver.write(frame);
      let outcome: void | typeof TIMED_OUT;
      try {
        outcome = await deadline.race(writing);
      } catch (e) {
        release();
        const error = LinkError.io(this.options.path, e);
        this.fail(error.message, driver);
        return { success: false, error };
      }

      if (outcome === TIMED_OUT) {
        // Hold the lock until the abandoned write settles so nothing interleaves with it
        void writing.then(release, (e: unknown) => {
          release();
          this.logger.warn('Timed-out write failed after the deadline', { error: String(e) });
        });
        this.logger.warn(`Write timed out after ${timeoutMs}ms`, { bytes: frame.length });
        return { success: false, error: LinkError.timeout(this.options.path, timeoutMs) };
      }

      release();
      this.logger.debug('WS → UART', { bytes: frame.length, hex: toHex(frame) });
      return OK;
    } finally {
      deadline.clear();
    }
  }

  isReading(): boolean {
    return this.reader !== null;
  }

  isConnected(): boolean {
    return this.status === 'connected';
  }

  getStatus(): LinkStatus {
    return this.status;
  }

  state(): SerialLinkState {
    return {
      port: this.options.path,
      baudRate: this.options.baudRate,
      byteSize: this.options.byteSize,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      readTimeoutMs: this.options.readTimeoutMs,
      writeTimeoutMs: this.options.writeTimeoutMs,
      status: this.status,
      lastError: this.lastError,
    };
  }

  uartStatus(): UartStatus {
    return toUartStatus(this.state());
  }

  private async openLocked(): Promise<LinkResult> {
    if (this.driver) {
      await this.closeLocked();
    }

    this.setStatus('connecting');
    const driver = this.createDriver(this.options);
    try {
      await driver.open();
    } catch (e) {
      const error = LinkError.openFailed(this.options.path, e);
      this.lastError = error.message;
      this.setStatus('error');
      this.logger.error(`Failed to open ${this.options.path}`, e);
      return { success: false, error };
    }

    this.driver = driver;
    this.lastError = null;
    this.setStatus('connected');
    this.logger.info(`Serial port open: ${this.options.path} @ ${this.options.baudRate} baud`, {
      byteSize: this.options.byteSize,
      parity: this.options.parity,
      stopBits: this.options.stopBits,
    });
    return OK;
  }

  private async closeLocked(): Promise<void> {
    const reader = this.reader;
    if (reader) {
      reader.controller.abort();
      await reader.done;
      if (this.reader === reader) this.reader = null;
    }

    const driver = this.driver;
    this.driver = null;
    if (driver) {
      try {
        await driver.close();
        this.logger.info(`Serial port closed: ${driver.path}`);
      } catch (e) {
        this.logger.error(`Error while closing ${driver.path}`, e);
      }
    }

    if (this.status !== 'disconnected') {
      this.setStatus('disconnected');
    }
  }

  private async runReader(driver: SerialDriver, signal: AbortSignal, onFrame: (frame: Frame) => void) {
    this.logger.debug('Read loop started');
    while (!signal.aborted && this.status === 'connected' && this.driver === driver) {
      let frame: Uint8Array | null;
      try {
        frame = await driver.read(this.options.readTimeoutMs, signal);
      } catch (e) {
        if (signal.aborted) break;
        this.fail(LinkError.io(this.options.path, e).message, driver);
        break;
      }

      if (!frame || frame.length === 0) continue;

      this.logger.debug('UART → WS', { bytes: frame.length, hex: toHex(frame) });
      try {
        onFrame(frame);
      } catch (e) {
        this.logger.error('Frame handler failed', e);
      }
    }
    this.logger.debug('Read loop exited');
  }

  /**
   * Degrade to error. Emits `fault` only on the transition, so a burst of failures
   * is reported once.
   */
  private fail(reason: string, driver: SerialDriver) {
    if (this.driver !== driver || this.status === 'error') return;
    this.lastError = reason;
    this.reader?.controller.abort();
    this.setStatus('error');
    this.logger.error(reason);
    this.events.emit('fault', { reason });
  }

  private setStatus(status: LinkStatus) {
    const previous = this.status;
    this.status = status;
    this.events.emit('status', { status, previous });
  }
}

const TIMED_OUT = Symbol('timed-out');

class Deadline {
  private timer: NodeJS.Timeout | null = null;
  private expired: Promise<typeof TIMED_OUT>;

  constructor(timeoutMs: number) {
    this.expired = new Promise((resolve) => {
      this.timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });
  }

  race<T>(task: Promise<T>): Promise<T | typeof TIMED_OUT> {
    return Promise.race([task, this.expired]);
  }

  clear() {
    if (this.timer) clearTimeout(this.timer);
  }
}

function toHex(data: Uint8Array, max = 64): string {
  const hex = Buffer.from(data.subarray(0, max)).toString('hex');
  return data.length > max ? `${hex}…` : hex;
}

import { SerialPort } from 'serialport';
import { Channel } from '../../../core/channel';
import type { SerialOptions } from '../types';
import type { SerialDriver } from './types';

// Chunks buffered between the port and the read loop before the port is paused
const READ_CHANNEL_CAPACITY = 64;

export class NativeSerialDriver implements SerialDriver {
  public readonly type = 'serial';
  public readonly path: string;

  private port: SerialPort | null = null;
  private channel: Channel<Buffer>;
  private closing = false;

  constructor(private options: SerialOptions) {
    this.path = options.path;
    this.channel = new Channel<Buffer>(READ_CHANNEL_CAPACITY, () => this.port?.resume());
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(): Promise<void> {
    const port = new SerialPort({
      path: this.options.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.byteSize,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    port.on('data', (chunk: Buffer) => {
      if (!this.channel.push(chunk)) {
        port.pause();
      }
    });

    port.on('error', (err: Error) => {
      this.channel.fail(err);
    });

    port.on('close', () => {
      if (!this.closing) {
        this.channel.fail(new Error(`Serial port ${this.path} closed unexpectedly`));
      }
    });

    this.port = port;
  }

  async read(timeoutMs: number, signal?: AbortSignal): Promise<Uint8Array | null> {
    const first = await this.channel.take(timeoutMs, signal);
    if (!first) return null;

    // Coalesce whatever else arrived while the reader was busy
    const rest = this.channel.drain();
    return rest.length === 0 ? first : Buffer.concat([first, ...rest]);
  }

  async write(data: Uint8Array): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) throw new Error(`Serial port ${this.path} is not open`);

    await new Promise<void>((resolve, reject) => {
      port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.closing = true;
    this.channel.close();
    if (!port) return;

    await new Promise<void>((resolve, reject) => {
      if (port.isOpen) {
        port.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      } else {
        resolve();
      }
    });
    port.removeAllListeners();
    this.port = null;
  }
}

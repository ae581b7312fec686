import type { SerialOptions } from '../types';

/**
 * Exclusive handle to one serial device. Owned by SerialLink, which guarantees
 * a single reader and serialized writes.
 */
export interface SerialDriver {
  readonly type: string;
  readonly path: string;
  readonly isOpen: boolean;

  open(): Promise<void>;
  close(): Promise<void>;

  /**
   * Wait up to `timeoutMs` for incoming bytes. Resolves `null` on timeout or abort,
   * rejects on a hard I/O error.
   */
  read(timeoutMs: number, signal?: AbortSignal): Promise<Uint8Array | null>;

  write(data: Uint8Array): Promise<void>;
}

export type SerialDriverFactory = (options: SerialOptions) => SerialDriver;

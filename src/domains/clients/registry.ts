import { randomUUID } from 'crypto';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import type { Frame } from '../serial/types';
import { OutboundQueue } from './outbound-queue';
import {
  controlMessage,
  type ClientHandle,
  type ClientInfo,
  type ClientTransport,
  type ControlMessage,
  type OutboundMessage,
} from './types';

export const SLOW_CLIENT_WARNING = 'Client is not keeping up; serial data is being dropped for this connection';

class ClientConnection implements ClientHandle {
  readonly id = randomUUID();
  readonly connectedAt = new Date();
  readonly queue: OutboundQueue;

  pump: Promise<void> | null = null;
  overflowed = false;
  dropped = 0;
  closed = false;

  constructor(
    readonly transport: ClientTransport,
    queueSize: number,
    readonly remoteAddress?: string
  ) {
    this.queue = new OutboundQueue(queueSize);
  }
}

export interface ClientRegistryOptions {
  // Data frames buffered per client before new frames are dropped
  queueSize: number;
}

/**
 * Live set of WebSocket clients.
 *
 * Broadcast only enqueues: every client has its own pump that sends queued
 * messages in order, so a slow or stalled peer never holds up the others.
 */
export class ClientRegistry {
  private clients = new Map<string, ClientConnection>();
  private logger: Logger;

  constructor(private options: ClientRegistryOptions, logger: Logger = rootLogger) {
    this.logger = logger.child({ component: 'ClientRegistry' });
  }

  register(transport: ClientTransport, remoteAddress?: string): ClientHandle {
    const conn = new ClientConnection(transport, this.options.queueSize, remoteAddress);
    this.clients.set(conn.id, conn);
    this.logger.info(`Client connected: ${remoteAddress ?? 'unknown'}`, { clientId: conn.id, clients: this.clients.size });
    return conn;
  }

  /**
   * Returns false when the client was already removed.
   */
  unregister(handle: ClientHandle): boolean {
    const conn = this.clients.get(handle.id);
    if (!conn) return false;

    conn.closed = true;
    conn.queue.clear();
    this.clients.delete(handle.id);
    this.logger.info(`Client disconnected: ${conn.remoteAddress ?? 'unknown'}`, {
      clientId: conn.id,
      dropped: conn.dropped,
      clients: this.clients.size,
    });
    return true;
  }

  /**
   * Enqueue `frame` for every client registered right now. Returns the number of
   * clients it was offered to.
   */
  broadcast(frame: Frame): number {
    const snapshot = Array.from(this.clients.values());
    for (const conn of snapshot) {
      if (conn.closed) continue;

      if (!conn.queue.offerData(frame)) {
        conn.dropped++;
        if (!conn.overflowed) {
          conn.overflowed = true;
          conn.queue.pushControl(controlMessage('warning', SLOW_CLIENT_WARNING));
          this.logger.warn('Outbound queue full, dropping frames', { clientId: conn.id });
        }
      }
      this.schedule(conn);
    }
    return snapshot.length;
  }

  sendControl(target: ClientHandle | 'all', message: ControlMessage) {
    const targets = target === 'all'
      ? Array.from(this.clients.values())
      : [this.clients.get(target.id)];

    for (const conn of targets) {
      if (!conn || conn.closed) continue;
      conn.queue.pushControl(message);
      this.schedule(conn);
    }
  }

  has(handle: ClientHandle): boolean {
    return this.clients.has(handle.id);
  }

  count(): number {
    return this.clients.size;
  }

  list(): ClientInfo[] {
    return Array.from(this.clients.values()).map((conn) => ({
      id: conn.id,
      connectedAt: conn.connectedAt.toISOString(),
      remoteAddress: conn.remoteAddress ?? null,
      queued: conn.queue.size,
      dropped: conn.dropped,
    }));
  }

  /**
   * Resolves once every client's queue has been handed to its transport.
   */
  async whenIdle(): Promise<void> {
    for (;;) {
      const pumps = Array.from(this.clients.values())
        .map((conn) => conn.pump)
        .filter((pump): pump is Promise<void> => pump !== null);
      if (pumps.length === 0) return;
      await Promise.all(pumps);
    }
  }

  closeAll(code = 1001, reason = 'Server shutting down') {
    for (const conn of Array.from(this.clients.values())) {
      this.unregister(conn);
      this.closeTransport(conn, code, reason);
    }
  }

  private schedule(conn: ClientConnection) {
    if (conn.pump || conn.closed) return;
    conn.pump = this.drain(conn).finally(() => {
      conn.pump = null;
      if (!conn.closed && !conn.queue.isEmpty) this.schedule(conn);
    });
  }

  private async drain(conn: ClientConnection): Promise<void> {
    let message = conn.queue.shift();
    while (message && !conn.closed) {
      try {
        await conn.transport.send(encode(message));
      } catch (e) {
        this.logger.warn('Send failed, dropping client', { clientId: conn.id, error: String(e) });
        this.unregister(conn);
        this.closeTransport(conn, 1011, 'Send failed');
        return;
      }
      message = conn.queue.shift();
    }
    // Queue fully drained: the next overflow is a new episode
    conn.overflowed = false;
  }

  private closeTransport(conn: ClientConnection, code: number, reason: string) {
    try {
      conn.transport.close(code, reason);
    } catch (e) {
      this.logger.debug('Transport close failed', { clientId: conn.id, error: String(e) });
    }
  }
}

function encode(message: OutboundMessage): Uint8Array | string {
  return message.kind === 'data' ? message.frame : JSON.stringify(message.message);
}

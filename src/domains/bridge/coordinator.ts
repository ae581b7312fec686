import { AsyncMutex } from '../../core/mutex';
import type { ClientRegistry } from '../clients/registry';
import { controlMessage, type ClientHandle, type ClientInfo, type ClientTransport } from '../clients/types';
import { rootLogger } from '../observability/logger';
import type { Logger } from '../observability/types';
import type { LinkResult } from '../serial/errors';
import type { SerialLink } from '../serial/link';
import type { Frame, SerialLinkState, UartStatus } from '../serial/types';

export const WELCOME_MESSAGE = 'Connected to UART WebSocket Bridge';
export const TEXT_NOT_FORWARDED = 'Text messages are not forwarded to the serial link; send binary data';

export type InboundMessage =
  | { kind: 'binary'; data: Uint8Array }
  | { kind: 'text'; data: string };

export interface BridgeOptions {
  // Largest client payload forwarded to the device, in bytes
  maxMessageSize: number;
}

export interface BridgeStatus {
  link: SerialLinkState;
  uart: UartStatus;
  clients: number;
}

/**
 * Wires the serial link to the client registry: device frames fan out to every
 * client, binary client messages go to the device.
 */
export class BridgeCoordinator {
  private reading: Promise<void> | null = null;
  private lifecycleLock = new AsyncMutex();
  private faults = 0;
  private logger: Logger;

  constructor(
    private link: SerialLink,
    private registry: ClientRegistry,
    private options: BridgeOptions,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'Bridge' });

    // One notification per transition into error, whoever caused it
    this.link.events.on('fault', ({ reason }) => {
      this.faults++;
      this.registry.sendControl('all', controlMessage('error', `Serial link error: ${reason}`, this.link.uartStatus()));
    });
  }

  async start(): Promise<LinkResult> {
    return this.lifecycleLock.runExclusive(async () => {
      const result = await this.link.open();
      if (result.success) {
        this.startReader();
      } else {
        this.logger.warn('Serial link unavailable; serving clients until an explicit reconnect', {
          error: result.error.message,
        });
      }
      return result;
    });
  }

  async stop(): Promise<void> {
    await this.lifecycleLock.runExclusive(async () => {
      await this.link.close();
      await this.reading;
      this.reading = null;
      this.closeClients(1001, 'Server shutting down');
    });
  }

  /**
   * Close and reopen the link, then resume relaying. Clients stay connected and
   * are told the outcome.
   */
  async reconnect(): Promise<LinkResult> {
    return this.lifecycleLock.runExclusive(async () => {
      const result = await this.link.reconnect();
      await this.reading;
      this.reading = null;

      if (result.success) {
        this.startReader();
        this.registry.sendControl('all', controlMessage('info', 'Serial link reconnected', this.link.uartStatus()));
      } else {
        this.registry.sendControl(
          'all',
          controlMessage('error', `Serial link reconnect failed: ${result.error.message}`, this.link.uartStatus())
        );
      }
      return result;
    });
  }

  connect(transport: ClientTransport, remoteAddress?: string): ClientHandle {
    const handle = this.registry.register(transport, remoteAddress);
    this.registry.sendControl(handle, controlMessage('info', WELCOME_MESSAGE, this.link.uartStatus()));
    return handle;
  }

  disconnect(handle: ClientHandle): boolean {
    return this.registry.unregister(handle);
  }

  closeClients(code: number, reason: string) {
    this.registry.closeAll(code, reason);
  }

  async handleMessage(handle: ClientHandle, message: InboundMessage): Promise<void> {
    if (!this.registry.has(handle)) return;

    if (message.kind === 'text') {
      this.registry.sendControl(handle, controlMessage('warning', TEXT_NOT_FORWARDED));
      return;
    }

    const { data } = message;
    if (data.length > this.options.maxMessageSize) {
      this.registry.sendControl(
        handle,
        controlMessage('error', `Message of ${data.length} bytes exceeds the ${this.options.maxMessageSize} byte limit`)
      );
      return;
    }
    if (data.length === 0) return;

    const faultsBefore = this.faults;
    const result = await this.link.write(data);
    if (result.success) return;

    // A fault raised by this very write has already been broadcast to everyone
    if (this.faults !== faultsBefore) return;

    this.logger.warn('Write from client failed', { clientId: handle.id, code: result.error.code });
    this.registry.sendControl(
      handle,
      controlMessage('error', `Failed to send data to UART: ${result.error.message}`, this.link.uartStatus())
    );
  }

  async send(frame: Frame): Promise<LinkResult> {
    return this.link.write(frame);
  }

  status(): BridgeStatus {
    return {
      link: this.link.state(),
      uart: this.link.uartStatus(),
      clients: this.registry.count(),
    };
  }

  clients(): ClientInfo[] {
    return this.registry.list();
  }

  private startReader() {
    if (this.link.isReading()) return;
    this.reading = this.link
      .readLoop((frame) => {
        this.registry.broadcast(frame);
      })
      .catch((e: unknown) => {
        this.logger.error('Read loop terminated unexpectedly', e);
      });
  }
}

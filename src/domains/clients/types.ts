import type { Frame, UartStatus } from '../serial/types';

export type ControlType = 'info' | 'warning' | 'error';

export interface ControlMessage {
  type: ControlType;
  message: string;
  uartStatus?: UartStatus;
  // ISO 8601
  timestamp: string;
}

export type OutboundMessage =
  | { kind: 'data'; frame: Frame }
  | { kind: 'control'; message: ControlMessage };

/**
 * The network side of one client. `send` settles once the socket has accepted
 * the payload; a rejection means the connection is gone.
 */
export interface ClientTransport {
  send(payload: Uint8Array | string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface ClientHandle {
  readonly id: string;
  readonly connectedAt: Date;
  readonly remoteAddress?: string;
}

export interface ClientInfo {
  id: string;
  connectedAt: string;
  remoteAddress: string | null;
  queued: number;
  dropped: number;
}

export function controlMessage(type: ControlType, message: string, uartStatus?: UartStatus): ControlMessage {
  const control: ControlMessage = { type, message, timestamp: new Date().toISOString() };
  if (uartStatus) control.uartStatus = uartStatus;
  return control;
}

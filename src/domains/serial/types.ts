export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';
export type ParityCode = 'N' | 'E' | 'O' | 'M' | 'S';
export type ByteSize = 5 | 6 | 7 | 8;
export type StopBits = 1 | 2;

export const PARITY_CODES: Record<Parity, ParityCode> = {
  none: 'N',
  even: 'E',
  odd: 'O',
  mark: 'M',
  space: 'S',
};

/**
 * One opaque chunk of bytes read from the device or received from a client.
 */
export type Frame = Uint8Array;

export interface SerialOptions {
  path: string;
  baudRate: number;
  byteSize: ByteSize;
  stopBits: StopBits;
  parity: Parity;
  readTimeoutMs: number;
  writeTimeoutMs: number;
}

export type LinkStatus = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface SerialLinkState {
  port: string;
  baudRate: number;
  byteSize: ByteSize;
  stopBits: StopBits;
  parity: Parity;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  status: LinkStatus;
  lastError: string | null;
}

// Snapshot shape sent to WebSocket clients and returned by the HTTP API
export interface UartStatus {
  connected: boolean;
  port: string;
  baudrate: number;
  bytesize: ByteSize;
  stopbits: StopBits;
  parity: ParityCode;
}

export function toUartStatus(state: SerialLinkState): UartStatus {
  return {
    connected: state.status === 'connected',
    port: state.port,
    baudrate: state.baudRate,
    bytesize: state.byteSize,
    stopbits: state.stopBits,
    parity: PARITY_CODES[state.parity],
  };
}

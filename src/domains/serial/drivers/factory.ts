import type { SerialOptions } from '../types';
import type { SerialDriver } from './types';
import { MockSerialDriver, MOCK_PATH_PREFIX } from './mock-serial';
import { NativeSerialDriver } from './serial';

/**
 * Pick a driver for the configured path. `mock://loopback` gives an echoing
 * in-process device, any other `mock://` path a silent one.
 */
export function createSerialDriver(options: SerialOptions): SerialDriver {
  if (options.path.startsWith(MOCK_PATH_PREFIX)) {
    const name = options.path.slice(MOCK_PATH_PREFIX.length);
    return new MockSerialDriver(options.path, {
      loopback: name === 'loopback',
      scenario: name === 'ping' ? [{ match: 'PING', reply: 'PONG' }] : [],
    });
  }
  return new NativeSerialDriver(options);
}

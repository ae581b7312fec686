import type { ControlMessage, OutboundMessage } from './types';
import type { Frame } from '../serial/types';

/**
 * Per-client FIFO. Data frames are bounded by `capacity`; when full, new frames
 * are refused rather than evicting older ones, so what a client does receive is
 * still a prefix-ordered subsequence of the serial stream. Control messages are
 * never refused.
 */
export class OutboundQueue {
  private items: OutboundMessage[] = [];
  private dataCount = 0;

  constructor(private readonly capacity: number) {}

  offerData(frame: Frame): boolean {
    if (this.dataCount >= this.capacity) return false;
    this.items.push({ kind: 'data', frame });
    this.dataCount++;
    return true;
  }

  pushControl(message: ControlMessage) {
    this.items.push({ kind: 'control', message });
  }

  shift(): OutboundMessage | undefined {
    const item = this.items.shift();
    if (item?.kind === 'data') this.dataCount--;
    return item;
  }

  clear() {
    this.items = [];
    this.dataCount = 0;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }
}

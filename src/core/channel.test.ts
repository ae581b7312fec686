import { describe, it, expect, vi } from 'vitest';
import { Channel } from './channel';

describe('Channel', () => {
  it('should hand items over in order', async () => {
    const channel = new Channel<string>(4);
    channel.push('a');
    channel.push('b');

    expect(await channel.take(10)).toBe('a');
    expect(await channel.take(10)).toBe('b');
    expect(channel.size).toBe(0);
  });

  it('should resolve a pending take as soon as an item arrives', async () => {
    const channel = new Channel<string>(4);
    const pending = channel.take(1000);

    expect(channel.push('x')).toBe(true);
    expect(await pending).toBe('x');
  });

  it('should resolve null when the timeout elapses', async () => {
    const channel = new Channel<string>(4);
    expect(await channel.take(5)).toBeNull();
  });

  it('should report a full channel and call onDrain once it has room again', async () => {
    const onDrain = vi.fn();
    const channel = new Channel<number>(2, onDrain);

    expect(channel.push(1)).toBe(true);
    expect(channel.push(2)).toBe(false);
    expect(channel.size).toBe(2);

    expect(await channel.take(10)).toBe(1);
    expect(onDrain).toHaveBeenCalledTimes(1);
  });

  it('should reject a second concurrent take', async () => {
    const channel = new Channel<string>(4);
    const first = channel.take(1000);

    await expect(channel.take(1000)).rejects.toThrow('Channel already has a pending reader');

    channel.close();
    expect(await first).toBeNull();
  });

  it('should resolve null when the signal aborts', async () => {
    const channel = new Channel<string>(4);
    const controller = new AbortController();
    const pending = channel.take(1000, controller.signal);

    controller.abort();
    expect(await pending).toBeNull();
  });

  it('should keep buffered items readable after a failure', async () => {
    const channel = new Channel<string>(4);
    channel.push('last');
    channel.fail(new Error('unplugged'));

    expect(channel.push('late')).toBe(false);
    expect(await channel.take(10)).toBe('last');
    await expect(channel.take(10)).rejects.toThrow('unplugged');
  });

  it('should return everything buffered from drain', () => {
    const channel = new Channel<number>(8);
    channel.push(1);
    channel.push(2);
    channel.push(3);

    expect(channel.drain()).toEqual([1, 2, 3]);
    expect(channel.size).toBe(0);
  });

  it('should reject a capacity below one', () => {
    expect(() => new Channel<number>(0)).toThrow(RangeError);
  });
});

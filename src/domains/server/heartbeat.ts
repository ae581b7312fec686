export interface PingTarget {
  ping(): void;
  terminate(): void;
}

export interface HeartbeatOptions {
  intervalMs: number;
  timeoutMs: number;
  onTimeout?: () => void;
}

/**
 * Pings a WebSocket peer every `intervalMs` and terminates it when a pong does
 * not arrive within `timeoutMs`. Call `pong()` from the socket's pong handler.
 */
export class Heartbeat {
  private interval: NodeJS.Timeout | null = null;
  private deadline: NodeJS.Timeout | null = null;

  constructor(private target: PingTarget, private options: HeartbeatOptions) {}

  start() {
    if (this.interval) return;
    this.interval = setInterval(() => this.beat(), this.options.intervalMs);
  }

  pong() {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }
  }

  stop() {
    if (this.interval) clearInterval(this.interval);
    this.interval = null;
    this.pong();
  }

  private beat() {
    // Previous ping still unanswered: the deadline timer owns that case
    if (this.deadline) return;

    try {
      this.target.ping();
    } catch {
      this.expire();
      return;
    }
    this.deadline = setTimeout(() => this.expire(), this.options.timeoutMs);
  }

  private expire() {
    this.stop();
    this.options.onTimeout?.();
    this.target.terminate();
  }
}

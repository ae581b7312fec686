export type LinkErrorCode = 'NOT_CONNECTED' | 'OPEN_FAILED' | 'TIMEOUT' | 'IO_ERROR';

export class LinkError extends Error {
  readonly code: LinkErrorCode;

  constructor(code: LinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkError';
    this.code = code;
  }

  static notConnected(port: string) {
    return new LinkError('NOT_CONNECTED', `Serial port ${port} is not connected`);
  }

  static openFailed(port: string, cause: unknown) {
    return new LinkError('OPEN_FAILED', `Failed to open serial port ${port}: ${describe(cause)}`, { cause });
  }

  static timeout(port: string, timeoutMs: number) {
    return new LinkError('TIMEOUT', `Write to ${port} timed out after ${timeoutMs}ms`);
  }

  static io(port: string, cause: unknown) {
    return new LinkError('IO_ERROR', `I/O error on ${port}: ${describe(cause)}`, { cause });
  }
}

export type LinkResult = { success: true } | { success: false; error: LinkError };

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

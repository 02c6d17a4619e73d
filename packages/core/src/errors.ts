/**
 * Error types shared by the organizer pipeline.
 */

export class SortboxError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = options?.code ?? 'SORTBOX_ERROR';
    this.context = options?.context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unreadable or invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends SortboxError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, { ...options, code: 'CONFIGURATION_ERROR' });
  }
}

/**
 * A wait was abandoned because its abort signal fired.
 */
export class CancelledError extends SortboxError {
  constructor(message = 'Operation cancelled') {
    super(message, { code: 'CANCELLED' });
  }
}

/**
 * Put or take on a queue that has been closed.
 */
export class QueueClosedError extends SortboxError {
  constructor(message = 'Queue is closed') {
    super(message, { code: 'QUEUE_CLOSED' });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

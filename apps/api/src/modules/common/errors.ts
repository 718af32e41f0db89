export class ConnectivityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectivityError";
  }
}

export class CollaboratorError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "CollaboratorError";
  }
}

export class BridgeTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Async operation timed out after ${timeoutMs}ms`);
    this.name = "BridgeTimeoutError";
  }
}

/** Raised by interruptible waits. Loops let it unwind instead of handling it. */
export class CancellationError extends Error {
  constructor(message = "Task cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

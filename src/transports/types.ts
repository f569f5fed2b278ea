/**
 * Transport contract
 * A transport fetches the bytes of one Drive file into a destination path
 */

export interface TransportResult {
  ok: boolean;
  // Error output of the attempt; checked for rate-limit wording
  diagnostic: string;
}

export interface Transport {
  readonly name: string;

  /**
   * Fetch `resourceId` into `destinationPath`.
   * Rejects with TransportTimeoutError when `timeoutMs` elapses; any other
   * rejection is a non-transient fault.
   */
  fetch(
    resourceId: string,
    destinationPath: string,
    timeoutMs: number,
  ): Promise<TransportResult>;

  /**
   * Verify the transport can run, installing it when possible.
   * Rejects with TransportUnavailableError when it cannot.
   */
  ensureAvailable(report?: (message: string) => void): Promise<void>;
}

export class TransportTimeoutError extends Error {
  constructor(
    readonly resourceId: string,
    readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms fetching ${resourceId}`);
    this.name = "TransportTimeoutError";
  }
}

export class TransportUnavailableError extends Error {
  constructor(
    readonly transport: string,
    details: string,
  ) {
    super(`${transport} is not available: ${details}`);
    this.name = "TransportUnavailableError";
  }
}

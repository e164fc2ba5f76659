/**
 * Error taxonomy for the detection and execution engine.
 *
 * Venue adapters throw TransientVenueError / FatalVenueError; the core turns
 * timeouts into VenueTimeoutError and the remaining classes describe why an
 * opportunity could not be realized.
 */

/** Base error for everything raised by the engine */
export class ArbitrageEngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ArbitrageEngineError";
  }
}

/** Network or rate-limit failure at a venue; retried with backoff */
export class TransientVenueError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    context?: Record<string, unknown>,
  ) {
    super(message, "TRANSIENT_VENUE_ERROR", { venue, ...context });
    this.name = "TransientVenueError";
  }
}

/** A venue call exceeded its bounded timeout */
export class VenueTimeoutError extends TransientVenueError {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
    venue = "unknown",
  ) {
    super(`${label} timed out after ${timeoutMs}ms`, venue, { label, timeoutMs });
    this.name = "VenueTimeoutError";
  }
}

/** Non-recoverable venue failure (bad credentials, unsupported market, ...) */
export class FatalVenueError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    context?: Record<string, unknown>,
  ) {
    super(message, "FATAL_VENUE_ERROR", { venue, ...context });
    this.name = "FatalVenueError";
  }
}

/** The venue declined an order */
export class RejectedOrderError extends ArbitrageEngineError {
  constructor(
    message: string,
    public readonly venue: string,
    public readonly marketId: string,
  ) {
    super(message, "REJECTED_ORDER", { venue, marketId });
    this.name = "RejectedOrderError";
  }
}

/** Quote or catalog data older than its staleness bound, or missing */
export class StaleDataError extends ArbitrageEngineError {
  constructor(
    public readonly key: string,
    public readonly ageMs?: number,
  ) {
    super(
      ageMs === undefined ? `No quote for ${key}` : `Quote for ${key} is ${ageMs}ms old`,
      "STALE_DATA",
      { key, ageMs },
    );
    this.name = "StaleDataError";
  }
}

/** Capital ceiling reached; the execution is refused, not queued */
export class CapacityExceededError extends ArbitrageEngineError {
  constructor(
    public readonly requested: bigint,
    public readonly committed: bigint,
    public readonly ceiling: bigint,
  ) {
    super(
      `Capital ceiling reached: committed ${committed} + requested ${requested} > ${ceiling}`,
      "CAPACITY_EXCEEDED",
      { requested: requested.toString(), committed: committed.toString(), ceiling: ceiling.toString() },
    );
    this.name = "CapacityExceededError";
  }
}

/** One leg landed and could not be flattened */
export class UnhedgedExposureError extends ArbitrageEngineError {
  constructor(
    public readonly positionId: string,
    public readonly venue: string,
    public readonly marketId: string,
    public readonly size: number,
  ) {
    super(
      `Unhedged exposure on ${venue}:${marketId} (${size} contracts) in position ${positionId}`,
      "UNHEDGED_EXPOSURE",
      { positionId, venue, marketId, size },
    );
    this.name = "UnhedgedExposureError";
  }
}

export function isTransientVenueError(error: unknown): error is TransientVenueError {
  return error instanceof TransientVenueError;
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

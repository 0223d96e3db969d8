/**
 * Errors raised by the record/replay harness.
 * @module simulation/errors
 */

/**
 * Harness failure kinds. All of them are fatal for the running test.
 */
export enum SimulationErrorKind {
  SnapshotNotFound = 'snapshot_not_found',
  SnapshotExhausted = 'snapshot_exhausted',
  CallMismatch = 'call_mismatch',
  ParseError = 'parse_error',
  PersistenceError = 'persistence_error',
  ClientClosed = 'client_closed',
}

/**
 * Context attached to a {@link SimulationError}.
 */
export interface SimulationErrorDetails {
  scenario?: string;
  path?: string;
  /** Replay position when the error was raised. */
  cursor?: number;
  cause?: unknown;
}

/**
 * Error raised by the snapshot store, the replayer or the facade.
 *
 * Upstream API failures are never wrapped in this class; they surface as
 * `GitHubError` in every mode.
 */
export class SimulationError extends Error {
  readonly kind: SimulationErrorKind;
  readonly scenario?: string;
  readonly path?: string;
  readonly cursor?: number;

  constructor(kind: SimulationErrorKind, message: string, details: SimulationErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'SimulationError';
    this.kind = kind;
    this.scenario = details.scenario;
    this.path = details.path;
    this.cursor = details.cursor;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationError);
    }
  }

  toString(): string {
    let str = `[${this.kind}] ${this.message}`;
    if (this.path) {
      str += ` (${this.path})`;
    }
    return str;
  }
}

export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}

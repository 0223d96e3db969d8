/**
 * Capture of live calls into a snapshot.
 * @module simulation/recorder
 */

import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { encodeError, encodeSuccess, SUCCESS_STATUS } from './codec.js';
import { SimulationError, SimulationErrorKind } from './errors.js';
import { appendInteraction, type CallDescriptor, type Interaction, type Snapshot } from './types.js';

export interface CallRecorderOptions {
  logger?: Logger;
  /** Clock used for interaction timestamps. */
  now?: () => Date;
}

/**
 * Appends one interaction per invoked call. Results and live errors pass
 * through untouched; only the in-memory snapshot changes.
 */
export class CallRecorder {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly snapshot: Snapshot,
    options: CallRecorderOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.snapshot.calls.length;
  }

  /**
   * @throws The live call's own error, after recording it.
   * @throws {SimulationError} `parse_error` when a successful result cannot
   *   be serialized; nothing is appended.
   */
  async record<T>(call: CallDescriptor, invoke: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await invoke();
    } catch (error) {
      const encoded = encodeError(error);
      this.append(call, encoded.status, encoded.payload);
      throw error;
    }

    let payload: string;
    try {
      payload = encodeSuccess(result);
    } catch (error) {
      throw new SimulationError(
        SimulationErrorKind.ParseError,
        `Result of ${call.method} ${call.target} cannot be serialized: ${error instanceof Error ? error.message : String(error)}`,
        { scenario: this.snapshot.testName, cause: error }
      );
    }
    this.append(call, SUCCESS_STATUS, payload);
    return result;
  }

  private append(call: CallDescriptor, statusCode: number, response: string): void {
    const interaction: Interaction = {
      method: call.method,
      url: call.target,
      ...(call.requestBody !== undefined ? { requestBody: call.requestBody } : {}),
      statusCode,
      response,
      timestamp: this.now().toISOString(),
    };
    appendInteraction(this.snapshot, interaction);

    this.logger.debug('Recorded interaction', {
      scenario: this.snapshot.testName,
      index: this.snapshot.calls.length - 1,
      method: call.method,
      url: call.target,
      status: statusCode,
    });
  }
}

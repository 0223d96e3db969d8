/**
 * Sequential replay of recorded interactions.
 * @module simulation/replayer
 */

import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { decodeError, isSuccessStatus, type PayloadDecoder } from './codec.js';
import { SimulationError, SimulationErrorKind } from './errors.js';
import { MatchPolicy, type CallDescriptor, type Snapshot } from './types.js';

export interface CallReplayerOptions {
  matchPolicy?: MatchPolicy;
  logger?: Logger;
}

/**
 * Serves recorded interactions in file order.
 *
 * The cursor starts at zero and moves forward by one for every served
 * interaction, including ones that fail to match or decode. It never moves
 * past the end of the log.
 */
export class CallReplayer {
  private position = 0;
  private readonly matchPolicy: MatchPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly snapshot: Snapshot,
    options: CallReplayerOptions = {}
  ) {
    this.matchPolicy = options.matchPolicy ?? MatchPolicy.Sequential;
    this.logger = options.logger ?? new NoopLogger();
  }

  get cursor(): number {
    return this.position;
  }

  get remaining(): number {
    return this.snapshot.calls.length - this.position;
  }

  get exhausted(): boolean {
    return this.remaining === 0;
  }

  /**
   * Serves the next interaction.
   *
   * @throws {SimulationError} `snapshot_exhausted`, `call_mismatch` or
   *   `parse_error`.
   * @throws {GitHubError} The recorded upstream failure.
   */
  async replay<T>(call: CallDescriptor, decode: PayloadDecoder<T>): Promise<T> {
    const scenario = this.snapshot.testName;
    const index = this.position;

    if (index >= this.snapshot.calls.length) {
      throw new SimulationError(
        SimulationErrorKind.SnapshotExhausted,
        `Snapshot "${scenario}" exhausted: ${call.method} ${call.target} requested after ${index} recorded calls`,
        { scenario, cursor: index }
      );
    }

    const interaction = this.snapshot.calls[index];
    this.position = index + 1;

    this.logger.debug('Replaying interaction', {
      scenario,
      index,
      method: interaction.method,
      url: interaction.url,
      status: interaction.statusCode,
    });

    if (
      this.matchPolicy === MatchPolicy.Strict &&
      (interaction.method !== call.method || interaction.url !== call.target)
    ) {
      throw new SimulationError(
        SimulationErrorKind.CallMismatch,
        `Call ${index} of "${scenario}" mismatch: requested ${call.method} ${call.target}, recorded ${interaction.method} ${interaction.url}`,
        { scenario, cursor: index }
      );
    }

    if (!isSuccessStatus(interaction.statusCode)) {
      throw decodeError(interaction.response, interaction.statusCode);
    }

    try {
      return decode(interaction.response);
    } catch (error) {
      if (error instanceof SimulationError) {
        throw new SimulationError(error.kind, `Call ${index} of "${scenario}": ${error.message}`, {
          scenario,
          cursor: index,
          cause: error.cause,
        });
      }
      throw error;
    }
  }
}

/**
 * Configuration for the snapshot harness.
 * @module simulation/config
 */

import { resolveMatchPolicy, resolveSimulationMode } from './mode.js';
import type { MatchPolicy, SimulationMode } from './types.js';

/** Directory snapshots are stored in, relative to the working directory. */
export const DEFAULT_SNAPSHOT_DIRECTORY = 'testdata/snapshots';

/**
 * Resolved harness configuration.
 */
export interface SimulationConfig {
  mode: SimulationMode;
  snapshotDirectory: string;
  matchPolicy: MatchPolicy;
}

/**
 * Unvalidated settings, e.g. straight from the environment.
 */
export interface SimulationSettings {
  mode?: string;
  snapshotDirectory?: string;
  matchPolicy?: string;
}

export function resolveSimulationConfig(settings: SimulationSettings = {}): SimulationConfig {
  const directory = settings.snapshotDirectory?.trim();
  return {
    mode: resolveSimulationMode(settings.mode),
    snapshotDirectory: directory ? directory : DEFAULT_SNAPSHOT_DIRECTORY,
    matchPolicy: resolveMatchPolicy(settings.matchPolicy),
  };
}

/**
 * Reads `SNAPSHOT_MODE`, `SNAPSHOT_DIR` and `SNAPSHOT_MATCH`.
 */
export function simulationSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): SimulationSettings {
  return {
    mode: env.SNAPSHOT_MODE,
    snapshotDirectory: env.SNAPSHOT_DIR,
    matchPolicy: env.SNAPSHOT_MATCH,
  };
}

/**
 * Resolution of the simulation mode and match policy from loose settings.
 * @module simulation/mode
 */

import { MatchPolicy, SimulationMode } from './types.js';

const MODES: readonly SimulationMode[] = Object.values(SimulationMode);
const POLICIES: readonly MatchPolicy[] = Object.values(MatchPolicy);

/**
 * Maps a configured value onto a {@link SimulationMode}.
 *
 * Matching ignores case and surrounding whitespace. Unset or unrecognized
 * values resolve to {@link SimulationMode.Replay}, so a test run never
 * reaches the network unless asked to.
 */
export function resolveSimulationMode(value?: string | null): SimulationMode {
  const normalized = value?.trim().toLowerCase();
  return MODES.find((mode) => mode === normalized) ?? SimulationMode.Replay;
}

/**
 * Maps a configured value onto a {@link MatchPolicy}; defaults to sequential.
 */
export function resolveMatchPolicy(value?: string | null): MatchPolicy {
  const normalized = value?.trim().toLowerCase();
  return POLICIES.find((policy) => policy === normalized) ?? MatchPolicy.Sequential;
}

/**
 * Calibration table for the composite scorer, tier bands and diagnostics.
 *
 * The weights are tunable policy. Tests pin behavior (determinism,
 * monotonicity, strategy sensitivity), not these exact numbers.
 */

import { Strategy } from './lineup-optimizer.model';

export interface StrategyWeights {
  projectionA: number;
  projectionB: number;
  matchup: number;
  floor: number;
  ceiling: number;
  /** Multiplier on log10(1 + adds) added on top of the weighted average */
  trending: number;
}

/**
 * floor and ceiling mirror each other except for the floor/ceiling weights,
 * so the two strategies always disagree when floor != ceiling.
 */
export const STRATEGY_WEIGHTS: Readonly<Record<Strategy, Readonly<StrategyWeights>>> = Object.freeze({
  balanced: Object.freeze({
    projectionA: 1,
    projectionB: 1,
    matchup: 1,
    floor: 0.25,
    ceiling: 0.25,
    trending: 0.5,
  }),
  floor: Object.freeze({
    projectionA: 0.75,
    projectionB: 0.75,
    matchup: 0.5,
    floor: 2,
    ceiling: 0,
    trending: 0.35,
  }),
  ceiling: Object.freeze({
    projectionA: 0.75,
    projectionB: 0.75,
    matchup: 0.5,
    floor: 0,
    ceiling: 2,
    trending: 0.35,
  }),
});

/** Matchup score at which the matchup signal equals the projection basis */
export const NEUTRAL_MATCHUP_SCORE = 5;

/** Points added to the projection basis per matchup-score unit above neutral */
export const MATCHUP_POINTS_PER_UNIT = 0.6;

/**
 * Upper percentile bound (exclusive) of each tier within a position group.
 * Anything at or beyond the last band is bench.
 */
export const TIER_BANDS: ReadonlyArray<{ tier: 'elite' | 'solid' | 'flex'; below: number }> = [
  { tier: 'elite', below: 0.1 },
  { tier: 'solid', below: 0.4 },
  { tier: 'flex', below: 0.7 },
];

/** Default minimum composite delta before a bench player is suggested */
export const DEFAULT_RECOMMENDATION_MARGIN = 2.0;

/** Provider designations that keep a player out of the lineup pool */
export const INACTIVE_STATUSES: ReadonlySet<string> = new Set([
  'O',
  'OUT',
  'IR',
  'IR-R',
  'PUP-R',
  'PUP-P',
  'SUSP',
  'NA',
  'NFI-R',
]);

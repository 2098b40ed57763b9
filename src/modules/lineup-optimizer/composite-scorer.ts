/**
 * Composite scoring.
 *
 * The composite is a weighted average over the signals a player actually
 * has: a missing projection drops out of both numerator and denominator
 * instead of counting as zero, so thinly covered players are not dragged
 * down by coverage gaps. Trending adds a non-negative bonus on top.
 */

import { Player, projectionBasis, Strategy } from './lineup-optimizer.model';
import {
  MATCHUP_POINTS_PER_UNIT,
  NEUTRAL_MATCHUP_SCORE,
  STRATEGY_WEIGHTS,
  StrategyWeights,
} from './lineup-optimizer.config';

interface WeightedSignal {
  value: number | null;
  weight: number;
}

/**
 * Matchup expressed on the points scale: the projection basis shifted by
 * how far the matchup score sits from neutral.
 */
export function matchupSignal(player: Player): number | null {
  if (player.matchupScore === null) return null;
  const basis = projectionBasis(player);
  if (basis === null) return null;
  return basis + (player.matchupScore - NEUTRAL_MATCHUP_SCORE) * MATCHUP_POINTS_PER_UNIT;
}

export function trendingBonus(trendingScore: number, weights: StrategyWeights): number {
  if (trendingScore <= 0) return 0;
  return weights.trending * Math.log10(1 + trendingScore);
}

/**
 * @returns null when the player has no projection, floor or ceiling at all
 */
export function computeCompositeScore(player: Player, strategy: Strategy): number | null {
  const weights = STRATEGY_WEIGHTS[strategy];

  const signals: WeightedSignal[] = [
    { value: player.projectionA, weight: weights.projectionA },
    { value: player.projectionB, weight: weights.projectionB },
    { value: player.floorProjection, weight: weights.floor },
    { value: player.ceilingProjection, weight: weights.ceiling },
    { value: matchupSignal(player), weight: weights.matchup },
  ];

  let weightedSum = 0;
  let totalWeight = 0;
  let hasSignal = false;

  for (const { value, weight } of signals) {
    if (value === null || !Number.isFinite(value)) continue;
    hasSignal = true;
    weightedSum += value * weight;
    totalWeight += weight;
  }

  if (!hasSignal) return null;

  // Only zero-weight signals present (e.g. floor alone under the ceiling strategy):
  // fall back to their plain mean so the player still gets a score.
  const base =
    totalWeight > 0
      ? weightedSum / totalWeight
      : meanOf(signals.map((s) => s.value));

  return base + trendingBonus(player.trendingScore, weights);
}

function meanOf(values: Array<number | null>): number {
  const present = values.filter((v): v is number => v !== null && Number.isFinite(v));
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

/**
 * Returns new Player objects with compositeScore set for the strategy.
 */
export function scorePlayers(players: readonly Player[], strategy: Strategy): Player[] {
  return players.map((player) => ({
    ...player,
    compositeScore: computeCompositeScore(player, strategy),
  }));
}

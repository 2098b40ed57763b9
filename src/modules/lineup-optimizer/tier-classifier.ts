/**
 * Tier classification by composite-score percentile within a position group.
 *
 * Percentile is the share of the group scoring strictly higher, so tied
 * players always land in the same tier. Players without a composite score
 * are 'unknown', never 'bench'.
 */

import { Player, PlayerTier } from './lineup-optimizer.model';
import { TIER_BANDS } from './lineup-optimizer.config';

export function tierForPercentile(percentile: number): PlayerTier {
  for (const band of TIER_BANDS) {
    if (percentile < band.below) return band.tier;
  }
  return 'bench';
}

/**
 * Returns new Player objects with tier set. Input order is preserved.
 */
export function classifyTiers(players: readonly Player[]): Player[] {
  const scoresByPosition = new Map<string, number[]>();
  for (const player of players) {
    if (player.compositeScore === null) continue;
    const scores = scoresByPosition.get(player.position) ?? [];
    scores.push(player.compositeScore);
    scoresByPosition.set(player.position, scores);
  }

  return players.map((player): Player => {
    const score = player.compositeScore;
    if (score === null) return { ...player, tier: 'unknown' };

    const group = scoresByPosition.get(player.position) ?? [score];
    const higher = group.filter((other) => other > score).length;
    return { ...player, tier: tierForPercentile(higher / group.length) };
  });
}

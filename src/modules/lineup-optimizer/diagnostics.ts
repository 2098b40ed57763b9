/**
 * Data-quality counters and advisory recommendations.
 *
 * Nothing here changes the solver's outcome: recommendations are text for
 * the caller to display.
 */

import {
  DataQuality,
  OptimizerIssue,
  Player,
  Slot,
  StarterAssignment,
} from './lineup-optimizer.model';
import { DEFAULT_RECOMMENDATION_MARGIN } from './lineup-optimizer.config';
import { canPositionFillSlot, getEligiblePositionsForSlot, isReserveSlot } from './slot-eligibility';

/** Below this share of players with a projection, say so */
const LOW_COVERAGE_RATIO = 0.5;

/** Float noise allowed between the greedy and reference totals */
const SCORE_EPSILON = 1e-6;

export interface DataQualityInput {
  /** Entries seen on the raw roster, valid or not */
  totalPlayers: number;
  invalidEntries: number;
  validPlayers: readonly Player[];
  starters: readonly StarterAssignment[];
  optimalScore: number;
}

export function hasProjection(player: Player): boolean {
  return player.projectionA !== null || player.projectionB !== null;
}

export function sumStarterScores(starters: readonly StarterAssignment[]): number {
  return starters.reduce((sum, s) => sum + (s.player.compositeScore ?? 0), 0);
}

export function computeDataQuality(input: DataQualityInput): DataQuality {
  const { validPlayers } = input;
  return {
    totalPlayers: input.totalPlayers,
    validPlayers: validPlayers.length,
    invalidEntries: input.invalidEntries,
    playersWithProjections: validPlayers.filter(hasProjection).length,
    playersWithMatchupData: validPlayers.filter((p) => p.matchupScore !== null).length,
    startersScore: sumStarterScores(input.starters),
    optimalScore: input.optimalScore,
  };
}

function describeEdges(candidate: Player, starter: Player): string[] {
  const edges: string[] = [];
  if (
    candidate.matchupScore !== null &&
    (starter.matchupScore === null || candidate.matchupScore > starter.matchupScore)
  ) {
    edges.push(
      candidate.matchupDescription
        ? `stronger matchup (${candidate.matchupDescription})`
        : 'stronger matchup'
    );
  }
  if (candidate.trendingScore > starter.trendingScore) {
    edges.push(`trending up (${candidate.trendingScore.toLocaleString('en-US')} adds)`);
  }
  return edges;
}

/**
 * Lowest-scoring scored starter whose slot the bench player could fill.
 */
function weakestEligibleStarter(
  candidate: Player,
  starters: readonly StarterAssignment[]
): StarterAssignment | null {
  let weakest: StarterAssignment | null = null;
  for (const starter of starters) {
    const score = starter.player.compositeScore;
    if (score === null) continue;
    if (!getEligiblePositionsForSlot(starter.slot).has(candidate.position)) continue;
    if (weakest === null || score < (weakest.player.compositeScore ?? score)) weakest = starter;
  }
  return weakest;
}

/**
 * Bench players that beat the weakest eligible starter by more than `margin`.
 */
export function benchUpgradeSuggestions(
  starters: readonly StarterAssignment[],
  bench: readonly Player[],
  margin: number = DEFAULT_RECOMMENDATION_MARGIN
): string[] {
  const suggestions: string[] = [];

  for (const candidate of bench) {
    if (candidate.compositeScore === null) continue;
    const weakest = weakestEligibleStarter(candidate, starters);
    if (!weakest || weakest.player.compositeScore === null) continue;

    const delta = candidate.compositeScore - weakest.player.compositeScore;
    if (delta <= margin) continue;

    const edges = describeEdges(candidate, weakest.player);
    const reason = [`+${delta.toFixed(1)} projected`, ...edges].join(', ');
    suggestions.push(
      `Consider starting ${candidate.name} over ${weakest.player.name} at ${weakest.label} (${reason})`
    );
  }

  return suggestions;
}

/**
 * Moves needed to get from the provider's current lineup to the suggested one.
 * Players with no current slot are skipped.
 */
export function lineupChangeSuggestions(
  starters: readonly StarterAssignment[],
  bench: readonly Player[]
): string[] {
  const suggestions: string[] = [];

  for (const { player, label } of starters) {
    if (player.selectedPosition !== null && isReserveSlot(player.selectedPosition)) {
      suggestions.push(`Move ${player.name} from the bench into ${label}`);
    }
  }

  for (const player of bench) {
    if (player.selectedPosition !== null && !isReserveSlot(player.selectedPosition)) {
      suggestions.push(`Bench ${player.name} (currently starting at ${player.selectedPosition})`);
    }
  }

  return suggestions;
}

/**
 * Warn about inactive players who would have started: an eligible slot is
 * open, or they outscore the weakest starter in a slot they could fill.
 */
export function inactiveStarterIssues(
  inactive: readonly Player[],
  starters: readonly StarterAssignment[],
  slots: readonly Slot[]
): OptimizerIssue[] {
  const issues: OptimizerIssue[] = [];

  for (const player of inactive) {
    const score = player.compositeScore;
    if (score === null) continue;

    const eligibleSlots = slots.filter((slot) => canPositionFillSlot(player.position, slot));
    if (eligibleSlots.length === 0) continue;

    const eligibleCodes = new Set(eligibleSlots.map((slot) => slot.code));
    const occupied = starters.filter((starter) => eligibleCodes.has(starter.slot));
    const capacity = eligibleSlots.reduce((sum, slot) => sum + slot.count, 0);
    const status = player.status ?? 'inactive';

    let detail: string | null = null;
    if (occupied.length < capacity) {
      detail = 'an eligible slot is left open';
    } else {
      const scoreOf = (starter: StarterAssignment) => starter.player.compositeScore ?? -Infinity;
      let weakest: StarterAssignment | null = null;
      for (const starter of occupied) {
        if (weakest === null || scoreOf(starter) < scoreOf(weakest)) weakest = starter;
      }
      if (weakest && score > scoreOf(weakest)) {
        detail = `would otherwise start over ${weakest.player.name} at ${weakest.label}`;
      }
    }

    if (detail) {
      issues.push({
        kind: 'InactivePlayerExcluded',
        severity: 'warning',
        stage: 'solve',
        message: `${player.name} (${status}) left out of the lineup: ${detail}`,
      });
    }
  }

  return issues;
}

export function coverageNote(quality: DataQuality): string | null {
  if (quality.validPlayers === 0) return null;
  if (quality.playersWithProjections / quality.validPlayers >= LOW_COVERAGE_RATIO) return null;
  return `Only ${quality.playersWithProjections} of ${quality.validPlayers} players have projections; scores lean on partial data`;
}

export interface RecommendationInput {
  starters: readonly StarterAssignment[];
  /** Active bench players, the only upgrade candidates */
  bench: readonly Player[];
  /** Players held out by status; only their current slot is looked at */
  inactive?: readonly Player[];
  dataQuality: DataQuality;
}

export function generateRecommendations(
  input: RecommendationInput,
  margin: number = DEFAULT_RECOMMENDATION_MARGIN
): string[] {
  const recommendations = [
    ...benchUpgradeSuggestions(input.starters, input.bench, margin),
    ...lineupChangeSuggestions(input.starters, [...input.bench, ...(input.inactive ?? [])]),
  ];
  const note = coverageNote(input.dataQuality);
  if (note) recommendations.push(note);
  return recommendations;
}

/**
 * Warn when the greedy fill trails the reference assignment.
 */
export function assessOptimality(quality: DataQuality): OptimizerIssue | null {
  const gap = quality.optimalScore - quality.startersScore;
  if (gap <= SCORE_EPSILON) return null;
  return {
    kind: 'SuboptimalAssignment',
    severity: 'warning',
    stage: 'diagnose',
    message: `Lineup is ${gap.toFixed(1)} points below the best achievable assignment`,
  };
}

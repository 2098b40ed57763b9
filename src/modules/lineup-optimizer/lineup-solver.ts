/**
 * Position-constrained lineup solver.
 *
 * Greedy fill in order of eligibility specificity: slots with the fewest
 * eligible positions go first, so a FLEX slot cannot take the only player
 * able to fill a dedicated slot. Each slot instance takes the best
 * unassigned eligible player. Not guaranteed optimal in general; for the
 * nested slot structures fantasy leagues use it matches the optimum
 * (see optimal-assignment.ts, which diagnostics compare against).
 */

import { OptimizerIssue, Player, Slot, StarterAssignment, Strategy } from './lineup-optimizer.model';
import { canPositionFillSlot } from './slot-eligibility';
import { logger } from '../../config/logger.config';

export interface SlotInstance {
  slot: Slot;
  index: number;
  label: string;
  /** Position in the template, for stable ordering */
  order: number;
}

export interface SolveOutcome {
  starters: StarterAssignment[];
  bench: Player[];
  issues: OptimizerIssue[];
  /** Slot codes no player in the whole pool is eligible for */
  structurallyUnfillable: string[];
}

/**
 * Expand slot counts into instances (RB x2 -> RB1, RB2), most specific first.
 */
export function expandSlotInstances(slots: readonly Slot[]): SlotInstance[] {
  const instances: SlotInstance[] = [];
  let order = 0;
  for (const slot of slots) {
    for (let index = 0; index < slot.count; index++) {
      instances.push({
        slot,
        index,
        label: slot.count > 1 ? `${slot.code}${index + 1}` : slot.code,
        order: order++,
      });
    }
  }

  return instances.sort(
    (a, b) => a.slot.eligiblePositions.size - b.slot.eligiblePositions.size || a.order - b.order
  );
}

function descendingNullsLast(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function lexical(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Negative when `a` should be picked before `b`.
 * Score, then the strategy's tiebreak signal, then name.
 */
export function compareCandidates(a: Player, b: Player, strategy: Strategy): number {
  const byScore = descendingNullsLast(a.compositeScore, b.compositeScore);
  if (byScore !== 0) return byScore;

  const byTiebreak =
    strategy === 'floor'
      ? descendingNullsLast(a.floorProjection, b.floorProjection)
      : strategy === 'ceiling'
        ? descendingNullsLast(a.ceilingProjection, b.ceilingProjection)
        : b.trendingScore - a.trendingScore;
  if (byTiebreak !== 0) return byTiebreak;

  return lexical(a.name, b.name);
}

/**
 * Bench order: composite descending, unscored last, then name.
 */
export function sortBench(players: readonly Player[]): Player[] {
  return [...players].sort(
    (a, b) => descendingNullsLast(a.compositeScore, b.compositeScore) || lexical(a.name, b.name)
  );
}

export function solveLineup(
  players: readonly Player[],
  slots: readonly Slot[],
  strategy: Strategy
): SolveOutcome {
  const instances = expandSlotInstances(slots);
  const ranked = [...players].sort((a, b) => compareCandidates(a, b, strategy));
  const assigned = new Set<Player>();
  const starters: StarterAssignment[] = [];
  const issues: OptimizerIssue[] = [];
  const structurallyUnfillable = new Set<string>();

  for (const instance of instances) {
    const candidates = ranked.filter(
      (p) => !assigned.has(p) && canPositionFillSlot(p.position, instance.slot)
    );
    // ranked puts unscored players last, so the head is the best scored option
    const pick = candidates[0];

    if (!pick) {
      const anyEligible = players.some((p) => canPositionFillSlot(p.position, instance.slot));
      if (!anyEligible) structurallyUnfillable.add(instance.slot.code);
      issues.push({
        kind: 'SlotUnfillable',
        severity: 'error',
        stage: 'solve',
        slot: instance.slot.code,
        message: anyEligible
          ? `Slot ${instance.label} left empty: every eligible player (${[...instance.slot.eligiblePositions].join('/')}) is already starting`
          : `Slot ${instance.label} left empty: no ${[...instance.slot.eligiblePositions].join('/')} on the roster`,
      });
      continue;
    }

    const fallback = pick.compositeScore === null;
    if (fallback) {
      issues.push({
        kind: 'FallbackStarter',
        severity: 'warning',
        stage: 'solve',
        slot: instance.slot.code,
        message: `${pick.name} fills ${instance.label} without projection data (no scored alternative)`,
      });
    }

    assigned.add(pick);
    starters.push({
      slot: instance.slot.code,
      slotIndex: instance.index,
      label: instance.label,
      player: pick,
      fallback,
    });
  }

  const bench = sortBench(players.filter((p) => !assigned.has(p)));

  if (issues.length > 0) {
    logger.warn('Lineup solved with issues', {
      strategy,
      slots: instances.length,
      filled: starters.length,
      issues: issues.map((i) => i.kind),
    });
  }

  return {
    starters: restoreTemplateOrder(starters, slots),
    bench,
    issues,
    structurallyUnfillable: [...structurallyUnfillable],
  };
}

/**
 * Present starters in template order (QB, RB1, RB2, ...), not fill order.
 */
function restoreTemplateOrder(
  starters: StarterAssignment[],
  slots: readonly Slot[]
): StarterAssignment[] {
  const slotOrder = new Map(slots.map((slot, i) => [slot.code, i] as const));
  return [...starters].sort(
    (a, b) =>
      (slotOrder.get(a.slot) ?? 0) - (slotOrder.get(b.slot) ?? 0) || a.slotIndex - b.slotIndex
  );
}

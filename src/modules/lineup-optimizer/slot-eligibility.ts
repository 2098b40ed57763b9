/**
 * Slot eligibility utilities for lineup optimization.
 * Defines which player positions can fill which lineup slots, and the
 * template used when a league's roster settings cannot be read.
 */

import { RosterPosition, Slot } from './lineup-optimizer.model';

/**
 * Maps each known slot code to the positions eligible to fill it.
 * Covers Yahoo's codes (W/R/T, Q/W/R/T, D) and generic aliases (FLEX, SUPER_FLEX).
 */
const SLOT_ELIGIBILITY: Record<string, string[]> = {
  QB: ['QB'],
  RB: ['RB'],
  WR: ['WR'],
  TE: ['TE'],
  'W/R/T': ['RB', 'WR', 'TE'],
  FLEX: ['RB', 'WR', 'TE'],
  'W/R': ['RB', 'WR'],
  'W/T': ['WR', 'TE'],
  REC_FLEX: ['WR', 'TE'],
  'R/T': ['RB', 'TE'],
  'Q/W/R/T': ['QB', 'RB', 'WR', 'TE'],
  SUPER_FLEX: ['QB', 'RB', 'WR', 'TE'],
  K: ['K'],
  DEF: ['DEF'],
  DL: ['DL', 'DE', 'DT'],
  DE: ['DE'],
  DT: ['DT'],
  LB: ['LB'],
  DB: ['DB', 'CB', 'S'],
  CB: ['CB'],
  S: ['S'],
  D: ['DL', 'DE', 'DT', 'LB', 'DB', 'CB', 'S'],
  IDP_FLEX: ['DL', 'DE', 'DT', 'LB', 'DB', 'CB', 'S'],
};

/**
 * Reserve slots (never eligible for starters)
 */
const RESERVE_SLOTS: ReadonlySet<string> = new Set(['BN', 'IR', 'IR+', 'IL', 'TAXI', 'NA']);

/**
 * Aliases providers use for the same slot
 */
const SLOT_ALIASES: Record<string, string> = {
  'D/ST': 'DEF',
  DST: 'DEF',
  BENCH: 'BN',
};

/**
 * Used when league settings are unavailable (typical Yahoo standard league)
 */
export const DEFAULT_ROSTER_POSITIONS: readonly RosterPosition[] = [
  { position: 'QB', count: 1 },
  { position: 'RB', count: 2 },
  { position: 'WR', count: 2 },
  { position: 'TE', count: 1 },
  { position: 'W/R/T', count: 1 },
  { position: 'K', count: 1 },
  { position: 'DEF', count: 1 },
];

export function normalizeSlotCode(code: string): string {
  const upper = code.trim().toUpperCase();
  return SLOT_ALIASES[upper] ?? upper;
}

/**
 * Check if a slot is a reserve slot (bench/IR/taxi)
 */
export function isReserveSlot(code: string): boolean {
  return RESERVE_SLOTS.has(normalizeSlotCode(code));
}

/**
 * Get the positions eligible for a slot. Unknown codes are treated as a
 * dedicated slot for the position of the same name.
 */
export function getEligiblePositionsForSlot(code: string): Set<string> {
  const normalized = normalizeSlotCode(code);
  return new Set(SLOT_ELIGIBILITY[normalized] ?? [normalized]);
}

/**
 * Check if a player position can fill a given slot
 */
export function canPositionFillSlot(position: string, slot: Slot): boolean {
  return slot.eligiblePositions.has(position);
}

/**
 * Convert {position, count} pairs into starter slots.
 * Duplicate codes are merged, reserve codes dropped, order of first appearance kept.
 */
export function buildSlotTemplate(positions: readonly RosterPosition[]): Slot[] {
  const counts = new Map<string, number>();

  for (const { position, count, isStarting } of positions) {
    if (!position || isStarting === false || isReserveSlot(position)) continue;
    const code = normalizeSlotCode(position);
    counts.set(code, (counts.get(code) ?? 0) + count);
  }

  return Array.from(counts, ([code, count]) => ({
    code,
    count,
    eligiblePositions: getEligiblePositionsForSlot(code),
  }));
}

export function getDefaultSlotTemplate(): Slot[] {
  return buildSlotTemplate(DEFAULT_ROSTER_POSITIONS);
}

/**
 * Matchup strength from projected points allowed.
 *
 * For each opponent and position, sum the projected fantasy points of every
 * player facing that opponent. Ranking opponents by that total gives a
 * 0-10 matchup score per position: 10 for the defense expected to give up
 * the most, 0 for the stingiest.
 */

import { EnrichmentEntry } from '../../modules/lineup-optimizer/lineup-optimizer.model';

export interface ProjectedLine {
  name: string;
  team: string | null;
  position: string;
  opponent: string | null;
  points: number;
}

export interface DefenseRanking {
  opponent: string;
  pointsAllowed: number;
  /** 1 = most points allowed */
  rank: number;
  score: number;
}

const FAVORABLE_AT = 7;
const TOUGH_AT = 3;
const NEUTRAL_SCORE = 5;

export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function matchupLabel(score: number): 'Favorable' | 'Neutral' | 'Tough' {
  if (score >= FAVORABLE_AT) return 'Favorable';
  if (score <= TOUGH_AT) return 'Tough';
  return 'Neutral';
}

/**
 * Rankings per position, keyed by opponent.
 */
export function rankDefenses(lines: readonly ProjectedLine[]): Map<string, Map<string, DefenseRanking>> {
  const allowed = new Map<string, Map<string, number>>();
  for (const line of lines) {
    if (!line.opponent || !Number.isFinite(line.points)) continue;
    const byOpponent = allowed.get(line.position) ?? new Map<string, number>();
    byOpponent.set(line.opponent, (byOpponent.get(line.opponent) ?? 0) + line.points);
    allowed.set(line.position, byOpponent);
  }

  const rankings = new Map<string, Map<string, DefenseRanking>>();
  for (const [position, byOpponent] of allowed) {
    // Ascending, so the index grows with points allowed
    const ordered = [...byOpponent].sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : 1));
    const n = ordered.length;
    const ranked = new Map<string, DefenseRanking>();
    ordered.forEach(([opponent, pointsAllowed], idx) => {
      const score = n > 1 ? Math.round((100 * idx) / (n - 1)) / 10 : NEUTRAL_SCORE;
      ranked.set(opponent, { opponent, pointsAllowed, rank: n - idx, score });
    });
    rankings.set(position, ranked);
  }
  return rankings;
}

export function analyzeMatchups(lines: readonly ProjectedLine[]): EnrichmentEntry[] {
  const rankings = rankDefenses(lines);
  const entries: EnrichmentEntry[] = [];

  for (const line of lines) {
    if (!line.opponent) continue;
    const ranking = rankings.get(line.position)?.get(line.opponent);
    if (!ranking) continue;
    entries.push({
      name: line.name,
      team: line.team,
      opponent: line.opponent,
      matchupScore: ranking.score,
      matchupDescription: `${matchupLabel(ranking.score)} matchup vs ${line.opponent} (${ordinal(ranking.rank)} most ${line.position} points allowed)`,
    });
  }
  return entries;
}

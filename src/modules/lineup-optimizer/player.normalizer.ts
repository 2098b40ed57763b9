/**
 * Player normalization: provider roster records → Player entities.
 *
 * Each record is checked with a lenient zod schema; numeric strings are
 * coerced, blanks become null. Records without a name or a position are
 * skipped and counted rather than failing the batch.
 */

import { z } from 'zod';
import { createPlayer, NormalizationResult, Player } from './lineup-optimizer.model';
import { PlayerNormalizer } from './lineup-optimizer.interface';
import { flattenYahooRoster } from './yahoo-roster.flattener';

const POSITION_ALIASES: Record<string, string> = {
  'D/ST': 'DEF',
  DST: 'DEF',
  PK: 'K',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toTrimmedString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function toNumberOrNull(value: unknown): number | null {
  if (isRecord(value)) return toNumberOrNull(value.total);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/** "Josh Allen" or Yahoo's { full: "Josh Allen", first, last } */
function toName(value: unknown): string | null {
  if (isRecord(value)) return toTrimmedString(value.full);
  return toTrimmedString(value);
}

/** "WR,TE" display positions keep the first entry */
function toPosition(value: unknown): string | null {
  const raw = toTrimmedString(value);
  if (!raw) return null;
  const first = raw.split(',')[0].trim().toUpperCase();
  if (!first) return null;
  return POSITION_ALIASES[first] ?? first;
}

const nullableString = z.preprocess(toTrimmedString, z.string().nullable());
const nullableNumber = z.preprocess(toNumberOrNull, z.number().nullable());

const rawRosterEntrySchema = z
  .object({
    player_key: nullableString,
    name: z.preprocess(toName, z.string({ invalid_type_error: 'name is required' })),
    team: nullableString,
    editorial_team_abbr: nullableString,
    primary_position: z.preprocess(toPosition, z.string().nullable()),
    position: z.preprocess(toPosition, z.string().nullable()),
    display_position: z.preprocess(toPosition, z.string().nullable()),
    opponent: nullableString,
    status: nullableString,
    selected_position: nullableString,
    player_projected_points: nullableNumber,
    projected_points: nullableNumber,
    projection: nullableNumber,
    floor: nullableNumber,
    ceiling: nullableNumber,
  })
  .transform((entry, ctx) => {
    const position = entry.primary_position ?? entry.position ?? entry.display_position;
    if (!position) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'position is required' });
      return z.NEVER;
    }
    return {
      playerKey: entry.player_key,
      name: entry.name,
      team: (entry.editorial_team_abbr ?? entry.team ?? 'FA').toUpperCase(),
      position,
      opponent: entry.opponent ? entry.opponent.toUpperCase() : null,
      status: entry.status ? entry.status.toUpperCase() : null,
      selectedPosition: entry.selected_position,
      projectionA: entry.player_projected_points ?? entry.projected_points ?? entry.projection,
      floorProjection: entry.floor,
      ceilingProjection: entry.ceiling,
    };
  });

/**
 * Normalize already-flattened roster records.
 */
export function normalizePlayers(entries: readonly unknown[]): NormalizationResult {
  const players: Player[] = [];
  let invalidCount = 0;

  for (const entry of entries) {
    const parsed = rawRosterEntrySchema.safeParse(isRecord(entry) ? entry : {});
    if (!parsed.success) {
      invalidCount++;
      continue;
    }
    players.push(createPlayer(parsed.data));
  }

  return { players, invalidCount };
}

/**
 * Accepts either Yahoo's roster response or a plain list of records.
 */
export class YahooPlayerNormalizer implements PlayerNormalizer {
  normalize(rawRoster: unknown): NormalizationResult {
    const entries: readonly unknown[] = Array.isArray(rawRoster)
      ? rawRoster
      : flattenYahooRoster(rawRoster);
    return normalizePlayers(entries);
  }
}

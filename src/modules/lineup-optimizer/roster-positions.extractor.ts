/**
 * Roster position extraction from a league-settings response.
 *
 * Yahoo returns the slot list in several shapes depending on endpoint and
 * serializer: a list whose items are {roster_position: {...}} wrappers or
 * flat {position, count} records (mixed lists happen), or an object keyed
 * "0", "1", ... with a "count" entry. Wrapping is decided per item. Anything
 * else yields an empty list so the caller falls back to the default template.
 */

import { RosterPosition, SoftResult } from './lineup-optimizer.model';
import { RosterPositionExtractor } from './lineup-optimizer.interface';

type Json = Record<string, unknown>;

type RosterPositionsNode =
  | { shape: 'list'; records: Json[] }
  | { shape: 'keyed-map'; records: Json[] }
  | { shape: 'unrecognized' };

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a provider count into a positive integer (default 1).
 */
export function coerceCount(value: unknown): number {
  const parsed =
    typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (!Number.isFinite(parsed)) return 1;
  const count = Math.trunc(parsed);
  return count >= 1 ? count : 1;
}

function coerceStarting(value: unknown): boolean | undefined {
  if (value === 0 || value === '0' || value === false) return false;
  if (value === 1 || value === '1' || value === true) return true;
  return undefined;
}

/**
 * Every roster_positions node in the response, in document order.
 *
 * Settings can hang off `league` as an object or as one fragment in a list,
 * and `settings` itself can be an object or a list of fragments.
 */
function findRosterPositionNodes(response: unknown): unknown[] {
  if (!isRecord(response)) return [];
  const content = isRecord(response.fantasy_content) ? response.fantasy_content : response;
  const league = content.league;

  const nodes: unknown[] = [];
  const leagueFragments = Array.isArray(league) ? league : [league];
  for (const fragment of leagueFragments) {
    if (!isRecord(fragment)) continue;
    const settings = fragment.settings;
    const settingsFragments = Array.isArray(settings) ? settings : [settings];
    for (const setting of settingsFragments) {
      if (isRecord(setting) && setting.roster_positions !== undefined) {
        nodes.push(setting.roster_positions);
      }
    }
  }

  return nodes;
}

/**
 * The slot record inside one item: the wrapped record, the item itself when
 * flat, or null when it is neither.
 */
function slotRecord(item: Json): Json | null {
  if (isRecord(item.roster_position)) return item.roster_position;
  return 'position' in item ? item : null;
}

export function classifyRosterPositions(node: unknown): RosterPositionsNode {
  if (Array.isArray(node)) {
    const records = node
      .filter(isRecord)
      .map(slotRecord)
      .filter((r): r is Json => r !== null);
    return records.length > 0 ? { shape: 'list', records } : { shape: 'unrecognized' };
  }

  if (isRecord(node)) {
    const items = Object.entries(node)
      .filter(([key]) => key !== 'count')
      .map(([, value]) => value)
      .filter(isRecord);
    if (items.some((item) => isRecord(item.roster_position))) {
      const records = items.map(slotRecord).filter((r): r is Json => r !== null);
      return { shape: 'keyed-map', records };
    }
  }

  return { shape: 'unrecognized' };
}

function toRosterPosition(record: Json): RosterPosition | null {
  const position = typeof record.position === 'string' ? record.position.trim() : '';
  if (!position) return null;

  const result: RosterPosition = { position, count: coerceCount(record.count) };
  const isStarting = coerceStarting(record.is_starting_position);
  if (isStarting !== undefined) result.isStarting = isStarting;
  return result;
}

function parseNode(node: unknown): SoftResult<RosterPosition[]> {
  const classified = classifyRosterPositions(node);
  if (classified.shape === 'unrecognized') {
    return { ok: false, reason: 'roster_positions not found in a recognized shape' };
  }

  const positions = classified.records
    .map(toRosterPosition)
    .filter((p): p is RosterPosition => p !== null);

  if (positions.length === 0) {
    return {
      ok: false,
      reason: `roster_positions (${classified.shape}) contained no usable entries`,
    };
  }

  return { ok: true, value: positions };
}

/**
 * Parse a settings response into {position, count} pairs. The first
 * roster_positions node with usable entries wins.
 */
export function parseRosterPositions(response: unknown): SoftResult<RosterPosition[]> {
  let firstFailure: SoftResult<RosterPosition[]> | null = null;
  for (const node of findRosterPositionNodes(response)) {
    const result = parseNode(node);
    if (result.ok) return result;
    if (!firstFailure) firstFailure = result;
  }

  return firstFailure ?? { ok: false, reason: 'roster_positions not found in a recognized shape' };
}

/**
 * Never throws: an unreadable response yields [] ("use default template").
 */
export function extractRosterPositions(response: unknown): RosterPosition[] {
  const result = parseRosterPositions(response);
  return result.ok ? result.value : [];
}

export class YahooRosterPositionExtractor implements RosterPositionExtractor {
  extract(settingsResponse: unknown): RosterPosition[] {
    return extractRosterPositions(settingsResponse);
  }
}

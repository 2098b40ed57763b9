/**
 * Flattens Yahoo's fragment-list roster JSON into one record per player.
 *
 * Yahoo serializes every object as a list of single-key fragments, e.g.
 *   team: [[{team_key}, {name}, ...], { roster: { "0": { players: { "0": { player: [...] }, count } } } }]
 *   player: [[{player_key}, {name: {full}}, {editorial_team_abbr}, ..., []], {selected_position: [...]}]
 */

export type RawRosterEntry = Record<string, unknown>;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a list of fragments ({a}, {b}, [], ...) into one object.
 */
export function mergeFragments(fragments: unknown): Json {
  const merged: Json = {};
  if (isRecord(fragments)) return { ...fragments };
  if (!Array.isArray(fragments)) return merged;

  for (const fragment of fragments) {
    if (isRecord(fragment)) {
      Object.assign(merged, fragment);
    } else if (Array.isArray(fragment)) {
      Object.assign(merged, mergeFragments(fragment));
    }
  }
  return merged;
}

/**
 * Values of a Yahoo keyed collection ({"0": x, "1": y, "count": 2}) in key order.
 */
function keyedValues(collection: unknown): unknown[] {
  if (Array.isArray(collection)) return collection;
  if (!isRecord(collection)) return [];
  return Object.keys(collection)
    .filter((key) => /^\d+$/.test(key))
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => collection[key]);
}

function findRoster(response: unknown): Json | null {
  if (!isRecord(response)) return null;
  const content = isRecord(response.fantasy_content) ? response.fantasy_content : response;
  const team = mergeFragments(content.team);
  return isRecord(team.roster) ? team.roster : null;
}

function flattenPlayer(wrapper: unknown): RawRosterEntry | null {
  if (!isRecord(wrapper)) return null;
  const parts = wrapper.player;
  if (!Array.isArray(parts) || parts.length === 0) return null;

  const entry: RawRosterEntry = mergeFragments(parts[0]);
  for (const part of parts.slice(1)) {
    if (isRecord(part)) Object.assign(entry, part);
  }

  // selected_position is itself a fragment list
  if (entry.selected_position !== undefined) {
    entry.selected_position = mergeFragments(entry.selected_position).position ?? null;
  }

  return entry;
}

/**
 * Roster response → raw player records. Unknown shapes yield [].
 */
export function flattenYahooRoster(response: unknown): RawRosterEntry[] {
  const roster = findRoster(response);
  if (!roster) return [];

  const entries: RawRosterEntry[] = [];
  for (const block of keyedValues(roster)) {
    if (!isRecord(block)) continue;
    for (const wrapper of keyedValues(block.players)) {
      const entry = flattenPlayer(wrapper);
      if (entry) entries.push(entry);
    }
  }
  return entries;
}

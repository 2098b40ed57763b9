/**
 * Cross-provider player identity: name + team, normalized so that
 * "Kenneth Walker III (SEA)" and "kenneth walker, Sea" collide.
 */

const NAME_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'v']);

/** Team abbreviations that differ between providers */
const TEAM_ALIASES: Record<string, string> = {
  JAC: 'JAX',
  WSH: 'WAS',
  LA: 'LAR',
  OAK: 'LV',
  SD: 'LAC',
  STL: 'LAR',
};

export function normalizePlayerName(name: string): string {
  const tokens = name
    .toLowerCase()
    .replace(/[.'’,]/g, '')
    .replace(/-/g, ' ')
    .split(/\s+/)
    .filter(Boolean);

  while (tokens.length > 1 && NAME_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

export function normalizeTeam(team: string | null | undefined): string {
  const upper = (team ?? '').trim().toUpperCase();
  return TEAM_ALIASES[upper] ?? upper;
}

export function playerIdentityKey(name: string, team: string | null | undefined): string {
  return `${normalizePlayerName(name)}|${normalizeTeam(team)}`;
}

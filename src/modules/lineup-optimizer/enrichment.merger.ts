/**
 * Merges secondary-source signals (projections, trending, matchups) into
 * normalized players by name + team identity.
 *
 * Unmatched players keep null secondary fields. Primary-source fields
 * (identity, projectionA, status) are never touched; opponent is only
 * filled when the roster did not carry one.
 */

import {
  EnrichmentEntry,
  EnrichmentFeed,
  Player,
  projectionBasis,
} from './lineup-optimizer.model';
import { EnrichmentMerger } from './lineup-optimizer.interface';
import { normalizePlayerName, playerIdentityKey } from './player-identity';
import { logger } from '../../config/logger.config';

export interface MergeOutcome {
  players: Player[];
  /** Matched players per feed source */
  matched: Record<string, number>;
}

interface FeedIndex {
  byIdentity: Map<string, EnrichmentEntry>;
  /** Entries whose feed had no team, matched on name alone */
  byName: Map<string, EnrichmentEntry>;
}

function indexFeed(feed: EnrichmentFeed): FeedIndex {
  const byIdentity = new Map<string, EnrichmentEntry>();
  const byName = new Map<string, EnrichmentEntry>();

  for (const entry of feed.entries) {
    if (!entry.name) continue;
    if (entry.team) {
      byIdentity.set(playerIdentityKey(entry.name, entry.team), entry);
    } else {
      byName.set(normalizePlayerName(entry.name), entry);
    }
  }
  return { byIdentity, byName };
}

function lookup(index: FeedIndex, player: Player): EnrichmentEntry | undefined {
  return (
    index.byIdentity.get(playerIdentityKey(player.name, player.team)) ??
    index.byName.get(normalizePlayerName(player.name))
  );
}

function isPresent(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function applyEntry(player: Player, entry: EnrichmentEntry): void {
  if (isPresent(entry.projection)) player.projectionB = entry.projection;
  if (isPresent(entry.trendingScore)) {
    player.trendingScore = Math.max(0, Math.round(entry.trendingScore));
  }
  if (isPresent(entry.matchupScore)) {
    player.matchupScore = entry.matchupScore;
    player.matchupDescription = entry.matchupDescription ?? player.matchupDescription;
  }
  if (isPresent(entry.floor)) player.floorProjection = entry.floor;
  if (isPresent(entry.ceiling)) player.ceilingProjection = entry.ceiling;
  if (entry.opponent && player.opponent === null) player.opponent = entry.opponent.toUpperCase();
}

/**
 * Keep floor <= projection basis <= ceiling where all are present.
 */
export function clampOutcomeBounds(player: Player): void {
  let floor = player.floorProjection;
  let ceiling = player.ceilingProjection;

  if (floor !== null && ceiling !== null && floor > ceiling) {
    [floor, ceiling] = [ceiling, floor];
  }

  const basis = projectionBasis(player);
  if (basis !== null) {
    if (floor !== null) floor = Math.min(floor, basis);
    if (ceiling !== null) ceiling = Math.max(ceiling, basis);
  }

  player.floorProjection = floor;
  player.ceilingProjection = ceiling;
}

export function mergeEnrichment(
  players: readonly Player[],
  feeds: readonly EnrichmentFeed[]
): MergeOutcome {
  const indexes = feeds.map((feed) => ({ source: feed.source, index: indexFeed(feed) }));
  const matched: Record<string, number> = {};
  for (const { source } of indexes) matched[source] = 0;

  const merged = players.map((original) => {
    const player: Player = { ...original };
    for (const { source, index } of indexes) {
      const entry = lookup(index, player);
      if (!entry) continue;
      applyEntry(player, entry);
      matched[source]++;
    }
    clampOutcomeBounds(player);
    return player;
  });

  logger.debug('Enrichment merged', { players: players.length, matched });

  return { players: merged, matched };
}

export class IdentityEnrichmentMerger implements EnrichmentMerger {
  merge(players: readonly Player[], ...feeds: EnrichmentFeed[]): Player[] {
    return mergeEnrichment(players, feeds).players;
  }
}

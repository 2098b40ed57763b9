import {
  EnrichmentFeed,
  NormalizationResult,
  Player,
  RosterPosition,
} from './lineup-optimizer.model';

/**
 * Collaborators the optimizer pipeline is built from.
 *
 * Each one owns a provider-shaped boundary and must soft-fail: malformed
 * input produces an empty or partial result, never an exception.
 */

export interface RosterPositionExtractor {
  /**
   * Read the slot template out of a league-settings response.
   * @returns [] when the response is missing or unreadable
   */
  extract(settingsResponse: unknown): RosterPosition[];
}

export interface PlayerNormalizer {
  /**
   * Convert a provider roster response into Players.
   * Entries without a name or position are skipped and counted.
   */
  normalize(rawRoster: unknown): NormalizationResult;
}

export interface EnrichmentMerger {
  /**
   * Populate secondary signals from feeds. Same players, same order.
   */
  merge(players: readonly Player[], ...feeds: EnrichmentFeed[]): Player[];
}

import { EnrichmentFeed } from '../../modules/lineup-optimizer/lineup-optimizer.model';

export interface EnrichmentRequest {
  /** Week to enrich; the provider's current week when omitted */
  week?: number;
}

export interface EnrichmentResult {
  feeds: EnrichmentFeed[];
  /** One line per feed that could not be built */
  warnings: string[];
}

/**
 * Enrichment provider interface
 *
 * Supplies the secondary feeds (projections, trending, matchups) merged into
 * a roster before scoring. Implementations soft-fail: a feed that cannot be
 * fetched comes back empty with a warning, never as a rejected promise.
 */
export interface IEnrichmentProvider {
  /** Provider identifier (e.g., 'sleeper') */
  readonly providerId: string;

  fetchFeeds(request: EnrichmentRequest): Promise<EnrichmentResult>;
}

import { EnrichmentEntry, EnrichmentFeed } from '../../modules/lineup-optimizer/lineup-optimizer.model';
import { logger } from '../../config/logger.config';
import {
  EnrichmentRequest,
  EnrichmentResult,
  IEnrichmentProvider,
} from '../shared/enrichment-provider.interface';
import { errorMessage } from '../shared/transient-errors';
import { analyzeMatchups, ProjectedLine } from './matchup-analyzer';
import { SleeperApiClient, SleeperProjectionRow } from './sleeper-api-client';

export type ScoringFormat = 'ppr' | 'half_ppr' | 'std';

export const FEED_SOURCES = {
  projections: 'sleeper-projections',
  trending: 'sleeper-trending',
  matchups: 'matchups',
} as const;

/**
 * Spread of weekly outcomes around the projection, by position.
 * floor = projection * (1 - v), ceiling = projection * (1 + v).
 */
export const VOLATILITY_BANDS: Readonly<Record<string, number>> = {
  QB: 0.25,
  RB: 0.35,
  WR: 0.4,
  TE: 0.4,
  K: 0.3,
  DEF: 0.45,
};

const DEFAULT_VOLATILITY = 0.35;

export function outcomeBand(points: number, position: string): { floor: number; ceiling: number } {
  const v = VOLATILITY_BANDS[position] ?? DEFAULT_VOLATILITY;
  const low = points * (1 - v);
  const high = points * (1 + v);
  // Negative projections (kickers, defenses) flip the band
  return { floor: Math.min(low, high), ceiling: Math.max(low, high) };
}

export function projectedPoints(row: SleeperProjectionRow, format: ScoringFormat): number | null {
  const stats = row.stats;
  if (!stats) return null;
  const byFormat = { ppr: stats.pts_ppr, half_ppr: stats.pts_half_ppr, std: stats.pts_std }[format];
  const points = byFormat ?? stats.pts_half_ppr ?? stats.pts_ppr ?? stats.pts_std;
  return typeof points === 'number' && Number.isFinite(points) ? points : null;
}

/**
 * Flatten a projection row into name/team/position/opponent/points.
 * Rows without a name, position or usable points are dropped.
 */
export function toProjectedLine(row: SleeperProjectionRow, format: ScoringFormat): ProjectedLine | null {
  const points = projectedPoints(row, format);
  const position = row.player?.position?.toUpperCase();
  const name = [row.player?.first_name, row.player?.last_name].filter(Boolean).join(' ').trim();
  if (points === null || !position || !name) return null;

  return {
    name,
    team: row.team ?? row.player?.team ?? null,
    position,
    opponent: row.opponent ?? null,
    points,
  };
}

export function buildProjectionEntries(lines: readonly ProjectedLine[]): EnrichmentEntry[] {
  return lines.map((line) => ({
    name: line.name,
    team: line.team,
    projection: line.points,
    opponent: line.opponent,
    ...outcomeBand(line.points, line.position),
  }));
}

/**
 * Builds the projections, trending and matchup feeds from Sleeper.
 */
export class SleeperEnrichmentProvider implements IEnrichmentProvider {
  readonly providerId = 'sleeper';

  constructor(
    private readonly client: SleeperApiClient,
    private readonly scoringFormat: ScoringFormat = 'half_ppr'
  ) {}

  async fetchFeeds(request: EnrichmentRequest): Promise<EnrichmentResult> {
    const warnings: string[] = [];

    let season: string;
    let week: number;
    try {
      const state = await this.client.fetchNflState();
      season = state.season;
      week = request.week ?? state.week;
    } catch (error) {
      logger.warn('Sleeper NFL state unavailable, skipping enrichment', {
        error: errorMessage(error),
      });
      return {
        feeds: [],
        warnings: [`Sleeper enrichment unavailable: ${errorMessage(error)}`],
      };
    }

    const [projections, trending] = await Promise.allSettled([
      this.client.fetchWeeklyProjections(season, week),
      this.client.fetchTrendingAdds(),
    ]);

    const rows = projections.status === 'fulfilled' ? projections.value : [];
    if (projections.status === 'rejected') {
      warnings.push(`Sleeper projections unavailable: ${errorMessage(projections.reason)}`);
    }

    const lines = rows
      .map((row) => toProjectedLine(row, this.scoringFormat))
      .filter((line): line is ProjectedLine => line !== null);

    const feeds: EnrichmentFeed[] = [
      { source: FEED_SOURCES.projections, entries: buildProjectionEntries(lines) },
      { source: FEED_SOURCES.matchups, entries: analyzeMatchups(lines) },
    ];

    if (trending.status === 'fulfilled') {
      feeds.push({
        source: FEED_SOURCES.trending,
        entries: this.trendingEntries(rows, trending.value),
      });
    } else {
      warnings.push(`Sleeper trending data unavailable: ${errorMessage(trending.reason)}`);
    }

    for (const warning of warnings) logger.warn(warning, { season, week });
    logger.debug('Sleeper feeds built', {
      season,
      week,
      feeds: feeds.map((feed) => `${feed.source}:${feed.entries.length}`),
    });

    return { feeds, warnings };
  }

  /**
   * Trending rows only carry a player id; identity comes from the projection rows.
   */
  private trendingEntries(
    rows: readonly SleeperProjectionRow[],
    trending: ReadonlyArray<{ player_id: string; count: number }>
  ): EnrichmentEntry[] {
    const identities = new Map<string, { name: string; team: string | null }>();
    for (const row of rows) {
      const name = [row.player?.first_name, row.player?.last_name].filter(Boolean).join(' ').trim();
      if (name) identities.set(row.player_id, { name, team: row.team ?? row.player?.team ?? null });
    }

    const entries: EnrichmentEntry[] = [];
    for (const { player_id, count } of trending) {
      const identity = identities.get(player_id);
      if (identity) entries.push({ ...identity, trendingScore: count });
    }
    return entries;
  }
}

import { LineupOptimizer } from '../lineup-optimizer/lineup-optimizer';
import { PlayerNormalizer } from '../lineup-optimizer/lineup-optimizer.interface';
import { EnrichmentFeed, isStrategy } from '../lineup-optimizer/lineup-optimizer.model';
import { YahooApiClient } from '../../integrations/yahoo/yahoo-api-client';
import {
  EnrichmentResult,
  IEnrichmentProvider,
} from '../../integrations/shared/enrichment-provider.interface';
import { errorMessage } from '../../integrations/shared/transient-errors';
import { InvalidStrategyException, LineupErrors } from '../../utils/exceptions';
import { metrics } from '../../services/metrics.service';
import { logger } from '../../config/logger.config';
import {
  lineupResultToResponse,
  LineupResponse,
  rosterPlayerToResponse,
} from './lineups.model';

export type YahooLeagueApi = Pick<
  YahooApiClient,
  'findUserTeamKey' | 'getTeamRoster' | 'getLeagueSettings' | 'getTeamMatchups'
>;

export interface BuildLineupParams {
  leagueKey: string;
  week?: number;
  strategy: string;
}

const FEED_LABELS: Record<string, string> = {
  'sleeper-projections': 'Sleeper projections',
  'sleeper-trending': 'Trending data',
  matchups: 'Matchup analysis',
};

export function describeDataSources(feeds: readonly EnrichmentFeed[]): string[] {
  const sources = ['Yahoo roster and projections'];
  for (const feed of feeds) {
    if (feed.entries.length === 0) continue;
    sources.push(FEED_LABELS[feed.source] ?? feed.source);
  }
  return sources;
}

export class LineupService {
  constructor(
    private readonly yahoo: YahooLeagueApi,
    private readonly optimizer: LineupOptimizer,
    private readonly normalizer: PlayerNormalizer,
    private readonly enrichment: IEnrichmentProvider | null,
    private readonly benchDisplayLimit = 5
  ) {}

  /**
   * Build the best lineup for the user's team in a league.
   *
   * Roster, settings and enrichment are fetched concurrently. Only the
   * roster is required; missing settings fall back to the default template
   * and missing feeds leave players unenriched.
   */
  async buildLineup({ leagueKey, week, strategy }: BuildLineupParams): Promise<LineupResponse> {
    if (!isStrategy(strategy)) {
      metrics.increment('lineup_builds_invalid_strategy');
      throw new InvalidStrategyException(strategy);
    }

    const teamKey = await this.requireTeamKey(leagueKey);

    return metrics.time('lineup_build_duration_ms', async () => {
      const [roster, settings, enrichment] = await Promise.allSettled([
        this.yahoo.getTeamRoster(teamKey, week),
        this.yahoo.getLeagueSettings(leagueKey),
        this.fetchEnrichment(week),
      ]);

      if (roster.status === 'rejected') {
        metrics.increment('lineup_builds_roster_failed');
        throw roster.reason;
      }

      const sourceWarnings: string[] = [];
      let settingsResponse: unknown = null;
      if (settings.status === 'fulfilled') {
        settingsResponse = settings.value;
      } else {
        const reason = errorMessage(settings.reason);
        logger.warn('League settings unavailable', { leagueKey, error: reason });
        sourceWarnings.push(`Could not fetch roster settings for ${leagueKey}: ${reason}`);
      }

      let feeds: EnrichmentFeed[] = [];
      if (enrichment.status === 'fulfilled') {
        feeds = enrichment.value.feeds;
        sourceWarnings.push(...enrichment.value.warnings);
      } else {
        const reason = errorMessage(enrichment.reason);
        logger.warn('Enrichment failed', { leagueKey, error: reason });
        sourceWarnings.push(`Enrichment unavailable: ${reason}`);
      }

      const result = this.optimizer.run({
        rawRoster: roster.value,
        settingsResponse,
        feeds,
        strategy,
      });

      metrics.increment(`lineup_builds_${result.status.replace(/-/g, '_')}`);
      logger.info('Lineup built', {
        leagueKey,
        teamKey,
        week,
        strategy,
        status: result.status,
        starters: result.starters.length,
      });

      return lineupResultToResponse(result, {
        leagueKey,
        teamKey,
        week,
        strategy,
        benchLimit: this.benchDisplayLimit,
        sourceWarnings,
        dataSources: describeDataSources(feeds),
      });
    });
  }

  async getMatchup(leagueKey: string, week?: number) {
    const teamKey = await this.requireTeamKey(leagueKey);
    const rawMatchups = await this.yahoo.getTeamMatchups(teamKey, week);
    return {
      league_key: leagueKey,
      team_key: teamKey,
      week: week ?? 'current',
      raw_matchups: rawMatchups,
    };
  }

  async compareTeams(leagueKey: string, teamKeyA: string, teamKeyB: string) {
    const [rosterA, rosterB] = await Promise.all([
      this.yahoo.getTeamRoster(teamKeyA),
      this.yahoo.getTeamRoster(teamKeyB),
    ]);

    const teamA = this.normalizer.normalize(rosterA);
    const teamB = this.normalizer.normalize(rosterB);

    return {
      league_key: leagueKey,
      team_a: {
        team_key: teamKeyA,
        roster: teamA.players.map(rosterPlayerToResponse),
        invalid_entries: teamA.invalidCount,
      },
      team_b: {
        team_key: teamKeyB,
        roster: teamB.players.map(rosterPlayerToResponse),
        invalid_entries: teamB.invalidCount,
      },
    };
  }

  private async requireTeamKey(leagueKey: string): Promise<string> {
    const teamKey = await this.yahoo.findUserTeamKey(leagueKey);
    if (!teamKey) throw LineupErrors.teamNotFound(leagueKey);
    return teamKey;
  }

  private async fetchEnrichment(week?: number): Promise<EnrichmentResult> {
    if (!this.enrichment) return { feeds: [], warnings: [] };
    return this.enrichment.fetchFeeds({ week });
  }
}

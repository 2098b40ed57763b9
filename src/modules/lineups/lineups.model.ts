import {
  LineupResult,
  Player,
  StarterAssignment,
} from '../lineup-optimizer/lineup-optimizer.model';

export interface LineupResponseContext {
  leagueKey: string;
  teamKey: string;
  week?: number;
  strategy: string;
  benchLimit: number;
  /** Soft failures from fetching settings and feeds */
  sourceWarnings: string[];
  dataSources: string[];
}

export function round1(value: number | null): number | null {
  return value === null ? null : Math.round(value * 10) / 10;
}

export function formatTrending(adds: number): string | null {
  return adds > 0 ? `${adds.toLocaleString('en-US')} adds` : null;
}

function tierLabel(player: Player): string {
  return player.tier.toUpperCase();
}

export function starterToResponse({ player, slot, fallback }: StarterAssignment) {
  return {
    name: player.name,
    slot,
    position: player.position,
    tier: tierLabel(player),
    team: player.team,
    opponent: player.opponent,
    status: player.status,
    matchup_score: player.matchupScore,
    matchup: player.matchupDescription,
    composite_score: round1(player.compositeScore),
    yahoo_proj: round1(player.projectionA),
    sleeper_proj: round1(player.projectionB),
    trending: formatTrending(player.trendingScore),
    floor: round1(player.floorProjection),
    ceiling: round1(player.ceilingProjection),
    fallback,
  };
}

export function benchPlayerToResponse(player: Player) {
  return {
    name: player.name,
    position: player.position,
    opponent: player.opponent,
    composite_score: round1(player.compositeScore),
    matchup_score: player.matchupScore,
    tier: tierLabel(player),
  };
}

export function rosterPlayerToResponse(player: Player) {
  return {
    player_key: player.playerKey,
    name: player.name,
    position: player.position,
    team: player.team,
    opponent: player.opponent,
    status: player.status,
    selected_position: player.selectedPosition,
    projected_points: round1(player.projectionA),
  };
}

/**
 * Shape a LineupResult for the API: starters keyed by slot label, bench
 * capped for display, analysis block with the data-quality counters.
 */
export function lineupResultToResponse(result: LineupResult, context: LineupResponseContext) {
  const optimalLineup: Record<string, ReturnType<typeof starterToResponse>> = {};
  for (const starter of result.starters) {
    optimalLineup[starter.label] = starterToResponse(starter);
  }

  const quality = result.dataQuality;

  return {
    status: result.status,
    league_key: context.leagueKey,
    team_key: context.teamKey,
    week: context.week ?? 'current',
    strategy: context.strategy,
    optimal_lineup: optimalLineup,
    bench: result.bench.slice(0, context.benchLimit).map(benchPlayerToResponse),
    recommendations: [...result.recommendations],
    errors: [...result.errors],
    warnings: [...context.sourceWarnings, ...result.warnings],
    analysis: {
      total_players: quality.totalPlayers,
      valid_players: quality.validPlayers,
      invalid_entries: quality.invalidEntries,
      players_with_projections: quality.playersWithProjections,
      players_with_matchup_data: quality.playersWithMatchupData,
      starters_score: round1(quality.startersScore),
      optimal_score: round1(quality.optimalScore),
      strategy_used: result.strategyUsed,
      data_sources: context.dataSources,
    },
  };
}

export type LineupResponse = ReturnType<typeof lineupResultToResponse>;

import { Request, Response } from 'express';
import { LineupService } from './lineups.service';
import {
  buildLineupQuerySchema,
  compareTeamsQuerySchema,
  leagueKeyParamsSchema,
  matchupQuerySchema,
} from './lineups.schemas';

/**
 * Params and query have already passed validateRequest; parsing again here
 * only recovers their types (defaults and coercion are idempotent).
 */
export class LineupController {
  constructor(private readonly lineupService: LineupService) {}

  buildLineup = async (req: Request, res: Response) => {
    const { leagueKey } = leagueKeyParamsSchema.parse(req.params);
    const { week, strategy } = buildLineupQuerySchema.parse(req.query);

    const lineup = await this.lineupService.buildLineup({ leagueKey, week, strategy });
    // A completed run that could not produce a lineup (empty roster,
    // unfillable slot) is reported in the body, not as a server error
    res.status(lineup.status === 'error' ? 422 : 200).json(lineup);
  };

  getMatchup = async (req: Request, res: Response) => {
    const { leagueKey } = leagueKeyParamsSchema.parse(req.params);
    const { week } = matchupQuerySchema.parse(req.query);

    const matchup = await this.lineupService.getMatchup(leagueKey, week);
    res.status(200).json(matchup);
  };

  compareTeams = async (req: Request, res: Response) => {
    const { leagueKey } = leagueKeyParamsSchema.parse(req.params);
    const { teamKeyA, teamKeyB } = compareTeamsQuerySchema.parse(req.query);

    const comparison = await this.lineupService.compareTeams(leagueKey, teamKeyA, teamKeyB);
    res.status(200).json(comparison);
  };
}

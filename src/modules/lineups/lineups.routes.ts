import { Router } from 'express';
import { LineupController } from './lineups.controller';
import { LineupService } from './lineups.service';
import { validateRequest } from '../../middleware/validation.middleware';
import { apiReadLimiter, lineupBuildLimiter } from '../../middleware/rate-limit.middleware';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import {
  buildLineupQuerySchema,
  compareTeamsQuerySchema,
  leagueKeyParamsSchema,
  matchupQuerySchema,
} from './lineups.schemas';

export function createLineupRoutes(lineupService: LineupService): Router {
  const controller = new LineupController(lineupService);
  const router = Router();

  // GET /api/leagues/:leagueKey/lineup?week=<n>&strategy=<balanced|floor|ceiling>
  router.get(
    '/:leagueKey/lineup',
    lineupBuildLimiter,
    validateRequest(leagueKeyParamsSchema, 'params'),
    validateRequest(buildLineupQuerySchema, 'query'),
    asyncHandler(controller.buildLineup)
  );

  // GET /api/leagues/:leagueKey/matchup?week=<n>
  router.get(
    '/:leagueKey/matchup',
    apiReadLimiter,
    validateRequest(leagueKeyParamsSchema, 'params'),
    validateRequest(matchupQuerySchema, 'query'),
    asyncHandler(controller.getMatchup)
  );

  // GET /api/leagues/:leagueKey/compare?teamKeyA=<key>&teamKeyB=<key>
  router.get(
    '/:leagueKey/compare',
    apiReadLimiter,
    validateRequest(leagueKeyParamsSchema, 'params'),
    validateRequest(compareTeamsQuerySchema, 'query'),
    asyncHandler(controller.compareTeams)
  );

  return router;
}

export default function lineupRoutes(): Router {
  return createLineupRoutes(container.resolve<LineupService>(KEYS.LINEUP_SERVICE));
}

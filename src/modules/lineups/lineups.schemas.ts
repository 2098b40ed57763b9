import { z } from 'zod';

const LEAGUE_KEY = /^\d+\.l\.\d+$/;
const TEAM_KEY = /^\d+\.l\.\d+\.t\.\d+$/;

// ========== Route params ==========
export const leagueKeyParamsSchema = z.object({
  leagueKey: z.string().regex(LEAGUE_KEY, 'leagueKey must look like 449.l.123456'),
});

export type LeagueKeyParams = z.infer<typeof leagueKeyParamsSchema>;

const weekField = z.coerce.number().int().min(1).max(18).optional();

// ========== Build lineup query ==========
// strategy stays a plain string here: the service rejects unknown values
// with INVALID_STRATEGY so callers see one error code for it
export const buildLineupQuerySchema = z.object({
  week: weekField,
  strategy: z.string().trim().toLowerCase().max(20).default('balanced'),
});

export type BuildLineupQuery = z.infer<typeof buildLineupQuerySchema>;

// ========== Matchup query ==========
export const matchupQuerySchema = z.object({
  week: weekField,
});

export type MatchupQuery = z.infer<typeof matchupQuerySchema>;

// ========== Compare teams query ==========
export const compareTeamsQuerySchema = z
  .object({
    teamKeyA: z.string().regex(TEAM_KEY, 'teamKeyA must look like 449.l.123456.t.1'),
    teamKeyB: z.string().regex(TEAM_KEY, 'teamKeyB must look like 449.l.123456.t.2'),
  })
  .refine((q) => q.teamKeyA !== q.teamKeyB, {
    message: 'teamKeyA and teamKeyB must be different teams',
    path: ['teamKeyB'],
  });

export type CompareTeamsQuery = z.infer<typeof compareTeamsQuerySchema>;

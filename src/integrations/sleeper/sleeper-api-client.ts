import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ExternalApiException } from '../../utils/exceptions';
import { isTransientError, withRetry } from '../shared/transient-errors';

export const SLEEPER_API_URL = 'https://api.sleeper.app/v1';
/** Projections with player identity and opponent live on the newer host */
export const SLEEPER_PROJECTIONS_URL = 'https://api.sleeper.com';

export const PROJECTION_POSITIONS = ['QB', 'RB', 'WR', 'TE', 'K', 'DEF'] as const;

const nflStateSchema = z.object({
  season: z.coerce.string(),
  week: z.coerce.number(),
  season_type: z.string(),
  display_week: z.coerce.number().optional(),
});

export type SleeperNflState = z.infer<typeof nflStateSchema>;

const projectionRowSchema = z.object({
  player_id: z.coerce.string(),
  player: z
    .object({
      first_name: z.string().nullish(),
      last_name: z.string().nullish(),
      position: z.string().nullish(),
      team: z.string().nullish(),
    })
    .nullish(),
  team: z.string().nullish(),
  opponent: z.string().nullish(),
  stats: z
    .object({
      pts_ppr: z.number().nullish(),
      pts_half_ppr: z.number().nullish(),
      pts_std: z.number().nullish(),
    })
    .nullish(),
});

export type SleeperProjectionRow = z.infer<typeof projectionRowSchema>;

const trendingRowSchema = z.object({
  player_id: z.coerce.string(),
  count: z.coerce.number(),
});

export type SleeperTrendingRow = z.infer<typeof trendingRowSchema>;

/**
 * Keep rows that parse; Sleeper adds and drops fields between seasons.
 */
function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T[] {
  if (!Array.isArray(data)) return [];
  const rows: T[] = [];
  for (const item of data) {
    const parsed = schema.safeParse(item);
    if (parsed.success) rows.push(parsed.data);
  }
  return rows;
}

export class SleeperApiClient {
  private readonly client: AxiosInstance;
  private readonly projectionsClient: AxiosInstance;

  constructor(private readonly retry: { maxRetries?: number; baseDelayMs?: number } = {}) {
    this.client = axios.create({
      baseURL: SLEEPER_API_URL,
      timeout: 30000,
      headers: { Accept: 'application/json' },
    });
    this.projectionsClient = axios.create({
      baseURL: SLEEPER_PROJECTIONS_URL,
      timeout: 30000,
      headers: { Accept: 'application/json' },
    });
  }

  private async request<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, { apiName: 'Sleeper', context, ...this.retry });
    } catch (error) {
      if (axios.isAxiosError(error) && !isTransientError(error)) {
        throw new ExternalApiException(
          'Sleeper',
          context,
          error.message,
          error.response?.status === 429 ? 429 : 502,
          error
        );
      }
      throw ExternalApiException.fromError('Sleeper', context, error);
    }
  }

  async fetchNflState(): Promise<SleeperNflState> {
    const data = await this.request('state/nfl', async () => {
      const response = await this.client.get<unknown>('/state/nfl');
      return response.data;
    });
    const parsed = nflStateSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalApiException('Sleeper', 'state/nfl', 'Unexpected NFL state shape');
    }
    return parsed.data;
  }

  /**
   * Weekly projections for the given positions, one row per player.
   * @param season - NFL season year (e.g., "2025")
   * @param week - Week number (1-18 for regular season)
   */
  async fetchWeeklyProjections(
    season: string,
    week: number,
    positions: readonly string[] = PROJECTION_POSITIONS
  ): Promise<SleeperProjectionRow[]> {
    const params = new URLSearchParams({ season_type: 'regular' });
    for (const position of positions) params.append('position[]', position);

    const data = await this.request(`projections/nfl/${season}/${week}`, async () => {
      const response = await this.projectionsClient.get<unknown>(
        `/projections/nfl/${season}/${week}?${params.toString()}`
      );
      return response.data;
    });
    return parseRows(projectionRowSchema, data);
  }

  /**
   * Players most added across Sleeper leagues in the lookback window.
   */
  async fetchTrendingAdds(lookbackHours = 24, limit = 200): Promise<SleeperTrendingRow[]> {
    const data = await this.request('players/nfl/trending/add', async () => {
      const response = await this.client.get<unknown>('/players/nfl/trending/add', {
        params: { lookback_hours: lookbackHours, limit },
      });
      return response.data;
    });
    return parseRows(trendingRowSchema, data);
  }
}

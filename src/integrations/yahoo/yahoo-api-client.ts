import axios, { AxiosInstance } from 'axios';
import { logger } from '../../config/logger.config';
import { AppException, ExternalApiException, LineupErrors } from '../../utils/exceptions';
import { errorMessage, isTransientError, withRetry } from '../shared/transient-errors';
import { TokenStore } from './env-token-store';
import { YahooOAuthClient } from './yahoo-oauth.client';

export const YAHOO_FANTASY_BASE_URL = 'https://fantasysports.yahooapis.com/fantasy/v2';

export interface YahooApiClientOptions {
  baseURL?: string;
  maxRetries?: number;
  baseDelayMs?: number;
}

/**
 * Every team_key found anywhere in a Yahoo response, in document order.
 */
export function collectTeamKeys(node: unknown, found: string[] = []): string[] {
  if (Array.isArray(node)) {
    for (const item of node) collectTeamKeys(item, found);
  } else if (node !== null && typeof node === 'object') {
    for (const [key, value] of Object.entries(node)) {
      if (key === 'team_key' && typeof value === 'string') {
        if (!found.includes(value)) found.push(value);
      } else {
        collectTeamKeys(value, found);
      }
    }
  }
  return found;
}

function weekSuffix(week?: number): string {
  return week !== undefined ? `;week=${week}` : '';
}

/**
 * Yahoo Fantasy Sports REST client.
 *
 * JSON responses (`format=json`). Transient failures are retried with
 * backoff; a 401 triggers one token refresh and a replay of the request.
 */
export class YahooApiClient {
  private readonly client: AxiosInstance;
  /** Shared by concurrent requests that hit a 401 together */
  private refreshInFlight: Promise<void> | null = null;

  constructor(
    private readonly tokenStore: TokenStore,
    private readonly oauth: YahooOAuthClient | null,
    private readonly options: YahooApiClientOptions = {}
  ) {
    this.client = axios.create({
      baseURL: options.baseURL ?? YAHOO_FANTASY_BASE_URL,
      timeout: 30000,
      headers: { Accept: 'application/json' },
    });
  }

  async getUserTeams(): Promise<unknown> {
    return this.get('users;use_login=1/games;game_keys=nfl/teams');
  }

  async getTeamRoster(teamKey: string, week?: number): Promise<unknown> {
    return this.get(`team/${teamKey}/roster${weekSuffix(week)}`);
  }

  async getLeagueSettings(leagueKey: string): Promise<unknown> {
    return this.get(`league/${leagueKey}/settings`);
  }

  async getTeamMatchups(teamKey: string, week?: number): Promise<unknown> {
    return this.get(`team/${teamKey}/matchups${weekSuffix(week)}`);
  }

  /**
   * The logged-in user's team in a league, or null when they have none there.
   */
  async findUserTeamKey(leagueKey: string): Promise<string | null> {
    const teams = await this.getUserTeams();
    return collectTeamKeys(teams).find((key) => key.startsWith(`${leagueKey}.t.`)) ?? null;
  }

  private async get(path: string): Promise<unknown> {
    try {
      return await this.getWithRetry(path);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 401 && this.oauth) {
        await this.refreshTokens();
        return this.translateErrors(path, () => this.getWithRetry(path));
      }
      throw this.toAppException(path, error);
    }
  }

  private async translateErrors(path: string, fn: () => Promise<unknown>): Promise<unknown> {
    try {
      return await fn();
    } catch (error) {
      throw this.toAppException(path, error);
    }
  }

  private getWithRetry(path: string): Promise<unknown> {
    const tokens = this.tokenStore.load();
    if (!tokens) throw LineupErrors.credentialsMissing();

    return withRetry(
      async () => {
        const response = await this.client.get<unknown>(`/${path}`, {
          params: { format: 'json' },
          headers: { Authorization: `Bearer ${tokens.accessToken}` },
        });
        return response.data;
      },
      {
        apiName: 'Yahoo',
        context: path,
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.baseDelayMs,
      }
    );
  }

  private refreshTokens(): Promise<void> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.exchangeRefreshToken().finally(() => {
        this.refreshInFlight = null;
      });
    }
    return this.refreshInFlight;
  }

  private async exchangeRefreshToken(): Promise<void> {
    const tokens = this.tokenStore.load();
    if (!tokens || !this.oauth) throw LineupErrors.credentialsMissing();

    logger.info('Yahoo access token expired, refreshing');
    const grant = await this.oauth.refresh(tokens.refreshToken);
    await this.tokenStore.save({
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      guid: grant.guid ?? tokens.guid,
    });
  }

  private toAppException(path: string, error: unknown): AppException {
    if (error instanceof AppException) return error;
    if (!axios.isAxiosError(error)) return ExternalApiException.fromError('Yahoo', path, error);

    const status = error.response?.status;
    logger.warn('Yahoo API request failed', { path, status, error: errorMessage(error) });

    if (status === 401) return LineupErrors.refreshFailed('access token rejected');
    if (status === 429) return ExternalApiException.rateLimited('Yahoo', path);
    if (error.code === 'ECONNABORTED' && isTransientError(error)) {
      return ExternalApiException.timeout('Yahoo', path);
    }
    return ExternalApiException.fromError('Yahoo', path, error);
  }
}

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import { ExternalApiException, LineupErrors } from '../../utils/exceptions';
import { errorMessage } from '../shared/transient-errors';
import { YahooTokens } from './env-token-store';

export const YAHOO_AUTH_URL = 'https://api.login.yahoo.com/oauth2/request_auth';
export const YAHOO_TOKEN_URL = 'https://api.login.yahoo.com/oauth2/get_token';

/** Out-of-band redirect: Yahoo shows the verification code on screen */
const OOB_REDIRECT = 'oob';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().optional(),
  xoauth_yahoo_guid: z.string().optional(),
});

export interface TokenGrant extends YahooTokens {
  /** Seconds until the access token expires */
  expiresIn: number;
}

export interface YahooAppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Yahoo OAuth 2.0 token exchange and refresh (client credentials via HTTP Basic).
 */
export class YahooOAuthClient {
  private readonly client: AxiosInstance;

  constructor(private readonly credentials: YahooAppCredentials) {
    this.client = axios.create({ timeout: 30000 });
  }

  /**
   * URL the user opens to approve access; Yahoo then displays a code.
   */
  authorizationUrl(): string {
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: OOB_REDIRECT,
      response_type: 'code',
      language: 'en-us',
    });
    return `${YAHOO_AUTH_URL}?${params.toString()}`;
  }

  async exchangeCode(verificationCode: string): Promise<TokenGrant> {
    const grant = await this.requestToken('exchangeCode', {
      grant_type: 'authorization_code',
      redirect_uri: OOB_REDIRECT,
      code: verificationCode.trim(),
    });
    if (!grant.refresh_token) {
      throw new ExternalApiException('Yahoo', 'exchangeCode', 'Token response had no refresh token');
    }
    return toGrant(grant, grant.refresh_token);
  }

  /**
   * Yahoo may omit refresh_token on refresh; the old one stays valid then.
   */
  async refresh(refreshToken: string): Promise<TokenGrant> {
    const grant = await this.requestToken('refresh', {
      grant_type: 'refresh_token',
      redirect_uri: OOB_REDIRECT,
      refresh_token: refreshToken,
    });
    return toGrant(grant, grant.refresh_token ?? refreshToken);
  }

  private basicAuth(): string {
    const raw = `${this.credentials.clientId}:${this.credentials.clientSecret}`;
    return `Basic ${Buffer.from(raw).toString('base64')}`;
  }

  private async requestToken(
    operation: string,
    form: Record<string, string>
  ): Promise<z.infer<typeof tokenResponseSchema>> {
    let data: unknown;
    try {
      const response = await this.client.post(YAHOO_TOKEN_URL, new URLSearchParams(form).toString(), {
        headers: {
          Authorization: this.basicAuth(),
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.warn('Yahoo token request failed', { operation, status, error: errorMessage(error) });
      // 400/401 here means the code or refresh token is no longer accepted
      if (status === 400 || status === 401) throw LineupErrors.refreshFailed(`HTTP ${status}`);
      throw ExternalApiException.fromError('Yahoo', operation, error);
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalApiException('Yahoo', operation, 'Unexpected token response shape');
    }
    return parsed.data;
  }
}

function toGrant(grant: z.infer<typeof tokenResponseSchema>, refreshToken: string): TokenGrant {
  return {
    accessToken: grant.access_token,
    refreshToken,
    guid: grant.xoauth_yahoo_guid ?? null,
    expiresIn: grant.expires_in ?? 3600,
  };
}

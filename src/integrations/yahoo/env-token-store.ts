import { promises as fs } from 'fs';
import { logger } from '../../config/logger.config';

export interface YahooTokens {
  accessToken: string;
  refreshToken: string;
  guid?: string | null;
}

/**
 * Where Yahoo tokens live between process restarts.
 */
export interface TokenStore {
  load(): YahooTokens | null;
  save(tokens: YahooTokens): Promise<void>;
}

const ENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

/**
 * Replace `KEY=...` lines in place and append keys that are not present yet.
 * Comments, blank lines and unrelated keys are left untouched.
 */
export function upsertEnvLines(content: string, updates: Readonly<Record<string, string>>): string {
  const pending = new Map(Object.entries(updates));
  const lines = content.length > 0 ? content.split(/\r?\n/) : [];

  const updated = lines.map((line) => {
    const match = ENV_LINE.exec(line);
    if (!match) return line;
    const value = pending.get(match[1]);
    if (value === undefined) return line;
    pending.delete(match[1]);
    return `${match[1]}=${value}`;
  });

  // Drop the empty element a trailing newline leaves behind before appending
  while (updated.length > 0 && updated[updated.length - 1] === '') updated.pop();
  for (const [key, value] of pending) updated.push(`${key}=${value}`);

  return `${updated.join('\n')}\n`;
}

export function tokensToEnv(tokens: YahooTokens): Record<string, string> {
  const values: Record<string, string> = {
    YAHOO_ACCESS_TOKEN: tokens.accessToken,
    YAHOO_REFRESH_TOKEN: tokens.refreshToken,
  };
  if (tokens.guid) values.YAHOO_GUID = tokens.guid;
  return values;
}

/**
 * Keeps tokens in memory and writes refreshed ones back to the .env file.
 */
export class EnvTokenStore implements TokenStore {
  private tokens: YahooTokens | null;

  constructor(
    private readonly filePath: string,
    initial: { accessToken?: string; refreshToken?: string; guid?: string }
  ) {
    this.tokens =
      initial.accessToken && initial.refreshToken
        ? {
            accessToken: initial.accessToken,
            refreshToken: initial.refreshToken,
            guid: initial.guid ?? null,
          }
        : null;
  }

  load(): YahooTokens | null {
    return this.tokens;
  }

  async save(tokens: YahooTokens): Promise<void> {
    this.tokens = { ...tokens, guid: tokens.guid ?? this.tokens?.guid ?? null };

    let current = '';
    try {
      current = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
      logger.info('Env file not found, creating it', { path: this.filePath });
    }

    await fs.writeFile(this.filePath, upsertEnvLines(current, tokensToEnv(this.tokens)), 'utf8');
    logger.info('Yahoo tokens saved', { path: this.filePath });
  }
}

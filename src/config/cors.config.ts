import { env } from './env.config';

/**
 * Normalize an origin by stripping trailing slashes.
 */
function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Build the production origin allowlist from FRONTEND_URL and FRONTEND_URLS.
 */
function buildAllowlist(): string[] {
  const origins: string[] = [];

  if (env.FRONTEND_URL) {
    origins.push(normalizeOrigin(env.FRONTEND_URL));
  }

  if (env.FRONTEND_URLS) {
    const extra = env.FRONTEND_URLS.split(',')
      .map((s) => normalizeOrigin(s.trim()))
      .filter(Boolean);
    origins.push(...extra);
  }

  return origins;
}

const allowlist = buildAllowlist();

const DEV_ORIGIN_PATTERN = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

export function isAllowedOrigin(origin: string): boolean {
  return allowlist.includes(normalizeOrigin(origin));
}

export function isAllowedDevOrigin(origin: string): boolean {
  return DEV_ORIGIN_PATTERN.test(origin);
}

/**
 * Refresh the Yahoo access token with the stored refresh token.
 * Usage: npm run auth:refresh
 */
import { env } from '../src/config/env.config';
import { YahooOAuthClient } from '../src/integrations/yahoo/yahoo-oauth.client';
import { EnvTokenStore } from '../src/integrations/yahoo/env-token-store';

async function main() {
  if (!env.YAHOO_CLIENT_ID || !env.YAHOO_CLIENT_SECRET || !env.YAHOO_REFRESH_TOKEN) {
    console.error(
      'ERROR: YAHOO_CLIENT_ID, YAHOO_CLIENT_SECRET and YAHOO_REFRESH_TOKEN must be set. Run npm run auth:setup first.'
    );
    process.exit(1);
  }

  const oauth = new YahooOAuthClient({
    clientId: env.YAHOO_CLIENT_ID,
    clientSecret: env.YAHOO_CLIENT_SECRET,
  });

  console.log('Refreshing Yahoo token...');
  const grant = await oauth.refresh(env.YAHOO_REFRESH_TOKEN);

  const store = new EnvTokenStore(env.ENV_FILE_PATH, {
    accessToken: env.YAHOO_ACCESS_TOKEN,
    refreshToken: env.YAHOO_REFRESH_TOKEN,
    guid: env.YAHOO_GUID,
  });
  await store.save(grant);

  console.log(`Token refreshed, expires in ${(grant.expiresIn / 3600).toFixed(1)} hours.`);
  console.log(`Updated ${env.ENV_FILE_PATH}. Restart the server to pick up the new token.`);
}

main().catch((error: unknown) => {
  console.error('Token refresh failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});

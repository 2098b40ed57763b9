/**
 * One-time Yahoo Fantasy API authentication.
 * Opens nothing by itself: prints the authorization URL, reads the code
 * Yahoo displays, exchanges it and writes the tokens into the env file.
 * Usage: npm run auth:setup
 */
import { createInterface } from 'readline/promises';
import { env } from '../src/config/env.config';
import { YahooOAuthClient } from '../src/integrations/yahoo/yahoo-oauth.client';
import { EnvTokenStore } from '../src/integrations/yahoo/env-token-store';
import { YAHOO_FANTASY_BASE_URL, YahooApiClient } from '../src/integrations/yahoo/yahoo-api-client';

async function main() {
  if (!env.YAHOO_CLIENT_ID || !env.YAHOO_CLIENT_SECRET) {
    console.error('ERROR: YAHOO_CLIENT_ID and YAHOO_CLIENT_SECRET must be set in the env file');
    process.exit(1);
  }

  const oauth = new YahooOAuthClient({
    clientId: env.YAHOO_CLIENT_ID,
    clientSecret: env.YAHOO_CLIENT_SECRET,
  });

  console.log('1. Open this URL in your browser and approve access:\n');
  console.log(`   ${oauth.authorizationUrl()}\n`);
  console.log('2. Yahoo will show a verification code. Paste it below.\n');

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const code = (await rl.question('Verification code: ')).trim();
  rl.close();

  if (!code) {
    console.error('No verification code provided.');
    process.exit(1);
  }

  const grant = await oauth.exchangeCode(code);
  const store = new EnvTokenStore(env.ENV_FILE_PATH, {});
  await store.save(grant);
  console.log(`\nTokens saved to ${env.ENV_FILE_PATH} (expire in ${Math.round(grant.expiresIn / 60)} minutes, refreshed automatically).`);

  console.log('Testing connection...');
  const client = new YahooApiClient(store, oauth, { maxRetries: 0 });
  await client.getUserTeams();
  console.log(`Connection to ${YAHOO_FANTASY_BASE_URL} OK.`);
}

main().catch((error: unknown) => {
  console.error('Yahoo auth setup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});

// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import { container, KEYS } from './container';

// Yahoo
import { EnvTokenStore, TokenStore } from './integrations/yahoo/env-token-store';
import { YahooOAuthClient } from './integrations/yahoo/yahoo-oauth.client';
import { YahooApiClient } from './integrations/yahoo/yahoo-api-client';

// Enrichment
import { SleeperApiClient } from './integrations/sleeper/sleeper-api-client';
import { SleeperEnrichmentProvider } from './integrations/sleeper/sleeper-enrichment.provider';
import { IEnrichmentProvider } from './integrations/shared/enrichment-provider.interface';

// Optimizer
import { LineupOptimizer } from './modules/lineup-optimizer/lineup-optimizer';
import { YahooRosterPositionExtractor } from './modules/lineup-optimizer/roster-positions.extractor';
import { YahooPlayerNormalizer } from './modules/lineup-optimizer/player.normalizer';
import { IdentityEnrichmentMerger } from './modules/lineup-optimizer/enrichment.merger';
import {
  EnrichmentMerger,
  PlayerNormalizer,
  RosterPositionExtractor,
} from './modules/lineup-optimizer/lineup-optimizer.interface';

// Services
import { LineupService } from './modules/lineups/lineups.service';

function bootstrap(): void {
  // Yahoo
  container.register(
    KEYS.TOKEN_STORE,
    () =>
      new EnvTokenStore(env.ENV_FILE_PATH, {
        accessToken: env.YAHOO_ACCESS_TOKEN,
        refreshToken: env.YAHOO_REFRESH_TOKEN,
        guid: env.YAHOO_GUID,
      })
  );

  container.register(KEYS.YAHOO_OAUTH, () =>
    env.YAHOO_CLIENT_ID && env.YAHOO_CLIENT_SECRET
      ? new YahooOAuthClient({
          clientId: env.YAHOO_CLIENT_ID,
          clientSecret: env.YAHOO_CLIENT_SECRET,
        })
      : null
  );

  container.register(
    KEYS.YAHOO_CLIENT,
    () =>
      new YahooApiClient(
        container.resolve<TokenStore>(KEYS.TOKEN_STORE),
        container.resolve<YahooOAuthClient | null>(KEYS.YAHOO_OAUTH)
      )
  );

  // Enrichment
  container.register(KEYS.SLEEPER_CLIENT, () => new SleeperApiClient());

  container.register(KEYS.ENRICHMENT_PROVIDER, () =>
    env.SLEEPER_ENRICHMENT
      ? new SleeperEnrichmentProvider(
          container.resolve<SleeperApiClient>(KEYS.SLEEPER_CLIENT),
          env.SLEEPER_SCORING_FORMAT
        )
      : null
  );

  // Optimizer collaborators
  container.register(KEYS.ROSTER_POSITION_EXTRACTOR, () => new YahooRosterPositionExtractor());
  container.register(KEYS.PLAYER_NORMALIZER, () => new YahooPlayerNormalizer());
  container.register(KEYS.ENRICHMENT_MERGER, () => new IdentityEnrichmentMerger());

  container.register(
    KEYS.LINEUP_OPTIMIZER,
    () =>
      new LineupOptimizer(
        container.resolve<RosterPositionExtractor>(KEYS.ROSTER_POSITION_EXTRACTOR),
        container.resolve<PlayerNormalizer>(KEYS.PLAYER_NORMALIZER),
        container.resolve<EnrichmentMerger>(KEYS.ENRICHMENT_MERGER),
        env.RECOMMENDATION_MARGIN
      )
  );

  // Services
  container.register(
    KEYS.LINEUP_SERVICE,
    () =>
      new LineupService(
        container.resolve<YahooApiClient>(KEYS.YAHOO_CLIENT),
        container.resolve<LineupOptimizer>(KEYS.LINEUP_OPTIMIZER),
        container.resolve<PlayerNormalizer>(KEYS.PLAYER_NORMALIZER),
        container.resolve<IEnrichmentProvider | null>(KEYS.ENRICHMENT_PROVIDER),
        env.BENCH_DISPLAY_LIMIT
      )
  );
}

// Auto-run bootstrap when this module is imported
bootstrap();

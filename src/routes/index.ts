import { Router } from 'express';
import lineupRoutes from '../modules/lineups/lineups.routes';
import { metrics } from '../services/metrics.service';
import { container, KEYS } from '../container';
import { TokenStore } from '../integrations/yahoo/env-token-store';
import { IEnrichmentProvider } from '../integrations/shared/enrichment-provider.interface';

const router = Router();

// Health check
router.get('/health', (req, res) => {
  const yahooConfigured = container.resolve<TokenStore>(KEYS.TOKEN_STORE).load() !== null;
  const enrichment = container.resolve<IEnrichmentProvider | null>(KEYS.ENRICHMENT_PROVIDER);

  res.status(200).json({
    status: yahooConfigured ? 'ok' : 'degraded',
    timestamp: new Date().toISOString(),
    yahoo: yahooConfigured ? 'configured' : 'missing_credentials',
    enrichment: enrichment ? enrichment.providerId : 'disabled',
  });
});

// Metrics endpoint
router.get('/metrics', (req, res) => {
  res.json({
    timestamp: new Date().toISOString(),
    ...metrics.getMetrics(),
  });
});

// Lineup, matchup and compare routes
router.use('/leagues', lineupRoutes());

export default router;

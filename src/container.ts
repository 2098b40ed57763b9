type Factory<T> = () => T;

class Container {
  private factories = new Map<string, Factory<unknown>>();
  private instances = new Map<string, unknown>();

  register<T>(key: string, factory: Factory<T>): void {
    this.factories.set(key, factory);
  }

  resolve<T>(key: string): T {
    // Return cached instance if exists
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }

    // Create new instance
    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as T;
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: clear all instances (factories stay registered)
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: override with mock
  override<T>(key: string, instance: T): void {
    this.instances.set(key, instance);
  }
}

export const container = new Container();

export const KEYS = {
  // Yahoo
  TOKEN_STORE: 'tokenStore',
  YAHOO_OAUTH: 'yahooOAuth',
  YAHOO_CLIENT: 'yahooClient',

  // Enrichment
  SLEEPER_CLIENT: 'sleeperClient',
  ENRICHMENT_PROVIDER: 'enrichmentProvider',

  // Optimizer collaborators
  ROSTER_POSITION_EXTRACTOR: 'rosterPositionExtractor',
  PLAYER_NORMALIZER: 'playerNormalizer',
  ENRICHMENT_MERGER: 'enrichmentMerger',
  LINEUP_OPTIMIZER: 'lineupOptimizer',

  // Services
  LINEUP_SERVICE: 'lineupService',
} as const;

/**
 * Lineup optimizer module exports
 */

export * from './lineup-optimizer.model';
export { LineupOptimizer, optimize, isActive, OptimizeOptions, PipelineInput } from './lineup-optimizer';
export {
  RosterPositionExtractor,
  PlayerNormalizer,
  EnrichmentMerger,
} from './lineup-optimizer.interface';
export { STRATEGY_WEIGHTS, DEFAULT_RECOMMENDATION_MARGIN } from './lineup-optimizer.config';
export { YahooRosterPositionExtractor, extractRosterPositions } from './roster-positions.extractor';
export { YahooPlayerNormalizer, normalizePlayers } from './player.normalizer';
export { flattenYahooRoster } from './yahoo-roster.flattener';
export { IdentityEnrichmentMerger, mergeEnrichment } from './enrichment.merger';
export { playerIdentityKey, normalizePlayerName, normalizeTeam } from './player-identity';
export { buildSlotTemplate, getDefaultSlotTemplate, isReserveSlot } from './slot-eligibility';

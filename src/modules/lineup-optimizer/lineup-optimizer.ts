import {
  DataQuality,
  EnrichmentFeed,
  isStrategy,
  LineupResult,
  LineupStatus,
  OptimizerIssue,
  OptimizerIssueKind,
  OptimizerStage,
  Player,
  RosterPosition,
  Slot,
} from './lineup-optimizer.model';
import { DEFAULT_RECOMMENDATION_MARGIN, INACTIVE_STATUSES } from './lineup-optimizer.config';
import {
  EnrichmentMerger,
  PlayerNormalizer,
  RosterPositionExtractor,
} from './lineup-optimizer.interface';
import { buildSlotTemplate, getDefaultSlotTemplate } from './slot-eligibility';
import { scorePlayers } from './composite-scorer';
import { classifyTiers } from './tier-classifier';
import { solveLineup, sortBench } from './lineup-solver';
import { solveOptimalLineup } from './optimal-assignment';
import {
  assessOptimality,
  computeDataQuality,
  generateRecommendations,
  inactiveStarterIssues,
} from './diagnostics';
import { logger } from '../../config/logger.config';

export interface OptimizeOptions {
  /** Raw entries the normalizer could not use */
  invalidEntries?: number;
  recommendationMargin?: number;
}

export interface PipelineInput {
  rawRoster: unknown;
  settingsResponse: unknown;
  feeds?: readonly EnrichmentFeed[];
  strategy: unknown;
}

export function isActive(player: Player): boolean {
  return player.status === null || !INACTIVE_STATUSES.has(player.status.toUpperCase());
}

function emptyDataQuality(totalPlayers: number, invalidEntries: number): DataQuality {
  return {
    totalPlayers,
    validPlayers: 0,
    invalidEntries,
    playersWithProjections: 0,
    playersWithMatchupData: 0,
    startersScore: 0,
    optimalScore: 0,
  };
}

function freezeResult(result: LineupResult): LineupResult {
  for (const starter of result.starters) {
    Object.freeze(starter.player);
    Object.freeze(starter);
  }
  result.bench.forEach((player) => Object.freeze(player));
  Object.freeze(result.starters);
  Object.freeze(result.bench);
  Object.freeze(result.recommendations);
  Object.freeze(result.errors);
  Object.freeze(result.warnings);
  result.issues.forEach((issue) => Object.freeze(issue));
  Object.freeze(result.issues);
  Object.freeze(result.dataQuality);
  return Object.freeze(result);
}

function failureResult(
  kind: OptimizerIssueKind,
  stage: OptimizerStage,
  message: string,
  strategyUsed: string,
  dataQuality: DataQuality
): LineupResult {
  return freezeResult({
    status: 'error',
    starters: [],
    bench: [],
    recommendations: [],
    errors: [message],
    warnings: [],
    issues: [{ kind, severity: 'error', stage, message }],
    dataQuality,
    strategyUsed,
  });
}

function invalidStrategyResult(strategy: unknown, dataQuality: DataQuality): LineupResult {
  return failureResult(
    'InvalidStrategy',
    'validate',
    `Invalid strategy "${String(strategy)}": expected balanced, floor or ceiling`,
    String(strategy),
    dataQuality
  );
}

function unexpectedFailureResult(
  error: unknown,
  stage: OptimizerStage,
  strategy: string,
  dataQuality: DataQuality
): LineupResult {
  const reason = error instanceof Error ? error.message : String(error);
  logger.error('Lineup optimization failed', {
    stage,
    strategy,
    error: reason,
    stack: error instanceof Error ? error.stack : undefined,
  });
  return failureResult(
    'UnexpectedFailure',
    stage,
    `Unexpected failure during ${stage}: ${reason}`,
    strategy,
    dataQuality
  );
}

function resolveStatus(issues: readonly OptimizerIssue[], structurallyUnfillable: readonly string[]): LineupStatus {
  if (structurallyUnfillable.length > 0) return 'error';
  return issues.length > 0 ? 'ok-with-warnings' : 'ok';
}

/**
 * Score, classify and assign players to the slot template.
 *
 * Never throws: an invalid strategy, an empty pool or an internal fault all
 * come back as an `error` result carrying a typed issue. Players with an
 * inactive status are scored and benched but never started.
 *
 * @param players - Normalized (and optionally enriched) players
 * @param strategy - balanced, floor or ceiling; anything else is rejected
 * @param slotTemplate - {position, count} pairs; empty or missing uses the default template
 */
export function optimize(
  players: readonly Player[],
  strategy: unknown,
  slotTemplate?: readonly RosterPosition[] | null,
  options: OptimizeOptions = {}
): LineupResult {
  const invalidEntries = options.invalidEntries ?? 0;
  const totalPlayers = players.length + invalidEntries;

  if (!isStrategy(strategy)) {
    return invalidStrategyResult(strategy, emptyDataQuality(totalPlayers, invalidEntries));
  }

  let stage: OptimizerStage = 'normalize';
  try {
    if (players.length === 0) {
      return failureResult(
        'RosterParseFailure',
        'normalize',
        `No valid players to optimize (${totalPlayers} entries seen, ${invalidEntries} invalid)`,
        strategy,
        emptyDataQuality(totalPlayers, invalidEntries)
      );
    }

    stage = 'extract';
    const issues: OptimizerIssue[] = [];
    let slots: Slot[] = buildSlotTemplate(slotTemplate ?? []);
    if (slots.length === 0) {
      slots = getDefaultSlotTemplate();
      issues.push({
        kind: 'SettingsUnavailable',
        severity: 'warning',
        stage: 'extract',
        message: 'League roster settings unavailable; using the default lineup template',
      });
      logger.warn('Roster settings unavailable, using default template', { strategy });
    }

    stage = 'score';
    const scored = scorePlayers(players, strategy);

    stage = 'classify';
    const classified = classifyTiers(scored);
    // Inactive players stay in the result (bench) but never compete for a slot
    const active = classified.filter(isActive);
    const inactive = classified.filter((player) => !isActive(player));

    stage = 'solve';
    if (active.length === 0) {
      const message = `No active players to start: all ${classified.length} rostered players are inactive`;
      issues.push({ kind: 'NoActivePlayers', severity: 'error', stage: 'solve', message });
      return freezeResult({
        status: 'error',
        starters: [],
        bench: sortBench(classified),
        recommendations: [],
        errors: issues.filter((i) => i.severity === 'error').map((i) => i.message),
        warnings: issues.filter((i) => i.severity === 'warning').map((i) => i.message),
        issues,
        dataQuality: computeDataQuality({
          totalPlayers,
          invalidEntries,
          validPlayers: classified,
          starters: [],
          optimalScore: 0,
        }),
        strategyUsed: strategy,
      });
    }

    const outcome = solveLineup(active, slots, strategy);
    issues.push(...outcome.issues);
    issues.push(...inactiveStarterIssues(inactive, outcome.starters, slots));

    stage = 'diagnose';
    const optimal = solveOptimalLineup(active, slots);
    const dataQuality = computeDataQuality({
      totalPlayers,
      invalidEntries,
      validPlayers: classified,
      starters: outcome.starters,
      optimalScore: optimal.totalScore,
    });
    const optimality = assessOptimality(dataQuality);
    if (optimality) issues.push(optimality);

    const recommendations = generateRecommendations(
      { starters: outcome.starters, bench: outcome.bench, inactive, dataQuality },
      options.recommendationMargin ?? DEFAULT_RECOMMENDATION_MARGIN
    );

    logger.debug('Lineup optimized', {
      strategy,
      players: classified.length,
      inactive: inactive.length,
      slots: slots.reduce((sum, slot) => sum + slot.count, 0),
      starters: outcome.starters.length,
      issues: issues.length,
    });

    return freezeResult({
      status: resolveStatus(issues, outcome.structurallyUnfillable),
      starters: outcome.starters,
      bench: sortBench([...outcome.bench, ...inactive]),
      recommendations,
      errors: issues.filter((i) => i.severity === 'error').map((i) => i.message),
      warnings: issues.filter((i) => i.severity === 'warning').map((i) => i.message),
      issues,
      dataQuality,
      strategyUsed: strategy,
    });
  } catch (error) {
    return unexpectedFailureResult(
      error,
      stage,
      strategy,
      emptyDataQuality(totalPlayers, invalidEntries)
    );
  }
}

/**
 * Full pipeline over provider responses, with collaborators injected.
 */
export class LineupOptimizer {
  constructor(
    private readonly extractor: RosterPositionExtractor,
    private readonly normalizer: PlayerNormalizer,
    private readonly merger: EnrichmentMerger,
    private readonly recommendationMargin: number = DEFAULT_RECOMMENDATION_MARGIN
  ) {}

  run(input: PipelineInput): LineupResult {
    const { strategy } = input;
    if (!isStrategy(strategy)) {
      return invalidStrategyResult(strategy, emptyDataQuality(0, 0));
    }

    let stage: OptimizerStage = 'normalize';
    try {
      const { players, invalidCount } = this.normalizer.normalize(input.rawRoster);

      stage = 'extract';
      const positions = this.extractor.extract(input.settingsResponse);

      stage = 'enrich';
      const enriched = this.merger.merge(players, ...(input.feeds ?? []));

      return optimize(enriched, strategy, positions, {
        invalidEntries: invalidCount,
        recommendationMargin: this.recommendationMargin,
      });
    } catch (error) {
      return unexpectedFailureResult(error, stage, strategy, emptyDataQuality(0, 0));
    }
  }
}

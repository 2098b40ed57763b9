/**
 * Lineup optimizer models
 */

export const STRATEGIES = ['balanced', 'floor', 'ceiling'] as const;

export type Strategy = (typeof STRATEGIES)[number];

export function isStrategy(value: unknown): value is Strategy {
  return typeof value === 'string' && (STRATEGIES as readonly string[]).includes(value);
}

export type PlayerTier = 'elite' | 'solid' | 'flex' | 'bench' | 'unknown';

export interface Player {
  /** Provider key (e.g. Yahoo "449.p.30123"), when known */
  playerKey: string | null;
  name: string;
  team: string;
  /** Primary position (QB, RB, WR, TE, K, DEF, DL, LB, DB) */
  position: string;
  opponent: string | null;
  /** Injury / availability designation from the provider (Q, D, O, IR...) */
  status: string | null;
  /** Slot the player currently occupies on the provider's lineup (BN, QB, W/R/T...) */
  selectedPosition: string | null;

  // Signals
  projectionA: number | null;
  projectionB: number | null;
  trendingScore: number;
  /** 0-10, higher = easier matchup */
  matchupScore: number | null;
  matchupDescription: string | null;
  floorProjection: number | null;
  ceilingProjection: number | null;

  // Derived
  compositeScore: number | null;
  tier: PlayerTier;
}

export interface RosterPosition {
  position: string;
  count: number;
  /** false for bench/IR style positions when the provider says so */
  isStarting?: boolean;
}

export interface Slot {
  code: string;
  count: number;
  eligiblePositions: ReadonlySet<string>;
}

export interface StarterAssignment {
  slot: string;
  /** 0-based instance within the slot code (RB#0, RB#1) */
  slotIndex: number;
  /** Display key: "QB", or "RB1"/"RB2" when a code repeats */
  label: string;
  player: Player;
  /** Filled with a player that had no usable signal */
  fallback: boolean;
}

export type LineupStatus = 'ok' | 'ok-with-warnings' | 'error';

export type OptimizerIssueKind =
  | 'RosterParseFailure'
  | 'SettingsUnavailable'
  | 'SlotUnfillable'
  | 'InvalidStrategy'
  | 'UnexpectedFailure'
  | 'FallbackStarter'
  | 'SuboptimalAssignment'
  | 'InactivePlayerExcluded'
  | 'NoActivePlayers';

export type OptimizerStage =
  | 'validate'
  | 'extract'
  | 'normalize'
  | 'enrich'
  | 'score'
  | 'classify'
  | 'solve'
  | 'diagnose';

export interface OptimizerIssue {
  kind: OptimizerIssueKind;
  severity: 'error' | 'warning';
  message: string;
  stage: OptimizerStage;
  /** Slot code for slot-level issues */
  slot?: string;
}

export interface DataQuality {
  totalPlayers: number;
  validPlayers: number;
  invalidEntries: number;
  playersWithProjections: number;
  playersWithMatchupData: number;
  /** Sum of starter composite scores */
  startersScore: number;
  /** Best achievable sum for the same slots (reference assignment) */
  optimalScore: number;
}

export interface LineupResult {
  readonly status: LineupStatus;
  readonly starters: readonly StarterAssignment[];
  readonly bench: readonly Player[];
  readonly recommendations: readonly string[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly issues: readonly OptimizerIssue[];
  readonly dataQuality: DataQuality;
  readonly strategyUsed: string;
}

/**
 * Typed outcome for soft-fail boundaries: "no data" is a value, not a thrown error.
 */
export type SoftResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface NormalizationResult {
  players: Player[];
  invalidCount: number;
}

export interface EnrichmentEntry {
  name: string;
  team: string | null;
  projection?: number | null;
  trendingScore?: number;
  matchupScore?: number | null;
  matchupDescription?: string | null;
  floor?: number | null;
  ceiling?: number | null;
  opponent?: string | null;
}

export interface EnrichmentFeed {
  source: string;
  entries: EnrichmentEntry[];
}

/**
 * Fresh Player with every signal empty.
 */
export function createPlayer(
  identity: Pick<Player, 'name' | 'team' | 'position'> & Partial<Player>
): Player {
  return {
    playerKey: null,
    opponent: null,
    status: null,
    selectedPosition: null,
    projectionA: null,
    projectionB: null,
    trendingScore: 0,
    matchupScore: null,
    matchupDescription: null,
    floorProjection: null,
    ceilingProjection: null,
    compositeScore: null,
    tier: 'unknown',
    ...identity,
  };
}

/**
 * Mean of the available projection sources, or null when neither is present.
 */
export function projectionBasis(player: Pick<Player, 'projectionA' | 'projectionB'>): number | null {
  const values = [player.projectionA, player.projectionB].filter(
    (v): v is number => v !== null
  );
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

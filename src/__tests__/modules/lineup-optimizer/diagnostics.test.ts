import {
  assessOptimality,
  benchUpgradeSuggestions,
  computeDataQuality,
  coverageNote,
  generateRecommendations,
  inactiveStarterIssues,
  lineupChangeSuggestions,
} from '../../../modules/lineup-optimizer/diagnostics';
import { buildSlotTemplate } from '../../../modules/lineup-optimizer/slot-eligibility';
import {
  createPlayer,
  DataQuality,
  Player,
  StarterAssignment,
} from '../../../modules/lineup-optimizer/lineup-optimizer.model';

describe('Diagnostics', () => {
  const createScored = (name: string, position: string, compositeScore: number | null, overrides: Partial<Player> = {}) =>
    createPlayer({ name, team: 'FA', position, compositeScore, ...overrides });

  const starter = (slot: string, label: string, player: Player): StarterAssignment => ({
    slot,
    slotIndex: 0,
    label,
    player,
    fallback: player.compositeScore === null,
  });

  const quality = (overrides: Partial<DataQuality> = {}): DataQuality => ({
    totalPlayers: 4,
    validPlayers: 4,
    invalidEntries: 0,
    playersWithProjections: 4,
    playersWithMatchupData: 0,
    startersScore: 30,
    optimalScore: 30,
    ...overrides,
  });

  describe('benchUpgradeSuggestions', () => {
    it('suggests a bench player who clearly beats the starter', () => {
      const starters = [starter('RB', 'RB', createScored('Starter Back', 'RB', 8, { matchupScore: 4 }))];
      const bench = [
        createScored('Bench Back', 'RB', 12.5, {
          matchupScore: 7,
          matchupDescription: 'Favorable matchup vs NYG',
          trendingScore: 1500,
        }),
      ];

      expect(benchUpgradeSuggestions(starters, bench)).toEqual([
        'Consider starting Bench Back over Starter Back at RB (+4.5 projected, stronger matchup (Favorable matchup vs NYG), trending up (1,500 adds))',
      ]);
    });

    it('compares against the weakest starter the bench player could replace', () => {
      const starters = [
        starter('RB', 'RB', createScored('Solid RB', 'RB', 10)),
        starter('W/R/T', 'W/R/T', createScored('Flex WR', 'WR', 6)),
        starter('QB', 'QB', createScored('Weak QB', 'QB', 1)),
      ];

      expect(benchUpgradeSuggestions(starters, [createScored('Bench RB', 'RB', 9)])).toEqual([
        'Consider starting Bench RB over Flex WR at W/R/T (+3.0 projected)',
      ]);
    });

    it('stays quiet within the margin and for unscored players', () => {
      const starters = [starter('WR', 'WR', createScored('Starter', 'WR', 10))];

      expect(benchUpgradeSuggestions(starters, [createScored('Close', 'WR', 12)])).toEqual([]);
      expect(benchUpgradeSuggestions(starters, [createScored('Unknown', 'WR', null)])).toEqual([]);
      expect(benchUpgradeSuggestions(starters, [createScored('Close', 'WR', 12)], 1)).toHaveLength(1);
    });

    it('ignores bench players no starting slot admits', () => {
      const starters = [starter('QB', 'QB', createScored('QB', 'QB', 5))];
      expect(benchUpgradeSuggestions(starters, [createScored('Kicker', 'K', 30)])).toEqual([]);
    });
  });

  describe('lineupChangeSuggestions', () => {
    it('lists moves from the current lineup to the suggested one', () => {
      const starters = [
        starter('WR', 'WR2', createScored('Promoted', 'WR', 12, { selectedPosition: 'BN' })),
        starter('QB', 'QB', createScored('Unchanged', 'QB', 20, { selectedPosition: 'QB' })),
      ];
      const bench = [
        createScored('Demoted', 'RB', 6, { selectedPosition: 'RB' }),
        createScored('Still Benched', 'RB', 4, { selectedPosition: 'BN' }),
        createScored('Unknown Slot', 'RB', 3),
      ];

      expect(lineupChangeSuggestions(starters, bench)).toEqual([
        'Move Promoted from the bench into WR2',
        'Bench Demoted (currently starting at RB)',
      ]);
    });
  });

  describe('coverageNote', () => {
    it('flags rosters where most players lack projections', () => {
      expect(coverageNote(quality({ playersWithProjections: 1 }))).toBe(
        'Only 1 of 4 players have projections; scores lean on partial data'
      );
    });

    it('stays quiet at half coverage or with no players', () => {
      expect(coverageNote(quality({ playersWithProjections: 2 }))).toBeNull();
      expect(coverageNote(quality({ validPlayers: 0, playersWithProjections: 0 }))).toBeNull();
    });
  });

  describe('computeDataQuality', () => {
    it('counts coverage over valid players', () => {
      const players = [
        createScored('A', 'QB', 20, { projectionA: 20 }),
        createScored('B', 'RB', 10, { projectionB: 10, matchupScore: 6 }),
        createScored('C', 'WR', null),
      ];

      expect(
        computeDataQuality({
          totalPlayers: 5,
          invalidEntries: 2,
          validPlayers: players,
          starters: [starter('QB', 'QB', players[0]), starter('RB', 'RB', players[1])],
          optimalScore: 30,
        })
      ).toEqual({
        totalPlayers: 5,
        validPlayers: 3,
        invalidEntries: 2,
        playersWithProjections: 2,
        playersWithMatchupData: 1,
        startersScore: 30,
        optimalScore: 30,
      });
    });
  });

  describe('assessOptimality', () => {
    it('warns when the lineup trails the reference assignment', () => {
      expect(assessOptimality(quality({ startersScore: 28.5, optimalScore: 30 }))).toEqual({
        kind: 'SuboptimalAssignment',
        severity: 'warning',
        stage: 'diagnose',
        message: 'Lineup is 1.5 points below the best achievable assignment',
      });
    });

    it('ignores float noise', () => {
      expect(assessOptimality(quality({ startersScore: 30 - 1e-9 }))).toBeNull();
    });
  });

  describe('generateRecommendations', () => {
    it('puts upgrades first, then moves, then the coverage note', () => {
      const starters = [starter('WR', 'WR', createScored('Starter', 'WR', 5, { selectedPosition: 'WR' }))];
      const bench = [createScored('Upgrade', 'WR', 9, { selectedPosition: 'W/R/T' })];

      expect(
        generateRecommendations({ starters, bench, dataQuality: quality({ playersWithProjections: 0 }) })
      ).toEqual([
        'Consider starting Upgrade over Starter at WR (+4.0 projected)',
        'Bench Upgrade (currently starting at W/R/T)',
        'Only 0 of 4 players have projections; scores lean on partial data',
      ]);
    });

    it('never suggests starting an inactive player but does move them out', () => {
      const starters = [starter('WR', 'WR', createScored('Starter', 'WR', 5, { selectedPosition: 'BN' }))];
      const inactive = [createScored('Out WR', 'WR', 20, { status: 'O', selectedPosition: 'WR' })];

      expect(
        generateRecommendations({ starters, bench: [], inactive, dataQuality: quality({ playersWithProjections: 4 }) })
      ).toEqual(['Move Starter from the bench into WR', 'Bench Out WR (currently starting at WR)']);
    });
  });

  describe('inactiveStarterIssues', () => {
    const template = buildSlotTemplate([
      { position: 'WR', count: 1 },
      { position: 'W/R/T', count: 1 },
    ]);

    it('compares against the weakest starter across every slot the player fits', () => {
      const starters = [
        starter('WR', 'WR', createScored('WR Starter', 'WR', 14)),
        starter('W/R/T', 'W/R/T', createScored('Flex RB', 'RB', 9)),
      ];
      const inactive = [
        createScored('Suspended WR', 'WR', 11, { status: 'SUSP' }),
        createScored('IR WR', 'WR', 8, { status: 'IR' }),
        createScored('Unscored WR', 'WR', null, { status: 'O' }),
        createScored('Out QB', 'QB', 30, { status: 'O' }),
      ];

      expect(inactiveStarterIssues(inactive, starters, template)).toEqual([
        {
          kind: 'InactivePlayerExcluded',
          severity: 'warning',
          stage: 'solve',
          message: 'Suspended WR (SUSP) left out of the lineup: would otherwise start over Flex RB at W/R/T',
        },
      ]);
    });
  });
});

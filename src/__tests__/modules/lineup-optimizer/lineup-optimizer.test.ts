import { isActive, LineupOptimizer, optimize } from '../../../modules/lineup-optimizer/lineup-optimizer';
import { YahooRosterPositionExtractor } from '../../../modules/lineup-optimizer/roster-positions.extractor';
import { YahooPlayerNormalizer } from '../../../modules/lineup-optimizer/player.normalizer';
import { IdentityEnrichmentMerger } from '../../../modules/lineup-optimizer/enrichment.merger';
import {
  EnrichmentMerger,
  PlayerNormalizer,
  RosterPositionExtractor,
} from '../../../modules/lineup-optimizer/lineup-optimizer.interface';
import { createPlayer, Player } from '../../../modules/lineup-optimizer/lineup-optimizer.model';

describe('LineupOptimizer', () => {
  const createProjected = (name: string, position: string, projectionA: number | null, overrides: Partial<Player> = {}) =>
    createPlayer({ name, team: 'FA', position, projectionA, ...overrides });

  const fullRoster = () => [
    createProjected('QB One', 'QB', 20),
    createProjected('RB One', 'RB', 15),
    createProjected('RB Two', 'RB', 12),
    createProjected('WR One', 'WR', 14),
    createProjected('WR Two', 'WR', 11),
    createProjected('WR Three', 'WR', 9),
    createProjected('TE One', 'TE', 8),
    createProjected('K One', 'K', 7),
    createProjected('DEF One', 'DEF', 6),
  ];

  describe('optimize', () => {
    it('starts the better of two QBs', () => {
      const result = optimize(
        [createProjected('Backup', 'QB', 15.1), createProjected('Starter', 'QB', 18.4)],
        'balanced',
        [{ position: 'QB', count: 1 }]
      );

      expect(result.status).toBe('ok');
      expect(result.starters.map((s) => s.player.name)).toEqual(['Starter']);
      expect(result.bench.map((p) => p.name)).toEqual(['Backup']);
      expect(result.starters[0].player.tier).toBe('elite');
      expect(result.bench[0].tier).toBe('flex');
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.dataQuality).toMatchObject({ startersScore: 18.4, optimalScore: 18.4 });
    });

    it('uses the default template with a warning when settings are missing', () => {
      const result = optimize(fullRoster(), 'balanced', []);

      expect(result.status).toBe('ok-with-warnings');
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([
        'League roster settings unavailable; using the default lineup template',
      ]);
      expect(result.issues[0]).toMatchObject({ kind: 'SettingsUnavailable', severity: 'warning' });
      expect(result.starters.map((s) => [s.label, s.player.name])).toEqual([
        ['QB', 'QB One'],
        ['RB1', 'RB One'],
        ['RB2', 'RB Two'],
        ['WR1', 'WR One'],
        ['WR2', 'WR Two'],
        ['TE', 'TE One'],
        ['W/R/T', 'WR Three'],
        ['K', 'K One'],
        ['DEF', 'DEF One'],
      ]);
      expect(result.bench).toEqual([]);
    });

    it('treats a null template like an empty one', () => {
      const result = optimize(fullRoster(), 'balanced', null);
      expect(result.issues[0].kind).toBe('SettingsUnavailable');
    });

    it('lets floor and ceiling pick different players', () => {
      const players = [
        createProjected('Boom Bust', 'WR', 15, { floorProjection: 8, ceilingProjection: 22 }),
        createProjected('Steady Eddie', 'WR', 15, { floorProjection: 14, ceilingProjection: 16 }),
      ];
      const template = [{ position: 'WR', count: 1 }];

      expect(optimize(players, 'floor', template).starters[0].player.name).toBe('Steady Eddie');
      expect(optimize(players, 'ceiling', template).starters[0].player.name).toBe('Boom Bust');
    });

    it('reports an empty roster as an error with counts', () => {
      const result = optimize([], 'balanced', [{ position: 'QB', count: 1 }], { invalidEntries: 2 });

      expect(result.status).toBe('error');
      expect(result.errors).toEqual(['No valid players to optimize (2 entries seen, 2 invalid)']);
      expect(result.issues[0]).toMatchObject({ kind: 'RosterParseFailure', stage: 'normalize' });
      expect(result.dataQuality).toMatchObject({ totalPlayers: 2, invalidEntries: 2, validPlayers: 0 });
      expect(result.starters).toEqual([]);
    });

    it('benches a roster of only inactive players without calling it a parse failure', () => {
      const result = optimize([createProjected('Hurt QB', 'QB', 25, { status: 'O' })], 'balanced', [
        { position: 'QB', count: 1 },
      ]);

      expect(result.status).toBe('error');
      expect(result.errors).toEqual(['No active players to start: all 1 rostered players are inactive']);
      expect(result.issues.map((i) => i.kind)).toEqual(['NoActivePlayers']);
      expect(result.starters).toEqual([]);
      expect(result.bench.map((p) => p.name)).toEqual(['Hurt QB']);
      expect(result.dataQuality.validPlayers).toBe(1);
    });

    it('keeps inactive players on the bench so no valid player is lost', () => {
      const players = [
        createProjected('On IR', 'QB', 30, { status: 'IR' }),
        createProjected('Healthy', 'QB', 10, { status: 'Q' }),
        createProjected('Out WR', 'WR', 12, { status: 'O' }),
      ];
      const result = optimize(players, 'balanced', [{ position: 'QB', count: 1 }]);

      const seen = [...result.starters.map((s) => s.player.name), ...result.bench.map((p) => p.name)];
      expect(seen.sort()).toEqual(['Healthy', 'On IR', 'Out WR']);
      expect(result.starters.map((s) => s.player.name)).toEqual(['Healthy']);
      expect(result.bench.map((p) => p.name)).toEqual(['On IR', 'Out WR']);
      expect(result.dataQuality).toMatchObject({ totalPlayers: 3, validPlayers: 3 });
    });

    it('warns when an inactive player would otherwise have started', () => {
      const result = optimize(
        [createProjected('On IR', 'QB', 30, { status: 'IR' }), createProjected('Healthy', 'QB', 10)],
        'balanced',
        [{ position: 'QB', count: 1 }]
      );

      expect(result.status).toBe('ok-with-warnings');
      expect(result.warnings).toEqual(['On IR (IR) left out of the lineup: would otherwise start over Healthy at QB']);
      expect(result.issues[0]).toMatchObject({ kind: 'InactivePlayerExcluded', severity: 'warning' });
    });

    it('says nothing about inactive players no slot could use', () => {
      const result = optimize(
        [createProjected('Out WR', 'WR', 12, { status: 'O' }), createProjected('QB A', 'QB', 20)],
        'balanced',
        [{ position: 'QB', count: 1 }]
      );

      expect(result.status).toBe('ok');
      expect(result.warnings).toEqual([]);
      expect(result.bench.map((p) => p.name)).toEqual(['Out WR']);
      expect(result.dataQuality.validPlayers).toBe(2);
    });

    it('names the inactive player when their absence leaves a slot open', () => {
      const result = optimize(
        [createProjected('Out WR', 'WR', 12, { status: 'O' }), createProjected('WR B', 'WR', 5)],
        'balanced',
        [{ position: 'WR', count: 2 }]
      );

      expect(result.status).toBe('ok-with-warnings');
      expect(result.errors).toEqual(['Slot WR2 left empty: every eligible player (WR) is already starting']);
      expect(result.warnings).toEqual(['Out WR (O) left out of the lineup: an eligible slot is left open']);
    });

    it('rejects an unknown strategy before doing any work', () => {
      const result = optimize(fullRoster(), 'aggressive', []);

      expect(result.status).toBe('error');
      expect(result.strategyUsed).toBe('aggressive');
      expect(result.errors).toEqual(['Invalid strategy "aggressive": expected balanced, floor or ceiling']);
      expect(result.issues[0]).toMatchObject({ kind: 'InvalidStrategy', stage: 'validate' });
      expect(result.starters).toEqual([]);
    });

    it('fails the lineup when a slot cannot be filled by anyone on the roster', () => {
      const result = optimize([createProjected('QB One', 'QB', 20)], 'balanced', [
        { position: 'QB', count: 1 },
        { position: 'K', count: 1 },
      ]);

      expect(result.status).toBe('error');
      expect(result.errors).toEqual(['Slot K left empty: no K on the roster']);
      expect(result.starters.map((s) => s.label)).toEqual(['QB']);
    });

    it('warns about fallback starters and thin coverage', () => {
      const result = optimize([createProjected('Mystery TE', 'TE', null)], 'balanced', [
        { position: 'TE', count: 1 },
      ]);

      expect(result.status).toBe('ok-with-warnings');
      expect(result.warnings).toEqual(['Mystery TE fills TE without projection data (no scored alternative)']);
      expect(result.starters[0].fallback).toBe(true);
      expect(result.starters[0].player.tier).toBe('unknown');
      expect(result.recommendations).toEqual([
        'Only 0 of 1 players have projections; scores lean on partial data',
      ]);
    });

    it('warns when the fill trails the best achievable assignment', () => {
      const result = optimize(
        [
          createProjected('Big WR', 'WR', 20),
          createProjected('Small RB', 'RB', 5),
          createProjected('Small TE', 'TE', 4),
        ],
        'balanced',
        [
          { position: 'W/R', count: 1 },
          { position: 'W/T', count: 1 },
        ]
      );

      expect(result.status).toBe('ok-with-warnings');
      expect(result.warnings).toEqual(['Lineup is 1.0 points below the best achievable assignment']);
      expect(result.dataQuality).toMatchObject({ startersScore: 24, optimalScore: 25 });
    });

    it('turns an internal fault into an UnexpectedFailure result', () => {
      const broken = createProjected('Broken', 'QB', 10);
      Object.defineProperty(broken, 'position', {
        enumerable: true,
        get() {
          throw new Error('boom');
        },
      });

      const result = optimize([broken], 'balanced', [{ position: 'QB', count: 1 }]);

      expect(result.status).toBe('error');
      expect(result.errors).toEqual(['Unexpected failure during score: boom']);
      expect(result.issues[0]).toMatchObject({ kind: 'UnexpectedFailure', stage: 'score' });
    });

    it('is deterministic', () => {
      const first = optimize(fullRoster(), 'balanced', []);
      const second = optimize(fullRoster(), 'balanced', []);
      expect(second).toEqual(first);
    });

    it('returns a frozen result', () => {
      const result = optimize(fullRoster(), 'balanced', []);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.starters)).toBe(true);
      expect(Object.isFrozen(result.starters[0])).toBe(true);
      expect(Object.isFrozen(result.starters[0].player)).toBe(true);
      expect(Object.isFrozen(result.dataQuality)).toBe(true);
    });

    it('does not mutate the input players', () => {
      const players = fullRoster();
      optimize(players, 'ceiling', []);

      expect(players[0].compositeScore).toBeNull();
      expect(players[0].tier).toBe('unknown');
      expect(Object.isFrozen(players[0])).toBe(false);
    });
  });

  describe('isActive', () => {
    it.each([
      [null, true],
      ['Q', true],
      ['D', true],
      ['O', false],
      ['ir', false],
      ['SUSP', false],
    ])('status %p is active: %p', (status, expected) => {
      expect(isActive(createProjected('X', 'WR', 1, { status }))).toBe(expected);
    });
  });

  describe('pipeline', () => {
    const settingsResponse = {
      fantasy_content: {
        league: [{}, { settings: [{ roster_positions: [{ roster_position: { position: 'QB', count: 1 } }, { roster_position: { position: 'BN', count: 3 } }] }] }],
      },
    };

    const createOptimizer = () =>
      new LineupOptimizer(
        new YahooRosterPositionExtractor(),
        new YahooPlayerNormalizer(),
        new IdentityEnrichmentMerger()
      );

    it('runs normalize, extract, enrich and optimize end to end', () => {
      const result = createOptimizer().run({
        rawRoster: [
          { name: 'Josh Allen', position: 'QB', team: 'BUF', projected_points: 22, selected_position: 'BN' },
          { name: 'Other QB', position: 'QB', team: 'NYJ', projected_points: 15, selected_position: 'QB' },
          { name: 'No Position', team: 'NYJ' },
        ],
        settingsResponse,
        feeds: [{ source: 'sleeper-projections', entries: [{ name: 'Josh Allen', team: 'BUF', projection: 24 }] }],
        strategy: 'balanced',
      });

      expect(result.status).toBe('ok');
      expect(result.starters.map((s) => s.player.name)).toEqual(['Josh Allen']);
      expect(result.starters[0].player.compositeScore).toBe(23);
      expect(result.recommendations).toEqual([
        'Move Josh Allen from the bench into QB',
        'Bench Other QB (currently starting at QB)',
      ]);
      expect(result.dataQuality).toMatchObject({ totalPlayers: 3, validPlayers: 2, invalidEntries: 1 });
    });

    it('falls back to the default template when settings are unreadable', () => {
      const result = createOptimizer().run({
        rawRoster: [{ name: 'Josh Allen', position: 'QB', team: 'BUF', projected_points: 22 }],
        settingsResponse: { error: 'unavailable' },
        strategy: 'floor',
      });

      expect(result.warnings[0]).toBe('League roster settings unavailable; using the default lineup template');
      expect(result.status).toBe('error');
    });

    it('rejects an invalid strategy', () => {
      const result = createOptimizer().run({ rawRoster: [], settingsResponse: null, strategy: 42 });

      expect(result.errors).toEqual(['Invalid strategy "42": expected balanced, floor or ceiling']);
    });

    it('reports which stage failed when a collaborator throws', () => {
      const normalizer: PlayerNormalizer = {
        normalize: jest.fn().mockReturnValue({ players: [createProjected('QB', 'QB', 10)], invalidCount: 0 }),
      };
      const extractor: RosterPositionExtractor = {
        extract: jest.fn().mockReturnValue([{ position: 'QB', count: 1 }]),
      };
      const merger: EnrichmentMerger = {
        merge: jest.fn().mockImplementation(() => {
          throw new Error('feed index corrupt');
        }),
      };

      const result = new LineupOptimizer(extractor, normalizer, merger).run({
        rawRoster: [],
        settingsResponse: null,
        strategy: 'balanced',
      });

      expect(result.status).toBe('error');
      expect(result.errors).toEqual(['Unexpected failure during enrich: feed index corrupt']);
      expect(result.issues[0]).toMatchObject({ kind: 'UnexpectedFailure', stage: 'enrich' });
    });
  });
});

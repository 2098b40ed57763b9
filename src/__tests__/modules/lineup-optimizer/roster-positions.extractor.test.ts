import {
  classifyRosterPositions,
  coerceCount,
  extractRosterPositions,
  parseRosterPositions,
  YahooRosterPositionExtractor,
} from '../../../modules/lineup-optimizer/roster-positions.extractor';
import {
  buildSlotTemplate,
  getDefaultSlotTemplate,
  getEligiblePositionsForSlot,
  isReserveSlot,
} from '../../../modules/lineup-optimizer/slot-eligibility';

describe('RosterPositionsExtractor', () => {
  const settingsResponse = (rosterPositions: unknown) => ({
    fantasy_content: {
      league: [{ league_key: '449.l.1' }, { settings: [{ roster_positions: rosterPositions }] }],
    },
  });

  describe('response shapes', () => {
    it('reads a list of roster_position wrappers', () => {
      const response = settingsResponse([
        { roster_position: { position: 'QB', count: 1 } },
        { roster_position: { position: 'RB', count: '2' } },
        { roster_position: { position: 'BN', count: 5 } },
      ]);

      expect(extractRosterPositions(response)).toEqual([
        { position: 'QB', count: 1 },
        { position: 'RB', count: 2 },
        { position: 'BN', count: 5 },
      ]);
    });

    it('reads a list of flat records under an object league', () => {
      const response = {
        league: { settings: { roster_positions: [{ position: 'QB', count: 1 }, { position: 'WR' }] } },
      };

      expect(extractRosterPositions(response)).toEqual([
        { position: 'QB', count: 1 },
        { position: 'WR', count: 1 },
      ]);
    });

    it('reads a keyed map and ignores its count entry', () => {
      const response = settingsResponse({
        '0': { roster_position: { position: 'TE', count: 1 } },
        '1': { roster_position: { position: 'W/R/T', count: '1', is_starting_position: 1 } },
        count: 2,
      });

      expect(extractRosterPositions(response)).toEqual([
        { position: 'TE', count: 1 },
        { position: 'W/R/T', count: 1, isStarting: true },
      ]);
    });

    it('reads wrapped and flat records mixed in one list', () => {
      const response = settingsResponse([
        { roster_position: { position: 'QB', count: 1 } },
        { position: 'RB', count: 2 },
      ]);

      expect(extractRosterPositions(response)).toEqual([
        { position: 'QB', count: 1 },
        { position: 'RB', count: 2 },
      ]);
    });

    it('skips an empty roster_positions node and reads a later fragment', () => {
      const response = {
        fantasy_content: {
          league: [
            { settings: [{ roster_positions: [] }] },
            { settings: [{ roster_positions: [{ roster_position: { position: 'QB', count: 1 } }] }] },
          ],
        },
      };

      expect(extractRosterPositions(response)).toEqual([{ position: 'QB', count: 1 }]);
    });

    it('reports the first node failure when no node is usable', () => {
      const response = {
        league: [
          { settings: { roster_positions: [{ roster_position: { count: 1 } }] } },
          { settings: { roster_positions: 'QB' } },
        ],
      };

      expect(parseRosterPositions(response)).toEqual({
        ok: false,
        reason: 'roster_positions (list) contained no usable entries',
      });
    });

    it('marks non-starting positions', () => {
      const response = settingsResponse([
        { roster_position: { position: 'IR', count: 1, is_starting_position: '0' } },
      ]);

      expect(extractRosterPositions(response)).toEqual([
        { position: 'IR', count: 1, isStarting: false },
      ]);
    });
  });

  describe('soft failure', () => {
    it.each([
      ['null', null],
      ['a string', 'garbage'],
      ['an empty object', {}],
      ['a scalar roster_positions', { league: { settings: { roster_positions: 'QB' } } }],
      ['an empty list', settingsResponse([])],
    ])('returns [] for %s', (_label, response) => {
      expect(extractRosterPositions(response)).toEqual([]);
    });

    it('reports why nothing was found', () => {
      expect(parseRosterPositions({})).toEqual({
        ok: false,
        reason: 'roster_positions not found in a recognized shape',
      });
    });

    it('reports a recognized shape with no usable entries', () => {
      const response = settingsResponse([{ roster_position: { count: 1 } }]);

      expect(parseRosterPositions(response)).toEqual({
        ok: false,
        reason: 'roster_positions (list) contained no usable entries',
      });
    });

    it('skips entries without a position and keeps the rest', () => {
      const response = settingsResponse([
        { roster_position: { count: 2 } },
        { roster_position: { position: ' K ', count: 1 } },
      ]);

      expect(extractRosterPositions(response)).toEqual([{ position: 'K', count: 1 }]);
    });

    it('never throws through the extractor class', () => {
      const extractor = new YahooRosterPositionExtractor();
      expect(extractor.extract(undefined)).toEqual([]);
      expect(extractor.extract([1, 2, 3])).toEqual([]);
    });
  });

  describe('classifyRosterPositions', () => {
    it('does not recognize a list of unrelated records', () => {
      expect(classifyRosterPositions([{ foo: 1 }])).toEqual({ shape: 'unrecognized' });
    });

    it('resolves wrapping item by item', () => {
      expect(
        classifyRosterPositions([{ roster_position: { position: 'QB' } }, { position: 'RB' }, { foo: 1 }])
      ).toEqual({ shape: 'list', records: [{ position: 'QB' }, { position: 'RB' }] });
    });

    it('does not recognize a keyed map without wrappers', () => {
      expect(classifyRosterPositions({ '0': { position: 'QB' } })).toEqual({
        shape: 'unrecognized',
      });
    });
  });

  describe('coerceCount', () => {
    it.each([
      [undefined, 1],
      ['3', 3],
      [0, 1],
      [-2, 1],
      [2.7, 2],
      ['abc', 1],
    ])('coerces %p to %p', (input, expected) => {
      expect(coerceCount(input)).toBe(expected);
    });
  });
});

describe('SlotEligibility', () => {
  it('drops reserve and non-starting positions and merges duplicates', () => {
    const slots = buildSlotTemplate([
      { position: 'QB', count: 1 },
      { position: 'RB', count: 2 },
      { position: 'BN', count: 5 },
      { position: 'IR', count: 1 },
      { position: 'D/ST', count: 1 },
      { position: 'RB', count: 1 },
      { position: 'W/R/T', count: 1, isStarting: false },
    ]);

    expect(slots.map((s) => [s.code, s.count])).toEqual([
      ['QB', 1],
      ['RB', 3],
      ['DEF', 1],
    ]);
    expect([...slots[2].eligiblePositions]).toEqual(['DEF']);
  });

  it('builds the default template', () => {
    const slots = getDefaultSlotTemplate();

    expect(slots.map((s) => s.code)).toEqual(['QB', 'RB', 'WR', 'TE', 'W/R/T', 'K', 'DEF']);
    expect(slots.map((s) => s.count)).toEqual([1, 2, 2, 1, 1, 1, 1]);
  });

  it('resolves flex eligibility and treats unknown codes as dedicated slots', () => {
    expect([...getEligiblePositionsForSlot('FLEX')]).toEqual(['RB', 'WR', 'TE']);
    expect([...getEligiblePositionsForSlot('q/w/r/t')]).toEqual(['QB', 'RB', 'WR', 'TE']);
    expect([...getEligiblePositionsForSlot('OP')]).toEqual(['OP']);
  });

  it('recognizes reserve codes case-insensitively', () => {
    expect(isReserveSlot('bn')).toBe(true);
    expect(isReserveSlot('Bench')).toBe(true);
    expect(isReserveSlot('IR+')).toBe(true);
    expect(isReserveSlot('W/R/T')).toBe(false);
  });
});

import {
  analyzeMatchups,
  matchupLabel,
  ordinal,
  ProjectedLine,
  rankDefenses,
} from '../../../integrations/sleeper/matchup-analyzer';

describe('MatchupAnalyzer', () => {
  const line = (name: string, position: string, opponent: string | null, points: number): ProjectedLine => ({
    name,
    team: 'KC',
    position,
    opponent,
    points,
  });

  const lines = [
    line('Back A', 'RB', 'NYG', 20),
    line('Back B', 'RB', 'NYG', 10),
    line('Back C', 'RB', 'DAL', 12),
    line('Back D', 'RB', 'SF', 5),
    line('Receiver E', 'WR', 'NYG', 8),
    line('Bye Week', 'WR', null, 0),
  ];

  it('ranks opponents by projected points allowed per position', () => {
    const rb = rankDefenses(lines).get('RB');

    expect(rb?.get('NYG')).toEqual({ opponent: 'NYG', pointsAllowed: 30, rank: 1, score: 10 });
    expect(rb?.get('DAL')).toEqual({ opponent: 'DAL', pointsAllowed: 12, rank: 2, score: 5 });
    expect(rb?.get('SF')).toEqual({ opponent: 'SF', pointsAllowed: 5, rank: 3, score: 0 });
  });

  it('scores a lone opponent as neutral', () => {
    expect(rankDefenses(lines).get('WR')?.get('NYG')).toMatchObject({ rank: 1, score: 5 });
  });

  it('describes each player matchup', () => {
    const entries = analyzeMatchups(lines);

    expect(entries).toHaveLength(5);
    expect(entries[0]).toEqual({
      name: 'Back A',
      team: 'KC',
      opponent: 'NYG',
      matchupScore: 10,
      matchupDescription: 'Favorable matchup vs NYG (1st most RB points allowed)',
    });
    expect(entries.map((e) => e.matchupDescription)).toEqual([
      'Favorable matchup vs NYG (1st most RB points allowed)',
      'Favorable matchup vs NYG (1st most RB points allowed)',
      'Neutral matchup vs DAL (2nd most RB points allowed)',
      'Tough matchup vs SF (3rd most RB points allowed)',
      'Neutral matchup vs NYG (1st most WR points allowed)',
    ]);
  });

  it.each([
    [1, '1st'],
    [2, '2nd'],
    [3, '3rd'],
    [4, '4th'],
    [11, '11th'],
    [12, '12th'],
    [13, '13th'],
    [21, '21st'],
    [22, '22nd'],
    [111, '111th'],
  ])('formats %p as %p', (n, expected) => {
    expect(ordinal(n)).toBe(expected);
  });

  it('labels scores', () => {
    expect(matchupLabel(7)).toBe('Favorable');
    expect(matchupLabel(6.9)).toBe('Neutral');
    expect(matchupLabel(3)).toBe('Tough');
  });
});

/// <reference types="jest" />
import { formatDuration, formatLeaderboard, formatSigned, gameStopped } from '../src/modules/game/announcements';
import { chunkText } from '../src/modules/mesh/chunk-text';

describe('announcement formatting', () => {
  it('formats durations', () => {
    expect(formatDuration(120_000)).toBe('2 minutes');
    expect(formatDuration(60_000)).toBe('1 minute');
    expect(formatDuration(45_000)).toBe('45s');
    expect(formatDuration(90_400)).toBe('90s');
  });

  it('signs deltas', () => {
    expect(formatSigned(200)).toBe('+200');
    expect(formatSigned(-200)).toBe('-200');
    expect(formatSigned(0)).toBe('0');
  });

  it('formats the leaderboard', () => {
    expect(formatLeaderboard([])).toBe('📊 No scores yet!');
    expect(
      formatLeaderboard([
        { playerId: 'a1', name: 'Alice', score: 300, rank: 1 },
        { playerId: 'b2', name: 'Bob', score: -100, rank: 2 },
      ]),
    ).toBe('📊 LEADERBOARD:\n1. Alice: 300 pts\n2. Bob: -100 pts');
  });

  it('uses medals for the podium only', () => {
    const leaderboard = ['a', 'b', 'c', 'd'].map((id, i) => ({ playerId: id, name: id.toUpperCase(), score: 400 - i * 100, rank: i + 1 }));
    expect(gameStopped('admin', leaderboard).text).toBe(
      '🏁 GAME OVER - FINAL SCORES:\n\n🥇 1. A: 400 pts\n🥈 2. B: 300 pts\n🥉 3. C: 200 pts\n   4. D: 100 pts\n\nThanks for playing! 🎉',
    );
  });
});

describe('chunkText', () => {
  it('returns short text as a single chunk', () => {
    expect(chunkText('  hello mesh  ', 20)).toEqual(['hello mesh']);
    expect(chunkText('   ', 20)).toEqual([]);
  });

  it('packs whole lines into chunks', () => {
    expect(chunkText('aaaa\nbbbb\ncccc', 9)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('splits long lines on spaces and long words anywhere', () => {
    expect(chunkText('one two three four', 9)).toEqual(['one two', 'three', 'four']);
    expect(chunkText('abcdefghijkl', 5)).toEqual(['abcde', 'fghij', 'kl']);
  });
});

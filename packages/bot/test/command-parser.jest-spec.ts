/// <reference types="jest" />
import { HjCommand, isGameCommand, parseCommand } from '../src/modules/personality/command-parser';

describe('parseCommand', () => {
  it.each<[string, HjCommand]>([
    ['!hj start', { kind: 'start' }],
    ['!HJ STOP', { kind: 'stop' }],
    ['!hj next', { kind: 'next' }],
    ['!hj skip', { kind: 'next' }],
    ['!hj reset', { kind: 'reset' }],
    ['!hj join', { kind: 'join' }],
    ['!join', { kind: 'join' }],
    ['!hj', { kind: 'help' }],
    ['!hj help', { kind: 'help' }],
    ['!hj info', { kind: 'status' }],
    ['!hj status', { kind: 'status' }],
    ['!hj leaderboard', { kind: 'scores' }],
    ['!hj scores', { kind: 'scores' }],
  ])('%s', (text, expected) => {
    expect(parseCommand(text)).toEqual(expected);
  });

  it('keeps the ban target as typed', () => {
    expect(parseCommand('!hj ban !A1B2c3d4')).toEqual({ kind: 'ban', target: '!A1B2c3d4' });
    expect(parseCommand('!hj unban   !a1b2c3d4 ')).toEqual({ kind: 'unban', target: '!a1b2c3d4' });
    expect(parseCommand('!hj ban')).toEqual({ kind: 'ban', target: '' });
  });

  it('treats free text as an answer', () => {
    expect(parseCommand('  TWENTY-TWO ')).toEqual({ kind: 'answer', text: 'TWENTY-TWO' });
  });

  it('flags unknown commands', () => {
    expect(parseCommand('!ping')).toEqual({ kind: 'unknown', text: '!ping' });
    expect(parseCommand('!hj dance')).toEqual({ kind: 'unknown', text: '!hj dance' });
    expect(parseCommand('!hjx')).toEqual({ kind: 'unknown', text: '!hjx' });
  });

  it('recognizes game commands for the public channel', () => {
    expect(isGameCommand('!hj status')).toBe(true);
    expect(isGameCommand('!join')).toBe(true);
    expect(isGameCommand('22')).toBe(false);
    expect(isGameCommand('!hjx')).toBe(false);
  });
});

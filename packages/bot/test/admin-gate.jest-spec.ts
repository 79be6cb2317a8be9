/// <reference types="jest" />
import { AdminGate } from '../src/modules/auth/admin-gate';
import { normalizeNodeId } from '../src/modules/config/game-config';

describe('AdminGate', () => {
  it('matches node ids with or without the leading bang, in any case', () => {
    const gate = new AdminGate({ adminNodeIds: ['!a1b2c3d4', 'FEEDBEEF'] });
    expect(gate.isAdmin('!a1b2c3d4')).toBe(true);
    expect(gate.isAdmin('A1B2C3D4')).toBe(true);
    expect(gate.isAdmin('!feedbeef')).toBe(true);
    expect(gate.isAdmin('!deadbeef')).toBe(false);
    expect(gate.adminIds).toEqual(['a1b2c3d4', 'feedbeef']);
  });

  it('grants nothing when no admin is configured', () => {
    const gate = new AdminGate({ adminNodeIds: [] });
    expect(gate.hasAdmins).toBe(false);
    expect(gate.isAdmin('')).toBe(false);
  });

  it('normalizes node ids', () => {
    expect(normalizeNodeId('  !ABCdef12 ')).toBe('abcdef12');
  });
});

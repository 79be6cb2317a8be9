/// <reference types="jest" />
import { ConfigValidationError, DEFAULT_QUESTIONS_FILE, loadGameConfig } from '../src/modules/config/game-config';

describe('loadGameConfig', () => {
  it('applies defaults', () => {
    const config = loadGameConfig({});
    expect(config).toEqual({
      adminNodeIds: [],
      questionIntervalMs: 180_000,
      answerWindowMs: 120_000,
      maxRounds: 10,
      gameChannelName: 'HackerJeopardy',
      questionsFile: DEFAULT_QUESTIONS_FILE,
      shuffleQuestions: false,
      settlementRetries: 2,
      ledgerBackend: 'sqlite',
      databasePath: 'data/bot.db',
      maxMessageLength: 200,
      bridgeToken: undefined,
      rateLimit: { windowMs: 10_000, max: 5 },
      timeScale: 1,
      port: 3001,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('parses admins, durations and flags', () => {
    const config = loadGameConfig({
      HJ_ADMIN_NODE_IDS: '!ABC123, def456,',
      HJ_QUESTION_INTERVAL: '60',
      HJ_ANSWER_WINDOW: '45',
      HJ_SHUFFLE_QUESTIONS: 'yes',
      LEDGER_BACKEND: 'memory',
      MESH_BRIDGE_TOKEN: 'test-secret',
    });
    expect(config.adminNodeIds).toEqual(['abc123', 'def456']);
    expect(config.questionIntervalMs).toBe(60_000);
    expect(config.answerWindowMs).toBe(45_000);
    expect(config.shuffleQuestions).toBe(true);
    expect(config.ledgerBackend).toBe('memory');
    expect(config.bridgeToken).toBe('test-secret');
  });

  it('refuses an answer window longer than the question interval', () => {
    expect(() => loadGameConfig({ HJ_QUESTION_INTERVAL: '100', HJ_ANSWER_WINDOW: '200' })).toThrow(
      'Invalid configuration: HJ_ANSWER_WINDOW: HJ_ANSWER_WINDOW must not exceed HJ_QUESTION_INTERVAL',
    );
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadGameConfig({ HJ_MAX_ROUNDS: '0', LEDGER_BACKEND: 'postgres' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0].startsWith('HJ_MAX_ROUNDS:')).toBe(true);
      expect(caught.issues[1].startsWith('LEDGER_BACKEND:')).toBe(true);
    }
  });
});

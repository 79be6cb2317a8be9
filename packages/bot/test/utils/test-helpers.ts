import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import type { Announcement } from '@mesh-jeopardy/shared';
import { CommonModule } from '../../src/modules/common/common.module';
import { ConfigModule } from '../../src/modules/config/config.module';
import { GAME_CONFIG, GameConfig } from '../../src/modules/config/game-config';
import { GameModule } from '../../src/modules/game/game.module';
import { GameSessionService } from '../../src/modules/game/game-session.service';
import { QuestionBankService } from '../../src/modules/game/question-bank.service';
import { ANNOUNCEMENT_SINK, AnnouncementSink } from '../../src/modules/game/announcement-sink';
import { Question } from '../../src/modules/game/game-types';
import { LEDGER, Ledger } from '../../src/modules/ledger/ledger';
import { MemoryLedger } from '../../src/modules/ledger/memory-ledger';

export const T0 = new Date('2026-03-14T18:00:00.000Z');

export const QUESTIONS: Question[] = [
  { id: 'ssh-port', prompt: 'What port does SSH listen on by default?', value: 200, answers: ['22', 'twenty-two'] },
  { id: 'dns-port', prompt: 'Which UDP port does DNS use?', value: 100, answers: ['53'] },
  { id: 'xss', prompt: 'What does XSS stand for?', value: 300, answers: ['cross-site scripting'] },
];

export function testConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return {
    adminNodeIds: ['admin1'],
    questionIntervalMs: 180_000,
    answerWindowMs: 120_000,
    maxRounds: 3,
    gameChannelName: 'HackerJeopardy',
    questionsFile: 'unused.json',
    shuffleQuestions: false,
    settlementRetries: 2,
    ledgerBackend: 'memory',
    databasePath: ':memory:',
    maxMessageLength: 200,
    bridgeToken: undefined,
    rateLimit: { windowMs: 10_000, max: 5 },
    timeScale: 1,
    port: 0,
    ...overrides,
  };
}

export class RecordingSink implements AnnouncementSink {
  announcements: Announcement[] = [];
  directs: Array<{ nodeId: string; text: string }> = [];

  publish(announcement: Announcement) {
    this.announcements.push(announcement);
  }

  direct(nodeId: string, text: string) {
    this.directs.push({ nodeId, text });
  }

  ofType<K extends Announcement['type']>(type: K): Array<Extract<Announcement, { type: K }>> {
    return this.announcements.filter((a): a is Extract<Announcement, { type: K }> => a.type === type);
  }

  types(): Array<Announcement['type']> {
    return this.announcements.map((a) => a.type);
  }
}

export interface SessionHarness {
  moduleRef: TestingModule;
  session: GameSessionService;
  sink: RecordingSink;
  ledger: Ledger;
}

export interface HarnessOptions {
  config?: Partial<GameConfig>;
  questions?: Question[];
  ledger?: Ledger;
}

/** Session complète (modules Nest réels) avec sortie, ledger et banque de questions remplacés */
export async function createSessionHarness(options: HarnessOptions = {}): Promise<SessionHarness> {
  const sink = new RecordingSink();
  const ledger = options.ledger ?? new MemoryLedger();
  const questions = options.questions ?? QUESTIONS;
  const moduleRef = await Test.createTestingModule({ imports: [CommonModule, ConfigModule, GameModule] })
    .overrideProvider(GAME_CONFIG)
    .useValue(testConfig(options.config))
    .overrideProvider(ANNOUNCEMENT_SINK)
    .useValue(sink)
    .overrideProvider(LEDGER)
    .useValue(ledger)
    .overrideProvider(QuestionBankService)
    .useValue({ load: async () => [...questions] })
    .compile();
  await moduleRef.init();
  return { moduleRef, session: moduleRef.get(GameSessionService), sink, ledger };
}

/** Horloge simulée ; les promesses et nextTick restent réels pour que Nest compile normalement */
export function useGameClock() {
  jest.useFakeTimers({ now: T0, doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
}

export async function advance(session: GameSessionService, ms: number) {
  await jest.advanceTimersByTimeAsync(ms);
  await session.whenIdle();
}

export function silenceLogs() {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

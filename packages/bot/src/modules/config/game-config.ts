import * as path from 'path';
import { z } from 'zod';

export const GAME_CONFIG = Symbol('GAME_CONFIG');

export const DEFAULT_QUESTIONS_FILE = path.resolve(__dirname, '../../../data/questions.json');

const seconds = (fallback: number) =>
  z.coerce.number().int().positive().max(24 * 3600).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1' || v === 'yes');

/**
 * Schéma des variables d'environnement consommées par le bot.
 * Les durées sont exprimées en secondes, comme dans le .env d'exemple.
 */
export const gameEnvSchema = z
  .object({
    HJ_ADMIN_NODE_IDS: z.string().default(''),
    HJ_QUESTION_INTERVAL: seconds(180),
    HJ_ANSWER_WINDOW: seconds(120),
    HJ_MAX_ROUNDS: z.coerce.number().int().positive().max(1000).default(10),
    HJ_GAME_CHANNEL_NAME: z.string().min(1).default('HackerJeopardy'),
    HJ_QUESTIONS_FILE: z.string().min(1).default(DEFAULT_QUESTIONS_FILE),
    HJ_SHUFFLE_QUESTIONS: flag(false),
    HJ_SETTLEMENT_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
    LEDGER_BACKEND: z.enum(['sqlite', 'memory']).default('sqlite'),
    DATABASE_PATH: z.string().min(1).default(path.join('data', 'bot.db')),
    MESH_MAX_MESSAGE_LENGTH: z.coerce.number().int().min(20).max(237).default(200),
    MESH_BRIDGE_TOKEN: z.string().optional(),
    MESH_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(10000),
    MESH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(5),
    TIME_SCALE: z.coerce.number().positive().default(1),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  })
  .refine((env) => env.HJ_ANSWER_WINDOW <= env.HJ_QUESTION_INTERVAL, {
    message: 'HJ_ANSWER_WINDOW must not exceed HJ_QUESTION_INTERVAL',
    path: ['HJ_ANSWER_WINDOW'],
  });

export interface GameConfig {
  readonly adminNodeIds: readonly string[];
  readonly questionIntervalMs: number;
  readonly answerWindowMs: number;
  readonly maxRounds: number;
  readonly gameChannelName: string;
  readonly questionsFile: string;
  readonly shuffleQuestions: boolean;
  readonly settlementRetries: number;
  readonly ledgerBackend: 'sqlite' | 'memory';
  readonly databasePath: string;
  readonly maxMessageLength: number;
  readonly bridgeToken?: string;
  readonly rateLimit: { readonly windowMs: number; readonly max: number };
  readonly timeScale: number;
  readonly port: number;
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/** Retire un éventuel `!` initial et normalise la casse d'un identifiant de nœud */
export function normalizeNodeId(nodeId: string): string {
  return nodeId.trim().replace(/^!/, '').toLowerCase();
}

export function loadGameConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const parsed = gameEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    );
  }
  const e = parsed.data;
  const adminNodeIds = e.HJ_ADMIN_NODE_IDS
    .split(',')
    .map(normalizeNodeId)
    .filter((id) => id.length > 0);

  return Object.freeze({
    adminNodeIds: Object.freeze(adminNodeIds),
    questionIntervalMs: e.HJ_QUESTION_INTERVAL * 1000,
    answerWindowMs: e.HJ_ANSWER_WINDOW * 1000,
    maxRounds: e.HJ_MAX_ROUNDS,
    gameChannelName: e.HJ_GAME_CHANNEL_NAME,
    questionsFile: e.HJ_QUESTIONS_FILE,
    shuffleQuestions: e.HJ_SHUFFLE_QUESTIONS,
    settlementRetries: e.HJ_SETTLEMENT_RETRIES,
    ledgerBackend: e.LEDGER_BACKEND,
    databasePath: e.DATABASE_PATH,
    maxMessageLength: e.MESH_MAX_MESSAGE_LENGTH,
    bridgeToken: e.MESH_BRIDGE_TOKEN || undefined,
    rateLimit: Object.freeze({ windowMs: e.MESH_RATE_LIMIT_WINDOW_MS, max: e.MESH_RATE_LIMIT_MAX }),
    timeScale: e.TIME_SCALE,
    port: e.PORT,
  });
}

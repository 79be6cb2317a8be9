import { Inject, Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { GAME_CONFIG, GameConfig } from '../config/game-config';
import { StructuredLoggerService } from '../common/structured-logger.service';
import { Question } from './game-types';

const questionSchema = z.object({
  id: z.string().min(1).optional(),
  prompt: z.string().min(1).max(500),
  value: z.number().int().refine((v) => Math.abs(v) >= 100 && Math.abs(v) <= 500, {
    message: 'value magnitude must be between 100 and 500',
  }),
  answers: z.array(z.string().trim().min(1)).min(1),
});

export const questionBankSchema = z.object({
  questions: z.array(questionSchema),
});

// Utilisées quand le fichier de questions est introuvable
const FALLBACK_QUESTIONS: Question[] = [
  { id: 'fallback-1', prompt: 'What port does SSH use by default?', value: 100, answers: ['22', 'twenty-two'] },
  { id: 'fallback-2', prompt: 'What does XSS stand for?', value: 200, answers: ['cross-site scripting', 'cross site scripting'] },
  { id: 'fallback-3', prompt: 'What is the default port for HTTPS?', value: 100, answers: ['443', 'four forty-three'] },
];

export class QuestionBankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuestionBankError';
  }
}

export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function parseQuestionBank(raw: unknown, source = 'questions'): Question[] {
  const parsed = questionBankSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new QuestionBankError(`Invalid question bank ${source}: ${detail}`);
  }
  return parsed.data.questions.map((q, i) => ({
    id: q.id ?? `q${i + 1}`,
    prompt: q.prompt.trim(),
    value: q.value,
    answers: q.answers,
  }));
}

/**
 * Banque de questions relue à chaque début de session : on peut éditer le fichier
 * entre deux parties sans redémarrer le bot.
 */
@Injectable()
export class QuestionBankService {
  random: () => number = Math.random;

  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    private readonly logger: StructuredLoggerService,
  ) {}

  async load(): Promise<Question[]> {
    const file = this.config.questionsFile;
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.warn('Question file not found, using fallback questions', { file });
        return this.order(FALLBACK_QUESTIONS);
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new QuestionBankError(`Question file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const questions = parseQuestionBank(raw, file);
    this.logger.info('Questions loaded', { file, count: questions.length });
    return this.order(questions);
  }

  private order(questions: Question[]): Question[] {
    return this.config.shuffleQuestions ? shuffle(questions, this.random) : [...questions];
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 'ENOENT';
}

/// <reference types="jest" />
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StructuredLoggerService } from '../src/modules/common/structured-logger.service';
import { DEFAULT_QUESTIONS_FILE } from '../src/modules/config/game-config';
import {
  QuestionBankError,
  QuestionBankService,
  parseQuestionBank,
  shuffle,
} from '../src/modules/game/question-bank.service';
import { silenceLogs, testConfig } from './utils/test-helpers';

describe('question bank', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mesh-jeopardy-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => silenceLogs());
  afterEach(() => jest.restoreAllMocks());

  const serviceFor = (file: string, shuffleQuestions = false) =>
    new QuestionBankService(testConfig({ questionsFile: file, shuffleQuestions }), new StructuredLoggerService('test'));

  it('parses and numbers questions without ids', () => {
    const questions = parseQuestionBank({
      questions: [{ prompt: ' What does XSS stand for? ', value: -200, answers: ['cross-site scripting'] }],
    });
    expect(questions).toEqual([
      { id: 'q1', prompt: 'What does XSS stand for?', value: -200, answers: ['cross-site scripting'] },
    ]);
  });

  it('rejects values outside 100..500 and empty answer lists', () => {
    expect(() => parseQuestionBank({ questions: [{ prompt: 'p', value: 50, answers: ['a'] }] })).toThrow(QuestionBankError);
    expect(() => parseQuestionBank({ questions: [{ prompt: 'p', value: 100, answers: [] }] })).toThrow(
      'Invalid question bank questions: questions.0.answers: Array must contain at least 1 element(s)',
    );
  });

  it('shuffles with the injected random source', () => {
    expect(shuffle(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
  });

  it('loads the bundled question file', async () => {
    const questions = await serviceFor(DEFAULT_QUESTIONS_FILE).load();
    expect(questions).toHaveLength(12);
    expect(questions[0]).toEqual({
      id: 'ssh-port',
      prompt: 'What port does SSH use by default?',
      value: 100,
      answers: ['22', 'twenty-two'],
    });
  });

  it('reloads the file on every call and shuffles when enabled', async () => {
    const file = path.join(dir, 'bank.json');
    const raw = {
      questions: [
        { id: 'one', prompt: 'First?', value: 100, answers: ['1'] },
        { id: 'two', prompt: 'Second?', value: 200, answers: ['2'] },
      ],
    };
    await fs.writeFile(file, JSON.stringify(raw));
    const service = serviceFor(file, true);
    service.random = () => 0;
    expect((await service.load()).map((q) => q.id)).toEqual(['two', 'one']);

    await fs.writeFile(file, JSON.stringify({ questions: [raw.questions[0]] }));
    expect((await service.load()).map((q) => q.id)).toEqual(['one']);
  });

  it('falls back to built-in questions when the file is missing', async () => {
    const questions = await serviceFor(path.join(dir, 'missing.json')).load();
    expect(questions.map((q) => q.id)).toEqual(['fallback-1', 'fallback-2', 'fallback-3']);
  });

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "questions": [');
    await expect(serviceFor(file).load()).rejects.toThrow(QuestionBankError);
  });
});

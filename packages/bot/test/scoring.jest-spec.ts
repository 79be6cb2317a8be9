/// <reference types="jest" />
import { ScoringService, normalizeAnswer } from '../src/modules/scoring/scoring.service';

describe('ScoringService', () => {
  const svc = new ScoringService();

  it('ignores case and surrounding whitespace', () => {
    expect(normalizeAnswer('  TWENTY-TWO \n')).toBe('twenty-two');
    expect(svc.isCorrect('TWENTY-TWO ', ['22', 'twenty-two'])).toBe(true);
  });

  it('does not accept partial matches', () => {
    expect(svc.isCorrect('2', ['22'])).toBe(false);
    expect(svc.isCorrect('cross-site', ['cross-site scripting'])).toBe(false);
  });

  it('awards the value for a correct answer and deducts it otherwise', () => {
    expect(svc.grade({ submitted: '22', acceptedAnswers: ['22'], value: 300 })).toEqual({ correct: true, delta: 300 });
    expect(svc.grade({ submitted: '21', acceptedAnswers: ['22'], value: 300 })).toEqual({ correct: false, delta: -300 });
  });

  it('keeps the sign of a negative value', () => {
    expect(svc.grade({ submitted: '22', acceptedAnswers: ['22'], value: -400 })).toEqual({ correct: true, delta: -400 });
    expect(svc.grade({ submitted: '21', acceptedAnswers: ['22'], value: -400 })).toEqual({ correct: false, delta: 400 });
  });
});

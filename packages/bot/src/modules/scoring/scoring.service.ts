import { Injectable } from '@nestjs/common';

export interface GradeParams {
  submitted: string;
  acceptedAnswers: readonly string[];
  value: number;
}

export interface Grade {
  correct: boolean;
  delta: number;
}

/** Casse et espaces de bord ignorés ; pas de correspondance partielle */
export function normalizeAnswer(text: string): string {
  return text.trim().toLowerCase();
}

@Injectable()
export class ScoringService {
  isCorrect(submitted: string, acceptedAnswers: readonly string[]): boolean {
    const s = normalizeAnswer(submitted);
    return acceptedAnswers.some((a) => normalizeAnswer(a) === s);
  }

  // Bonne réponse : +valeur ; mauvaise réponse : -valeur (valeur signée). L'absence de réponse n'est jamais notée.
  grade({ submitted, acceptedAnswers, value }: GradeParams): Grade {
    const correct = this.isCorrect(submitted, acceptedAnswers);
    return { correct, delta: correct ? value : -value };
  }
}

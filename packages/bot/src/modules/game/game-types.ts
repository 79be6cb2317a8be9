export interface Question {
  readonly id: string;
  readonly prompt: string;
  /** Valeur signée, magnitude 100..500 */
  readonly value: number;
  readonly answers: readonly string[];
}

export type SessionStatus = 'Idle' | 'Running' | 'Stopped';

export type RoundStatus = 'Open' | 'Grading' | 'Closed';

export type CloseTrigger = 'timer' | 'skip' | 'stop';

export interface Submission {
  readonly playerId: string;
  readonly playerName?: string;
  readonly roundId: string;
  readonly text: string;
  readonly arrivedAt: number;
}

export type RejectionReason = 'Banned' | 'NoOpenRound' | 'DuplicateSubmission';

export type SubmitOutcome =
  | { accepted: true; submission: Submission }
  | { accepted: false; reason: RejectionReason };

export interface RoundSnapshot {
  id: string;
  number: number;
  value: number;
  prompt: string;
  status: RoundStatus;
  opensAt: number;
  closesAt: number;
  remainingMs: number;
  submissions: number;
}

export interface SessionSnapshot {
  status: SessionStatus;
  sessionNumber: number;
  roundCounter: number;
  maxRounds: number;
  players: number;
  banned: number;
  round?: RoundSnapshot;
}

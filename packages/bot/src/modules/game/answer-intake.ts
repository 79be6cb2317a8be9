import { BanList } from './ban-list';
import { RoundState } from './round-state';
import { Submission, SubmitOutcome } from './game-types';

/**
 * Réception des réponses pour la manche ouverte. `submit` est un check-and-insert
 * synchrone : appelé depuis la file de la session, deux réponses du même joueur ne
 * peuvent pas passer toutes les deux le contrôle de doublon.
 * Aucune correction ici : elle a lieu à la fermeture de la manche.
 */
export class AnswerIntake {
  private round?: RoundState;
  private submissions = new Map<string, Map<string, Submission>>(); // roundId -> playerId -> submission

  constructor(private readonly bans: BanList) {}

  open(round: RoundState) {
    this.round = round;
    this.submissions.set(round.id, new Map());
  }

  submit(playerId: string, roundId: string, text: string, arrivedAt: number, playerName?: string): SubmitOutcome {
    if (this.bans.isBanned(playerId)) return { accepted: false, reason: 'Banned' };

    const forRound = this.submissions.get(roundId);
    if (forRound?.has(playerId)) return { accepted: false, reason: 'DuplicateSubmission' };

    const round = this.round;
    if (!round || !forRound || round.id !== roundId || !round.acceptsAt(arrivedAt)) {
      return { accepted: false, reason: 'NoOpenRound' };
    }

    const submission: Submission = { playerId, playerName, roundId, text, arrivedAt };
    forRound.set(playerId, submission);
    return { accepted: true, submission };
  }

  /** Réponses acceptées, dans l'ordre d'arrivée */
  submissionsFor(roundId: string): Submission[] {
    return [...(this.submissions.get(roundId)?.values() ?? [])];
  }

  countFor(roundId: string): number {
    return this.submissions.get(roundId)?.size ?? 0;
  }

  hasSubmitted(playerId: string, roundId: string): boolean {
    return this.submissions.get(roundId)?.has(playerId) ?? false;
  }

  reset() {
    this.round = undefined;
    this.submissions.clear();
  }
}

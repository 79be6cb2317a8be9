import { Question, RoundStatus } from './game-types';

export class RoundState {
  private _status: RoundStatus = 'Open';
  /** Joueurs déjà crédités : un règlement rejoué ne compte jamais deux fois */
  readonly settledPlayers = new Set<string>();

  constructor(
    readonly id: string,
    readonly number: number,
    readonly question: Question,
    readonly opensAt: number,
    readonly closesAt: number,
  ) {}

  get status(): RoundStatus { return this._status; }

  get isOpen(): boolean { return this._status === 'Open'; }

  acceptsAt(arrivedAt: number): boolean {
    return this._status === 'Open' && arrivedAt <= this.closesAt;
  }

  /** Open -> Grading ; false si la manche a déjà été fermée (timer et skip concurrents) */
  beginGrading(): boolean {
    if (this._status !== 'Open') return false;
    this._status = 'Grading';
    return true;
  }

  close() {
    this._status = 'Closed';
  }

  remainingMs(now: number): number {
    return this._status === 'Open' ? Math.max(0, this.closesAt - now) : 0;
  }
}

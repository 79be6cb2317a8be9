/**
 * Erreurs métier du moteur de jeu. Elles sont renvoyées comme valeurs,
 * jamais levées à travers les opérations publiques de la session.
 */
export type GameErrorKind =
  | 'Unauthorized'
  | 'InvalidState'
  | 'Banned'
  | 'DuplicateSubmission'
  | 'NoOpenRound';

export type GameResult<T> =
  | { success: true; data: T }
  | { success: false; error: GameErrorKind; message: string };

export function ok<T>(data: T): GameResult<T> {
  return { success: true, data };
}

export function fail<T = never>(error: GameErrorKind, message: string): GameResult<T> {
  return { success: false, error, message };
}

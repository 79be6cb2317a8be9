export const LEDGER = Symbol('LEDGER');

export interface LedgerStanding {
  playerId: string;
  name: string;
  total: number;
}

/**
 * Totaux cumulés par joueur. Toujours appelé depuis le point de sérialisation de la
 * session : pas de verrou ici. L'idempotence d'un règlement rejoué est assurée par
 * l'appelant, qui note par manche les joueurs déjà crédités.
 */
export interface Ledger {
  applyDelta(playerId: string, delta: number, displayName?: string): Promise<number>;
  /** Classement décroissant ; à total égal, le premier à avoir atteint ce total passe devant */
  topN(n: number): Promise<LedgerStanding[]>;
  totalFor(playerId: string): Promise<number>;
  reset(): Promise<void>;
}

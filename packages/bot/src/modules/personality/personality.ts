import type { InboundMeshMessage } from '@mesh-jeopardy/shared';

export const ACTIVE_PERSONALITY = Symbol('ACTIVE_PERSONALITY');

/**
 * Mode de jeu branché sur le routeur mesh. Le routeur en tient un seul,
 * choisi au démarrage.
 */
export interface Personality {
  readonly name: string;
  /** Réponse à renvoyer en message direct à l'expéditeur, ou null pour rester silencieux */
  handleMessage(message: InboundMeshMessage): Promise<string | null>;
  getHelp(senderId?: string): string;
}

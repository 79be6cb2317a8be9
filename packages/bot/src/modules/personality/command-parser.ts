export type HjCommand =
  | { kind: 'start' }
  | { kind: 'stop' }
  | { kind: 'next' }
  | { kind: 'reset' }
  | { kind: 'ban'; target: string }
  | { kind: 'unban'; target: string }
  | { kind: 'join' }
  | { kind: 'help' }
  | { kind: 'status' }
  | { kind: 'scores' }
  | { kind: 'answer'; text: string }
  | { kind: 'unknown'; text: string };

export const COMMAND_PREFIX = '!hj';

export function isGameCommand(text: string): boolean {
  const lower = text.trim().toLowerCase();
  return lower === COMMAND_PREFIX || lower.startsWith(`${COMMAND_PREFIX} `) || lower === '!join';
}

/**
 * `!hj <sous-commande> [args]`, `!join`, ou texte libre (réponse).
 * Tout autre texte commençant par `!` est une commande inconnue.
 */
export function parseCommand(text: string): HjCommand {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();

  if (lower === '!join') return { kind: 'join' };
  if (!lower.startsWith('!')) return { kind: 'answer', text: trimmed };
  if (!isGameCommand(lower)) return { kind: 'unknown', text: trimmed };

  const [sub = '', ...args] = trimmed.slice(COMMAND_PREFIX.length).trim().split(/\s+/);
  const target = args.join(' ');
  switch (sub.toLowerCase()) {
    case '':
    case 'help':
      return { kind: 'help' };
    case 'start':
      return { kind: 'start' };
    case 'stop':
      return { kind: 'stop' };
    case 'next':
    case 'skip':
      return { kind: 'next' };
    case 'reset':
      return { kind: 'reset' };
    case 'ban':
      return { kind: 'ban', target };
    case 'unban':
      return { kind: 'unban', target };
    case 'join':
      return { kind: 'join' };
    case 'status':
    case 'info':
      return { kind: 'status' };
    case 'scores':
    case 'leaderboard':
      return { kind: 'scores' };
    default:
      return { kind: 'unknown', text: trimmed };
  }
}

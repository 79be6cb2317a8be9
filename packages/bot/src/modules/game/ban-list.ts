import { normalizeNodeId } from '../config/game-config';

// Bannissements en mémoire : ils survivent aux manches et aux sessions, pas au redémarrage du process
export class BanList {
  private banned = new Map<string, { bannedBy: string; bannedAt: number }>();

  ban(nodeId: string, bannedBy: string, at = Date.now()): boolean {
    const id = normalizeNodeId(nodeId);
    if (this.banned.has(id)) return false;
    this.banned.set(id, { bannedBy: normalizeNodeId(bannedBy), bannedAt: at });
    return true;
  }

  unban(nodeId: string): boolean {
    return this.banned.delete(normalizeNodeId(nodeId));
  }

  isBanned(nodeId: string): boolean {
    return this.banned.has(normalizeNodeId(nodeId));
  }

  get size(): number { return this.banned.size; }
}

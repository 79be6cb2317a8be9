import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { DatabaseService } from '../database/database.service';
import { Ledger, LedgerStanding } from './ledger';

const standingRowSchema = z.object({
  node_id: z.string(),
  display_name: z.string().nullable(),
  total_points: z.number(),
});

const totalRowSchema = standingRowSchema.pick({ total_points: true });

@Injectable()
export class SqliteLedgerService implements Ledger {
  constructor(private readonly db: DatabaseService) {}

  async applyDelta(playerId: string, delta: number, displayName?: string): Promise<number> {
    const now = new Date().toISOString();
    await this.db.run(
      `INSERT INTO players (node_id, display_name, total_points, reached_seq, last_seen)
       VALUES (?, ?, ?, (SELECT COALESCE(MAX(reached_seq), 0) + 1 FROM players), ?)
       ON CONFLICT(node_id) DO UPDATE SET
         total_points = total_points + excluded.total_points,
         display_name = COALESCE(excluded.display_name, players.display_name),
         reached_seq = excluded.reached_seq,
         last_seen = excluded.last_seen`,
      [playerId, displayName ?? null, delta, now],
    );
    return this.totalFor(playerId);
  }

  async topN(n: number): Promise<LedgerStanding[]> {
    const rows = await this.db.all(
      `SELECT node_id, display_name, total_points
       FROM players
       ORDER BY total_points DESC, reached_seq ASC
       LIMIT ?`,
      [Math.max(0, n)],
    );
    return rows.map((raw) => {
      const r = standingRowSchema.parse(raw);
      return { playerId: r.node_id, name: r.display_name ?? r.node_id, total: r.total_points };
    });
  }

  async totalFor(playerId: string): Promise<number> {
    const row = await this.db.get('SELECT total_points FROM players WHERE node_id = ?', [playerId]);
    return row ? totalRowSchema.parse(row).total_points : 0;
  }

  async reset(): Promise<void> {
    await this.db.run('DELETE FROM players');
  }
}

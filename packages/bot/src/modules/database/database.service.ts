import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import initSqlJs, { Database } from 'sql.js';
import path from 'path';
import fs from 'fs/promises';
import { GAME_CONFIG, GameConfig } from '../config/game-config';
import { StructuredLoggerService } from '../common/structured-logger.service';

export type SqlParam = string | number | null;
export type SqlRow = Record<string, number | string | Uint8Array | null>;

export interface RunResult {
  changes: number;
}

/**
 * SQLite compilé en WebAssembly : la base vit en mémoire et chaque écriture est
 * recopiée dans `databasePath` (sauf `:memory:`).
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private db: Database | null = null;
  private readonly dbPath: string;

  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    private readonly logger: StructuredLoggerService,
  ) {
    this.dbPath = config.databasePath;
  }

  async onModuleInit() {
    // Le ledger en mémoire n'a pas besoin de fichier
    if (this.config.ledgerBackend !== 'sqlite') return;
    await this.initialize();
  }

  async onModuleDestroy() {
    await this.close();
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  private get persistent(): boolean {
    return this.dbPath !== ':memory:';
  }

  public async initialize(): Promise<void> {
    try {
      const SQL = await initSqlJs();
      let existing: Buffer | null = null;
      if (this.persistent) {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
        existing = await fs.readFile(this.dbPath).catch((err: NodeJS.ErrnoException) => {
          if (err.code === 'ENOENT') return null;
          throw err;
        });
      }

      this.db = new SQL.Database(existing);
      await this.createTables();

      this.logger.info('SQLite database ready', { path: this.dbPath, restored: existing !== null });
    } catch (error) {
      this.logger.error('Database initialization failed', error, { path: this.dbPath });
      throw error;
    }
  }

  private async createTables(): Promise<void> {
    // reached_seq : ordre dans lequel les joueurs ont atteint leur total actuel (départage des égalités)
    await this.run(`CREATE TABLE IF NOT EXISTS players (
      node_id TEXT PRIMARY KEY,
      display_name TEXT,
      total_points INTEGER NOT NULL DEFAULT 0,
      reached_seq INTEGER NOT NULL DEFAULT 0,
      last_seen TEXT NOT NULL
    )`);
    await this.run(
      'CREATE INDEX IF NOT EXISTS idx_players_ranking ON players (total_points DESC, reached_seq ASC)',
    );
  }

  private requireDb(): Database {
    if (!this.db) {
      throw new Error('Database not initialized');
    }
    return this.db;
  }

  public async run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    const db = this.requireDb();
    const started = Date.now();
    try {
      db.run(sql, params);
    } catch (err) {
      this.logger.error('SQL error', err, { sql });
      throw err;
    }
    const changes = db.getRowsModified();
    await this.flush();
    this.logger.logDatabaseQuery('run', 'players', Date.now() - started);
    return { changes };
  }

  public async get(sql: string, params: SqlParam[] = []): Promise<SqlRow | undefined> {
    const [row] = await this.all(sql, params);
    return row;
  }

  public async all(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    const db = this.requireDb();
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } catch (err) {
      this.logger.error('SQL error', err, { sql });
      throw err;
    } finally {
      stmt.free();
    }
  }

  public async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    await this.flush();
    db.close();
    this.db = null;
  }

  private async flush(): Promise<void> {
    if (!this.persistent || !this.db) return;
    await fs.writeFile(this.dbPath, this.db.export());
  }
}

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

type BetterSqliteDb = Database.Database;

const DEFAULT_BUSY_TIMEOUT_MS = 5_000;

function resolveSchemaPath(): string {
  const candidates = [
    path.resolve(process.cwd(), 'src/db/schema.sql'),
    path.resolve(__dirname, 'schema.sql'),
    path.resolve(__dirname, '../../src/db/schema.sql'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error('schema.sql not found');
}

export interface SqliteOptions {
  busyTimeoutMs?: number;
}

export class SqliteDatabase {
  readonly db: BetterSqliteDb;

  constructor(databasePath: string, options: SqliteOptions = {}) {
    if (databasePath !== ':memory:') {
      fs.mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    this.db = new Database(databasePath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`busy_timeout = ${Math.trunc(options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS)}`);

    this.migrate();
  }

  private migrate(): void {
    const schemaSql = fs.readFileSync(resolveSchemaPath(), 'utf8');
    this.db.exec(schemaSql);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export type { BetterSqliteDb };

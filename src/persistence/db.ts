import fs from 'fs-extra';
import path from 'node:path';
import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

const log = logger.child('db');

export const IN_MEMORY = ':memory:';

function loadSchema(): string {
  const candidates = [
    // Next to the compiled or source module
    new URL('./schema.sql', import.meta.url),
    // From dist/persistence back into the sources
    new URL('../../src/persistence/schema.sql', import.meta.url),
    path.resolve(process.cwd(), 'src', 'persistence', 'schema.sql'),
  ];

  for (const candidate of candidates) {
    try {
      return fs.readFileSync(candidate, 'utf-8');
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'ENOENT') {
        log.warn('Error reading schema candidate', { candidate: String(candidate), error: String(err) });
      }
    }
  }

  throw new DatabaseError('schema.sql not found', 'loadSchema');
}

let cachedSchema: string | null = null;

function schema(): string {
  if (cachedSchema === null) {
    cachedSchema = loadSchema();
  }
  return cachedSchema;
}

export class DatabaseManager {
  private readonly db: Database.Database;
  readonly path: string;

  constructor(dbPath: string = IN_MEMORY) {
    this.path = dbPath;
    if (dbPath !== IN_MEMORY) {
      fs.ensureDirSync(path.dirname(dbPath));
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(schema());
  }

  prepare<Params extends unknown[] = unknown[], Row = unknown>(query: string): Database.Statement<Params, Row> {
    return this.db.prepare<Params, Row>(query);
  }

  exec(sql: string) {
    this.db.exec(sql);
  }

  /**
   * Runs `fn` as one atomic unit. A throw rolls back every write made inside,
   * including writes from nested calls (which run as savepoints).
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }
}

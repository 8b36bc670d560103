import fs from 'fs';
import path from 'path';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic, type SqlValue } from 'sql.js';

export type Row = Record<string, SqlValue>;
export type Param = string | number | null;

export const IN_MEMORY = ':memory:';

let enginePromise: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  enginePromise ??= initSqlJs();
  return enginePromise;
}

/**
 * Async connection over the WebAssembly SQLite engine. The engine works on an
 * in-memory image; the image is written back to `filename` after every
 * committed write.
 */
export class Connection {
  private inTransaction = false;
  private closed = false;

  constructor(
    private readonly db: SqlJsDatabase,
    readonly filename: string,
  ) {}

  async exec(sql: string): Promise<void> {
    this.assertOpen();
    this.db.exec(sql);
    const command = sql.trim().toUpperCase();
    if (command.startsWith('BEGIN')) {
      this.inTransaction = true;
    } else if (command === 'ROLLBACK') {
      this.inTransaction = false;
    } else if (command === 'COMMIT') {
      this.inTransaction = false;
      this.flush();
    } else if (!this.inTransaction) {
      this.flush();
    }
  }

  async run(sql: string, params: Param[] = []): Promise<void> {
    this.assertOpen();
    this.db.run(sql, params);
    if (!this.inTransaction) this.flush();
  }

  async all(sql: string, params: Param[] = []): Promise<Row[]> {
    this.assertOpen();
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('database-closed');
  }

  private flush(): void {
    if (this.filename === IN_MEMORY) return;
    fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    fs.writeFileSync(this.filename, this.db.export());
  }
}

export async function openConnection(filename: string): Promise<Connection> {
  const engine = await loadEngine();
  const image = filename !== IN_MEMORY && fs.existsSync(filename) ? fs.readFileSync(filename) : null;
  return new Connection(new engine.Database(image), filename);
}

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname } from 'node:path';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { flag, text } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { DatasourceClient, QueryRow } from '../datasource.types';

export const SQLITE_IN_MEMORY = ':memory:';

export const sqliteParamsSchema = z.strictObject({
  database_path: text(),
  readonly: flag().default(false),
});

export type SqliteParams = z.infer<typeof sqliteParamsSchema>;

export type SqliteKwargs = {
  filename: string;
  readonly: boolean;
};

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Uint8Array) return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  throw new TypeError(`Cannot bind a value of type ${typeof value} to a SQLite parameter`);
}

/**
 * SQLite database held in memory by sql.js. A file-backed database is read when opened and
 * written back after every statement that returns no rows; `:memory:` databases are never written.
 */
export class SqliteDatasource implements DatasourceClient {
  private closed = false;
  private persisting: Promise<void> = Promise.resolve();

  constructor(
    readonly provider: string,
    private readonly db: Database,
    private readonly options: SqliteKwargs,
  ) {}

  async query(sql: string, params: ReadonlyArray<unknown> = []): Promise<QueryRow[]> {
    this.assertOpen();
    const statement = this.db.prepare(sql);
    const rows: QueryRow[] = [];
    let writes = false;
    try {
      writes = statement.getColumnNames().length === 0;
      if (writes && this.options.readonly) {
        throw new Error(`Datasource '${this.provider}' is read-only`);
      }
      statement.bind(params.map(toSqlValue));
      while (statement.step()) rows.push(statement.getAsObject());
    } finally {
      statement.free();
    }
    if (writes) await this.persist();
    return rows;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.persisting;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('The database connection is not open');
  }

  // Writes run one after another, each with the state at the time it starts.
  private persist(): Promise<void> {
    const { filename, readonly } = this.options;
    if (readonly || filename === SQLITE_IN_MEMORY) return Promise.resolve();
    const next = this.persisting.then(async () => {
      await mkdir(dirname(filename), { recursive: true });
      await writeFile(filename, this.db.export());
    });
    this.persisting = next.catch(() => undefined);
    return next;
  }
}

let sqlJs: Promise<SqlJsStatic> | undefined;

function locateSqlJsFile(file: string): string {
  const require = createRequire(import.meta.url);
  return require.resolve(`sql.js/dist/${file}`);
}

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = import('sql.js')
      .then(({ default: initSqlJs }) => initSqlJs({ locateFile: locateSqlJsFile }))
      .catch((err: unknown) => {
        sqlJs = undefined;
        throw err;
      });
  }
  return sqlJs;
}

async function readDatabaseFile(kwargs: SqliteKwargs): Promise<Uint8Array | undefined> {
  if (kwargs.filename === SQLITE_IN_MEMORY) return undefined;
  try {
    return await readFile(kwargs.filename);
  } catch (err) {
    // a writable database that does not exist yet is created on first write
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (missing && !kwargs.readonly) return undefined;
    throw err;
  }
}

export const sqliteProvider = defineProvider<SqliteParams, SqliteKwargs, DatasourceClient>({
  id: 'sqlite',
  domain: 'datasources',
  parse: zodParams(sqliteParamsSchema),
  envOverrides: { database_path: 'SQLITE_DATABASE_PATH' },
  requires: ['sql.js'],
  render(params) {
    return { filename: params.database_path, readonly: params.readonly };
  },
  async create(kwargs, { provider }) {
    const [SQL, bytes] = await Promise.all([loadSqlJs(), readDatabaseFile(kwargs)]);
    return new SqliteDatasource(provider, new SQL.Database(bytes), kwargs);
  },
  dispose(client) {
    return client.close();
  },
  connectionString(params) {
    return `sqlite:///${params.database_path}`;
  },
  describe(params) {
    return { database_path: params.database_path, readonly: params.readonly };
  },
});

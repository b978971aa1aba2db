import { readFile } from 'node:fs/promises';
import type { Pool, PoolOptions } from 'mysql2/promise';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { oneOf, port, text } from '../../config/fields';
import { defineProvider, type ProviderDefinition } from '../../registry/provider.definition';
import { isQueryRow, type DatasourceClient, type QueryRow } from '../datasource.types';
import { connectTimeout, describeNetwork, networkShape, networkUrl, seconds } from './base';

export const MYSQL_SSL_MODES = ['DISABLED', 'PREFERRED', 'REQUIRED', 'VERIFY_CA', 'VERIFY_IDENTITY'] as const;

export const mysqlParamsSchema = z.strictObject({
  ...networkShape,
  connect_timeout: connectTimeout(),
  port: port().default(3306),
  charset: text().default('utf8mb4'),
  ssl_mode: oneOf(MYSQL_SSL_MODES).default('REQUIRED'),
  // paths to PEM files
  ssl_ca: text().optional(),
  ssl_cert: text().optional(),
  ssl_key: text().optional(),
});

export type MysqlParams = z.infer<typeof mysqlParamsSchema>;

export type MysqlKwargs = {
  pool: Omit<PoolOptions, 'ssl'>;
  ssl: {
    mode: MysqlParams['ssl_mode'];
    ca?: string;
    cert?: string;
    key?: string;
  };
};

export class MysqlDatasource implements DatasourceClient {
  constructor(
    readonly provider: string,
    private readonly pool: Pool,
  ) {}

  async query(sql: string, params: ReadonlyArray<unknown> = []): Promise<QueryRow[]> {
    const [result] = await this.pool.query(sql, [...params]);
    const rows: QueryRow[] = [];
    // statements without a result set return a header object instead of rows
    if (Array.isArray(result)) {
      for (const row of result) if (isQueryRow(row)) rows.push(row);
    }
    return rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

async function sslOptions(ssl: MysqlKwargs['ssl']): Promise<PoolOptions['ssl']> {
  if (ssl.mode === 'DISABLED') return undefined;
  const read = (path?: string) => (path === undefined ? Promise.resolve(undefined) : readFile(path, 'utf8'));
  const [ca, cert, key] = await Promise.all([read(ssl.ca), read(ssl.cert), read(ssl.key)]);
  return {
    rejectUnauthorized: ssl.mode === 'VERIFY_CA' || ssl.mode === 'VERIFY_IDENTITY',
    ...(ca !== undefined ? { ca } : {}),
    ...(cert !== undefined ? { cert } : {}),
    ...(key !== undefined ? { key } : {}),
  };
}

function mysqlDefinition(
  id: string,
  envOverrides: Record<string, string>,
): ProviderDefinition<MysqlParams, MysqlKwargs, DatasourceClient> {
  return defineProvider<MysqlParams, MysqlKwargs, DatasourceClient>({
    id,
    domain: 'datasources',
    parse: zodParams(mysqlParamsSchema),
    envOverrides,
    requires: ['mysql2'],
    render(params) {
      return {
        pool: {
          host: params.host,
          port: params.port,
          database: params.database,
          user: params.username,
          password: params.password,
          charset: params.charset,
          connectionLimit: params.pool_size + params.max_overflow,
          maxIdle: params.pool_size,
          connectTimeout: seconds(params.connect_timeout),
          idleTimeout: params.pool_recycle < 0 ? undefined : seconds(params.pool_recycle),
          waitForConnections: true,
        },
        ssl: { mode: params.ssl_mode, ca: params.ssl_ca, cert: params.ssl_cert, key: params.ssl_key },
      };
    },
    async create(kwargs, { provider }) {
      const { default: mysql } = await import('mysql2/promise');
      const ssl = await sslOptions(kwargs.ssl);
      return new MysqlDatasource(provider, mysql.createPool({ ...kwargs.pool, ssl }));
    },
    dispose(client) {
      return client.close();
    },
    connectionString(params) {
      return networkUrl('mysql', params, {
        charset: params.charset,
        ssl_mode: params.ssl_mode,
        ssl_ca: params.ssl_ca,
        ssl_cert: params.ssl_cert,
        ssl_key: params.ssl_key,
      });
    },
    describe(params) {
      return { ...describeNetwork(params), charset: params.charset, ssl_mode: params.ssl_mode };
    },
  });
}

export const mysqlProvider = mysqlDefinition('mysql', {
  host: 'MYSQL_HOST',
  port: 'MYSQL_PORT',
  database: 'MYSQL_DATABASE',
  username: 'MYSQL_USERNAME',
  password: 'MYSQL_PASSWORD',
});

export const awsRdsMysqlProvider = mysqlDefinition('aws_rds_mysql', {
  host: 'AWS_RDS_HOST',
  port: 'AWS_RDS_PORT',
  database: 'AWS_RDS_DATABASE',
  username: 'AWS_RDS_USERNAME',
  password: 'AWS_RDS_PASSWORD',
});

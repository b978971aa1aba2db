import type { Pool, PoolConfig } from 'pg';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { oneOf, port, text } from '../../config/fields';
import { defineProvider, type ProviderDefinition } from '../../registry/provider.definition';
import { isQueryRow, type DatasourceClient, type QueryRow } from '../datasource.types';
import { connectTimeout, describeNetwork, networkShape, networkUrl, seconds } from './base';

export const PG_SSL_MODES = ['disable', 'allow', 'prefer', 'require', 'verify-ca', 'verify-full'] as const;

export const postgresParamsSchema = z.strictObject({
  ...networkShape,
  connect_timeout: connectTimeout(),
  port: port().default(5432),
  sslmode: oneOf(PG_SSL_MODES).default('require'),
  application_name: text().default('switchyard'),
});

export type PostgresParams = z.infer<typeof postgresParamsSchema>;

export class PgDatasource implements DatasourceClient {
  constructor(
    readonly provider: string,
    private readonly pool: Pool,
  ) {}

  async query(sql: string, params: ReadonlyArray<unknown> = []): Promise<QueryRow[]> {
    const result = await this.pool.query(sql, [...params]);
    return result.rows.filter(isQueryRow);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function sslFor(mode: PostgresParams['sslmode']): PoolConfig['ssl'] {
  switch (mode) {
    case 'disable':
    case 'allow':
    case 'prefer':
      return false;
    case 'require':
      return { rejectUnauthorized: false };
    default:
      return { rejectUnauthorized: true };
  }
}

function postgresDefinition(
  id: string,
  envOverrides: Record<string, string>,
): ProviderDefinition<PostgresParams, PoolConfig, DatasourceClient> {
  return defineProvider<PostgresParams, PoolConfig, DatasourceClient>({
    id,
    domain: 'datasources',
    parse: zodParams(postgresParamsSchema),
    envOverrides,
    requires: ['pg'],
    render(params) {
      return {
        host: params.host,
        port: params.port,
        database: params.database,
        user: params.username,
        password: params.password,
        max: params.pool_size + params.max_overflow,
        connectionTimeoutMillis: seconds(params.connect_timeout),
        idleTimeoutMillis: params.pool_recycle < 0 ? 0 : seconds(params.pool_recycle),
        application_name: params.application_name,
        ssl: sslFor(params.sslmode),
      };
    },
    async create(kwargs, { provider }) {
      const { default: pg } = await import('pg');
      return new PgDatasource(provider, new pg.Pool(kwargs));
    },
    dispose(client) {
      return client.close();
    },
    connectionString(params) {
      return networkUrl('postgresql', params, {
        sslmode: params.sslmode,
        application_name: params.application_name,
      });
    },
    describe(params) {
      return { ...describeNetwork(params), sslmode: params.sslmode };
    },
  });
}

export const postgresqlProvider = postgresDefinition('postgresql', {
  host: 'POSTGRES_HOST',
  port: 'POSTGRES_PORT',
  database: 'POSTGRES_DB',
  username: 'POSTGRES_USER',
  password: 'POSTGRES_PASSWORD',
});

export const awsRdsPostgresqlProvider = postgresDefinition('aws_rds_postgresql', {
  host: 'AWS_RDS_HOST',
  port: 'AWS_RDS_PORT',
  database: 'AWS_RDS_DATABASE',
  username: 'AWS_RDS_USERNAME',
  password: 'AWS_RDS_PASSWORD',
});

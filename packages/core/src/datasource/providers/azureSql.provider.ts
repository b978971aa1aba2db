import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { flag, integer, port, text } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { DatasourceClient } from '../datasource.types';
import { describeNetwork, networkShape, networkUrl, seconds } from './base';

export const azureSqlParamsSchema = z.strictObject({
  ...networkShape,
  port: port().default(1433),
  driver: text().default('ODBC Driver 18 for SQL Server'),
  encrypt: flag().default(true),
  trust_server_certificate: flag().default(false),
  // seconds
  connection_timeout: integer({ positive: true }).default(30),
});

export type AzureSqlParams = z.infer<typeof azureSqlParamsSchema>;

// Shaped after the `mssql`/tedious pool configuration.
export type AzureSqlKwargs = {
  server: string;
  port: number;
  database: string;
  user: string;
  password: string;
  pool: { max: number; min: number; idleTimeoutMillis: number; acquireTimeoutMillis: number };
  connectionTimeout: number;
  options: { encrypt: boolean; trustServerCertificate: boolean };
};

// Validated, listed and rendered; no driver is wired, so requesting a client raises
// UnsupportedProviderError.
export const azureSqlProvider = defineProvider<AzureSqlParams, AzureSqlKwargs, DatasourceClient>({
  id: 'azure_sql',
  domain: 'datasources',
  parse: zodParams(azureSqlParamsSchema),
  envOverrides: {
    host: 'AZURE_SQL_HOST',
    database: 'AZURE_SQL_DATABASE',
    username: 'AZURE_SQL_USERNAME',
    password: 'AZURE_SQL_PASSWORD',
  },
  render(params) {
    return {
      server: params.host,
      port: params.port,
      database: params.database,
      user: params.username,
      password: params.password,
      pool: {
        max: params.pool_size + params.max_overflow,
        min: 0,
        idleTimeoutMillis: params.pool_recycle < 0 ? 0 : seconds(params.pool_recycle),
        acquireTimeoutMillis: seconds(params.pool_timeout),
      },
      connectionTimeout: seconds(params.connection_timeout),
      options: { encrypt: params.encrypt, trustServerCertificate: params.trust_server_certificate },
    };
  },
  connectionString(params) {
    return networkUrl('mssql', params, {
      driver: params.driver,
      encrypt: params.encrypt ? 'yes' : 'no',
      trustServerCertificate: params.trust_server_certificate ? 'yes' : 'no',
      connectionTimeout: params.connection_timeout,
    });
  },
  describe(params) {
    return { ...describeNetwork(params), encrypt: params.encrypt };
  },
});

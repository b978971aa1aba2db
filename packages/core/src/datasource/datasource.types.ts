import type { DomainSpec } from '../settings/domain';

export const DATASOURCE_KINDS = ['primary', 'analytics', 'cache', 'logging', 'backup'] as const;
export type DatasourceKind = (typeof DATASOURCE_KINDS)[number];

export const BUILTIN_DATASOURCE_PROVIDERS = [
  'postgresql',
  'mysql',
  'aws_rds_postgresql',
  'aws_rds_mysql',
  'sqlite',
  'azure_sql',
] as const;
export type BuiltinDatasourceProvider = (typeof BUILTIN_DATASOURCE_PROVIDERS)[number];

export const DATASOURCE_DOMAIN: DomainSpec<DatasourceKind> = { name: 'datasources', kinds: DATASOURCE_KINDS };

export type QueryRow = Record<string, unknown>;

/** Pooled handle to one database. `close()` releases every connection it holds. */
export interface DatasourceClient {
  readonly provider: string;
  query(sql: string, params?: ReadonlyArray<unknown>): Promise<QueryRow[]>;
  close(): Promise<void>;
}

export function isQueryRow(value: unknown): value is QueryRow {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

import type { ProviderDefinition } from '../../registry/provider.definition';
import type { ProviderRegistry } from '../../registry/provider.registry';
import { BUILTIN_DATASOURCE_PROVIDERS, type BuiltinDatasourceProvider, type DatasourceClient } from '../datasource.types';
import { azureSqlProvider } from './azureSql.provider';
import { awsRdsMysqlProvider, mysqlProvider } from './mysql.provider';
import { awsRdsPostgresqlProvider, postgresqlProvider } from './postgresql.provider';
import { sqliteProvider } from './sqlite.provider';

export { awsRdsMysqlProvider, awsRdsPostgresqlProvider, azureSqlProvider, mysqlProvider, postgresqlProvider, sqliteProvider };

export const builtinDatasourceProviders: Record<
  BuiltinDatasourceProvider,
  ProviderDefinition<object, unknown, DatasourceClient>
> = {
  postgresql: postgresqlProvider,
  mysql: mysqlProvider,
  aws_rds_postgresql: awsRdsPostgresqlProvider,
  aws_rds_mysql: awsRdsMysqlProvider,
  sqlite: sqliteProvider,
  azure_sql: azureSqlProvider,
};

export function registerBuiltinDatasourceProviders(registry: ProviderRegistry<DatasourceClient>): void {
  for (const id of BUILTIN_DATASOURCE_PROVIDERS) registry.register(builtinDatasourceProviders[id]);
}

import { Injectable } from '@nestjs/common';
import { ProviderRegistry } from '../registry/provider.registry';
import type { DatasourceClient } from './datasource.types';
import { registerBuiltinDatasourceProviders } from './providers';

@Injectable()
export class DatasourceProviderRegistry extends ProviderRegistry<DatasourceClient> {
  constructor() {
    super('datasources');
    registerBuiltinDatasourceProviders(this);
  }
}

import { Inject, Injectable, Optional } from '@nestjs/common';
import { LoggerService } from '../core/services/logger.service';
import { SETTINGS_ENV, type EnvSource } from '../settings/env.overrides';
import { SettingsResolver } from '../settings/settings.resolver';
import { SettingsSource } from '../settings/settings.source';
import { DATASOURCE_DOMAIN, type DatasourceClient, type DatasourceKind } from './datasource.types';
import { DatasourceProviderRegistry } from './datasourceProvider.registry';

@Injectable()
export class DatasourceSettingsResolver extends SettingsResolver<DatasourceClient, DatasourceKind> {
  constructor(
    @Inject(SettingsSource) source: SettingsSource,
    @Inject(DatasourceProviderRegistry) registry: DatasourceProviderRegistry,
    @Inject(LoggerService) logger: LoggerService,
    @Optional() @Inject(SETTINGS_ENV) env?: EnvSource,
  ) {
    super(DATASOURCE_DOMAIN, source, registry, logger, env ?? process.env);
  }
}

import { Module } from '@nestjs/common';
import { CoreModule } from './core/core.module';
import { ConfigService } from './core/services/config.service';
import { DataSourceFactoryService } from './datasource/datasourceFactory.service';
import { DatasourceProviderRegistry } from './datasource/datasourceProvider.registry';
import { DatasourceSettingsResolver } from './datasource/datasourceSettings.resolver';
import { LLMFactoryService } from './llm/llmFactory.service';
import { LLMProviderRegistry } from './llm/llmProvider.registry';
import { LLMSettingsResolver } from './llm/llmSettings.resolver';
import { SETTINGS_ENV } from './settings/env.overrides';
import { SettingsSource, YamlFileSettingsSource } from './settings/settings.source';

@Module({
  imports: [CoreModule],
  providers: [
    {
      provide: SettingsSource,
      useFactory: (cfg: ConfigService) => new YamlFileSettingsSource(cfg.configPath),
      inject: [ConfigService],
    },
    { provide: SETTINGS_ENV, useValue: process.env },
    LLMProviderRegistry,
    LLMSettingsResolver,
    LLMFactoryService,
    DatasourceProviderRegistry,
    DatasourceSettingsResolver,
    DataSourceFactoryService,
  ],
  exports: [
    SettingsSource,
    LLMProviderRegistry,
    LLMSettingsResolver,
    LLMFactoryService,
    DatasourceProviderRegistry,
    DatasourceSettingsResolver,
    DataSourceFactoryService,
  ],
})
export class ClientsModule {}

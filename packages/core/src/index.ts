import 'reflect-metadata';

export * from './common/errors';
export { isModuleInstalled, isModuleNotFound } from './common/modules';
export type { ModuleProbe } from './common/modules';
export * as fields from './config/fields';
export { ConfigurationRecord, validateRecord, zodParams, toFieldIssues } from './config/configuration.record';
export type { ParamsParser, ParseResult, RawParams, RecordTarget } from './config/configuration.record';

export { CoreModule } from './core/core.module';
export { ConfigService, configSchema, LOG_LEVELS } from './core/services/config.service';
export type { Config, LogLevel } from './core/services/config.service';
export { LoggerService } from './core/services/logger.service';

export { defineProvider } from './registry/provider.definition';
export type { ConstructionContext, Domain, ProviderDefinition } from './registry/provider.definition';
export { ProviderRegistry } from './registry/provider.registry';
export type { ProviderStatus, RegisterOptions, RegistryEntry } from './registry/provider.registry';

export { isKindOf } from './settings/domain';
export type { DomainSpec } from './settings/domain';
export { applyEnvOverrides, dropNulls, SETTINGS_ENV } from './settings/env.overrides';
export type { EnvSource } from './settings/env.overrides';
export { formatSelection, parseSelection } from './settings/selection';
export type { Selection } from './settings/selection';
export { SettingsResolver } from './settings/settings.resolver';
export type { ResolvedConfiguration } from './settings/settings.resolver';
export { SettingsSource, StaticSettingsSource, YamlFileSettingsSource } from './settings/settings.source';

export { ClientFactory } from './factory/client.factory';

export { BUILTIN_LLM_PROVIDERS, LLM_DOMAIN, LLM_KINDS } from './llm/llm.types';
export type { BuiltinLLMProvider, LLMClient, LLMKind } from './llm/llm.types';
export * from './llm/providers';
export { LLMFactoryService } from './llm/llmFactory.service';
export { LLMProviderRegistry } from './llm/llmProvider.registry';
export { LLMSettingsResolver } from './llm/llmSettings.resolver';

export { BUILTIN_DATASOURCE_PROVIDERS, DATASOURCE_DOMAIN, DATASOURCE_KINDS, isQueryRow } from './datasource/datasource.types';
export type { BuiltinDatasourceProvider, DatasourceClient, DatasourceKind, QueryRow } from './datasource/datasource.types';
export * from './datasource/providers';
export { DataSourceFactoryService } from './datasource/datasourceFactory.service';
export type { DatasourceInfo, DatasourceRegistration } from './datasource/datasourceFactory.service';
export { DatasourceProviderRegistry } from './datasource/datasourceProvider.registry';
export { DatasourceSettingsResolver } from './datasource/datasourceSettings.resolver';

export { ClientsModule } from './clients.module';

import { Inject, Injectable, type OnModuleDestroy } from '@nestjs/common';
import { RegistryConflictError, UnsupportedProviderError } from '../common/errors';
import { validateRecord, type ConfigurationRecord } from '../config/configuration.record';
import { LoggerService } from '../core/services/logger.service';
import { ClientFactory } from '../factory/client.factory';
import { dropNulls } from '../settings/env.overrides';
import { formatSelection, parseSelection, type Selection } from '../settings/selection';
import type { ResolvedConfiguration } from '../settings/settings.resolver';
import type { DatasourceClient, DatasourceKind } from './datasource.types';
import { DatasourceProviderRegistry } from './datasourceProvider.registry';
import { DatasourceSettingsResolver } from './datasourceSettings.resolver';

export type DatasourceRegistration = {
  provider: string;
  kind: DatasourceKind;
  params: Record<string, unknown>;
};

export type DatasourceInfo = {
  name: string;
  provider: string;
  kind: DatasourceKind;
  registered: boolean;
  // credential-free summary from the provider
  summary: Record<string, unknown>;
};

/**
 * Datasources are addressed by name: a `provider.kind` selection from the `datasources` section,
 * or a name given to `registerDatasource()`. Registered names never contain `.`, so the two
 * cannot collide.
 */
@Injectable()
export class DataSourceFactoryService extends ClientFactory<DatasourceClient, DatasourceKind> implements OnModuleDestroy {
  private readonly registered = new Map<string, ResolvedConfiguration<DatasourceKind>>();

  constructor(
    @Inject(DatasourceSettingsResolver) settings: DatasourceSettingsResolver,
    @Inject(DatasourceProviderRegistry) registry: DatasourceProviderRegistry,
    @Inject(LoggerService) logger: LoggerService,
  ) {
    super(settings, registry, logger);
  }

  async getDatasource(name?: string): Promise<DatasourceClient> {
    if (name !== undefined) {
      const registered = this.registered.get(name);
      if (registered) return this.getOrCreate(name, async () => registered);
    }
    const target = name === undefined ? await this.settings.defaultSelection() : parseSelection(this.settings.spec, name);
    return this.getClient(target.kind, target.provider);
  }

  registerDatasource(name: string, registration: DatasourceRegistration): ConfigurationRecord {
    if (name.includes('.')) {
      const reason = "names containing '.' are reserved for provider.kind selections";
      throw new RegistryConflictError(name, 'datasources', reason, 'datasource');
    }
    if (this.registered.has(name)) {
      throw new RegistryConflictError(name, 'datasources', 'name is already registered', 'datasource');
    }
    const selection = parseSelection(this.settings.spec, `${registration.provider}.${registration.kind}`);
    const { definition } = this.registry.lookup(selection.provider);
    const record = validateRecord(definition, dropNulls(registration.params), {
      domain: 'datasources',
      ...selection,
    });
    this.registered.set(name, { ...selection, selection: name, record });
    this.logger.info('Datasource registered', { datasource: name, ...selection });
    return record;
  }

  async listDatasources(): Promise<string[]> {
    const configured = (await this.getAvailableModels()).map((s) => formatSelection(s));
    return [...new Set([...configured, ...this.registered.keys()])];
  }

  async getDatasourcesByKind(kind: DatasourceKind): Promise<string[]> {
    return this.namesWhere((s) => s.kind === kind);
  }

  async getDatasourcesByProvider(provider: string): Promise<string[]> {
    return this.namesWhere((s) => s.provider === provider);
  }

  async getDatasourceInfo(name?: string): Promise<DatasourceInfo> {
    const resolved = await this.resolveDatasource(name);
    const { definition } = this.registry.lookup(resolved.provider);
    return {
      name: name ?? resolved.selection,
      provider: resolved.provider,
      kind: resolved.kind,
      registered: name !== undefined && this.registered.has(name),
      summary: definition.describe?.(resolved.record.params) ?? {},
    };
  }

  // Carries credentials; keep it out of logs.
  async getConnectionString(name?: string): Promise<string> {
    const resolved = await this.resolveDatasource(name);
    const { definition } = this.registry.lookup(resolved.provider);
    if (!definition.connectionString) {
      throw new UnsupportedProviderError(
        resolved.provider,
        { domain: 'datasources', kind: resolved.kind, selection: resolved.selection },
        'does not render connection strings',
      );
    }
    return definition.connectionString(resolved.record.params);
  }

  /** Runs `SELECT 1`; failures are logged and reported as `false`. */
  async testConnection(name?: string): Promise<boolean> {
    try {
      const client = await this.getDatasource(name);
      await client.query('SELECT 1');
      return true;
    } catch (err) {
      this.logger.warn('Datasource connection test failed', { datasource: name ?? 'default', error: err });
      return false;
    }
  }

  closeAll(): Promise<void> {
    return this.clearCache();
  }

  async onModuleDestroy(): Promise<void> {
    await this.closeAll();
  }

  private async resolveDatasource(name?: string): Promise<ResolvedConfiguration<DatasourceKind>> {
    const registered = name === undefined ? undefined : this.registered.get(name);
    if (registered) return registered;
    return name === undefined ? this.settings.resolve() : this.settings.resolveSelection(name);
  }

  private async namesWhere(predicate: (selection: Selection<DatasourceKind>) => boolean): Promise<string[]> {
    const configured = (await this.getAvailableModels()).filter(predicate).map((s) => formatSelection(s));
    const registered = [...this.registered.entries()]
      .filter(([, resolved]) => predicate(resolved))
      .map(([name]) => name);
    return [...configured, ...registered];
  }
}

import { ProviderUnavailableError, UnsupportedProviderError } from '../common/errors';
import { isModuleNotFound } from '../common/modules';
import type { LoggerService } from '../core/services/logger.service';
import type { ConstructionContext, ProviderDefinition } from '../registry/provider.definition';
import type { ProviderRegistry, ProviderStatus, RegisterOptions, RegistryEntry } from '../registry/provider.registry';
import { formatSelection, type Selection } from '../settings/selection';
import type { ResolvedConfiguration, SettingsResolver } from '../settings/settings.resolver';

type BuiltClient<TClient> = {
  client: TClient;
  definition: ProviderDefinition<object, unknown, TClient>;
};

type CacheEntry<TClient> = {
  pending: Promise<BuiltClient<TClient>>;
  // set once the build finishes
  built?: BuiltClient<TClient>;
};

/**
 * Resolves a request to a validated configuration and returns the client for it, building it at
 * most once per cache key. The cache holds the pending construction, so concurrent first requests
 * for one key share a single build; a failed build is evicted and the next request retries.
 *
 * Clearing disposes the clients that finished building. A build still in flight is detached: it
 * is handed to the callers waiting on it and not disposed, and later requests build afresh.
 */
export class ClientFactory<TClient, TKind extends string = string> {
  private cache = new Map<string, CacheEntry<TClient>>();

  constructor(
    protected readonly settings: SettingsResolver<TClient, TKind>,
    protected readonly registry: ProviderRegistry<TClient>,
    protected readonly logger: LoggerService,
  ) {}

  async getClient(kind?: TKind, provider?: string): Promise<TClient> {
    const target = await this.settings.target(kind, provider);
    return this.getOrCreate(formatSelection(target), () => this.settings.resolve(target.kind, target.provider));
  }

  /** Drops every cached client and disposes those that finished building. */
  async clearCache(): Promise<void> {
    const entries = [...this.cache.values()];
    this.cache = new Map();

    const built = entries.flatMap((entry) => (entry.built ? [entry.built] : []));
    this.logger.info('Client cache cleared', {
      domain: this.registry.domain,
      clients: built.length,
      detached: entries.length - built.length,
    });
    await Promise.all(built.map(({ client, definition }) => definition.dispose?.(client)));
  }

  async reloadSettings(): Promise<void> {
    this.settings.reload();
    await this.clearCache();
  }

  getAvailableModels(): Promise<Selection<TKind>[]> {
    return this.settings.listConfigured();
  }

  getSupportedProviders(): Set<string> {
    return new Set(this.registry.ids());
  }

  getProviderStatus(): ProviderStatus[] {
    return this.registry.ids().map((id) => this.registry.status(id));
  }

  registerProvider(
    definition: ProviderDefinition<object, unknown, TClient>,
    options?: RegisterOptions,
  ): RegistryEntry<TClient> {
    const entry = this.registry.register(definition, options);
    this.logger.info('Provider registered', { domain: this.registry.domain, provider: definition.id });
    return entry;
  }

  isCached(key: string): boolean {
    return this.cache.has(key);
  }

  protected getOrCreate(key: string, resolve: () => Promise<ResolvedConfiguration<TKind>>): Promise<TClient> {
    const cached = this.cache.get(key);
    if (cached) return cached.pending.then((built) => built.client);

    const cache = this.cache;
    const entry: CacheEntry<TClient> = {
      pending: this.build(key, resolve).then(
        (built) => {
          entry.built = built;
          return built;
        },
        (err: unknown) => {
          if (cache.get(key) === entry) cache.delete(key);
          throw err;
        },
      ),
    };
    cache.set(key, entry);
    return entry.pending.then((built) => built.client);
  }

  private async build(
    key: string,
    resolve: () => Promise<ResolvedConfiguration<TKind>>,
  ): Promise<BuiltClient<TClient>> {
    const resolved = await resolve();
    const entry = this.registry.lookup(resolved.provider);
    const client = await this.construct(entry, resolved, key);
    return { client, definition: entry.definition };
  }

  private async construct(
    entry: RegistryEntry<TClient>,
    resolved: ResolvedConfiguration<TKind>,
    key: string,
  ): Promise<TClient> {
    const { definition } = entry;
    const context: ConstructionContext = {
      provider: resolved.provider,
      kind: resolved.kind,
      selection: resolved.selection,
    };
    const details = { domain: this.registry.domain, provider: resolved.provider, kind: resolved.kind, selection: key };

    if (!definition.create) {
      throw new UnsupportedProviderError(resolved.provider, details);
    }
    if (entry.missingDependency) {
      throw new ProviderUnavailableError(resolved.provider, entry.missingDependency, details);
    }

    let client: TClient;
    try {
      client = await definition.create(resolved.record.clientKwargs(), context);
    } catch (err) {
      const missing = (definition.requires ?? []).find((dep) => isModuleNotFound(err, dep));
      if (missing) throw new ProviderUnavailableError(resolved.provider, missing, details, err);
      throw err;
    }
    this.logger.info('Client constructed', details);
    return client;
  }
}

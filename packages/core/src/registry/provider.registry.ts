import { RegistryConflictError, UnknownProviderError } from '../common/errors';
import { isModuleInstalled, type ModuleProbe } from '../common/modules';
import type { Domain, ProviderDefinition } from './provider.definition';

export type RegistryEntry<TClient> = {
  readonly definition: ProviderDefinition<object, unknown, TClient>;
  readonly envOverrides: Readonly<Record<string, string>>;
  readonly constructible: boolean;
  // first package from `requires` that could not be resolved at registration time
  readonly missingDependency?: string;
};

export type ProviderStatus = {
  provider: string;
  constructible: boolean;
  available: boolean;
  missingDependency?: string;
};

export type RegisterOptions = {
  replace?: boolean;
};

export class ProviderRegistry<TClient> {
  private readonly entries = new Map<string, RegistryEntry<TClient>>();

  constructor(
    readonly domain: Domain,
    private readonly probe: ModuleProbe = isModuleInstalled,
  ) {}

  register(definition: ProviderDefinition<object, unknown, TClient>, options: RegisterOptions = {}): RegistryEntry<TClient> {
    if (definition.domain !== this.domain) {
      throw new RegistryConflictError(definition.id, this.domain, `definition targets the '${definition.domain}' domain`);
    }
    if (this.entries.has(definition.id) && !options.replace) {
      throw new RegistryConflictError(definition.id, this.domain, 'already registered (pass replace to override)');
    }

    const missingDependency = (definition.requires ?? []).find((dep) => !this.probe(dep));
    const entry: RegistryEntry<TClient> = {
      definition,
      envOverrides: Object.freeze({ ...(definition.envOverrides ?? {}) }),
      constructible: typeof definition.create === 'function',
      missingDependency,
    };
    this.entries.set(definition.id, entry);
    return entry;
  }

  lookup(provider: string): RegistryEntry<TClient> {
    const entry = this.entries.get(provider);
    if (!entry) throw new UnknownProviderError(provider, this.domain, this.ids());
    return entry;
  }

  has(provider: string): boolean {
    return this.entries.has(provider);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  list(): RegistryEntry<TClient>[] {
    return [...this.entries.values()];
  }

  status(provider: string): ProviderStatus {
    const entry = this.lookup(provider);
    return {
      provider,
      constructible: entry.constructible,
      available: entry.constructible && !entry.missingDependency,
      ...(entry.missingDependency ? { missingDependency: entry.missingDependency } : {}),
    };
  }
}

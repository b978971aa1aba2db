import { ConfigurationLoadError, ConfigurationNotFoundError, InvalidSelectionError } from '../common/errors';
import { validateRecord, type ConfigurationRecord } from '../config/configuration.record';
import type { LoggerService } from '../core/services/logger.service';
import type { ProviderRegistry } from '../registry/provider.registry';
import { isKindOf, type DomainSpec } from './domain';
import { applyEnvOverrides, dropNulls, type EnvSource } from './env.overrides';
import { formatSelection, parseSelection, type Selection } from './selection';
import type { SettingsSource } from './settings.source';

export type ResolvedConfiguration<TKind extends string = string> = {
  provider: string;
  kind: TKind;
  selection: string;
  record: ConfigurationRecord;
};

type Namespace = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Turns the `<domain>` section of the configuration document into validated records.
 *
 * The section is loaded on first use and kept until `reload()`. Clients built from earlier
 * records are not affected by a reload; callers that want fresh clients must also clear the
 * factory cache (`ClientFactory.reloadSettings()` does both).
 */
export class SettingsResolver<TClient, TKind extends string = string> {
  private namespace?: Namespace;
  private loading?: Promise<Namespace>;
  private generation = 0;

  constructor(
    readonly spec: DomainSpec<TKind>,
    private readonly source: SettingsSource,
    private readonly registry: ProviderRegistry<TClient>,
    private readonly logger: LoggerService,
    private readonly env: EnvSource = process.env,
  ) {}

  get domain(): string {
    return this.spec.name;
  }

  /** Works out which `provider.kind` a request refers to without validating its parameters. */
  async target(kind?: string, provider?: string): Promise<Selection<TKind>> {
    if (kind !== undefined && provider !== undefined) {
      return parseSelection(this.spec, `${provider}.${kind}`);
    }
    const fallback = await this.defaultSelection();
    return parseSelection(this.spec, `${provider ?? fallback.provider}.${kind ?? fallback.kind}`);
  }

  async resolve(kind?: string, provider?: string): Promise<ResolvedConfiguration<TKind>> {
    const selection = await this.target(kind, provider);
    return this.validate(await this.load(), selection);
  }

  async resolveSelection(text: string): Promise<ResolvedConfiguration<TKind>> {
    const selection = parseSelection(this.spec, text);
    return this.validate(await this.load(), selection);
  }

  async defaultSelection(): Promise<Selection<TKind>> {
    const namespace = await this.load();
    const raw = namespace.default;
    if (raw === undefined || raw === null) {
      throw new InvalidSelectionError('', `no default selection configured for '${this.domain}'`, {
        domain: this.domain,
      });
    }
    const selection = parseSelection(this.spec, raw);
    if (!this.rawBlock(namespace, selection)) {
      throw new InvalidSelectionError(formatSelection(selection), 'default selection is not configured', {
        domain: this.domain,
        provider: selection.provider,
        kind: selection.kind,
      });
    }
    return selection;
  }

  /** Every configured `provider.kind` whose provider is registered and whose kind is known. */
  async listConfigured(): Promise<Selection<TKind>[]> {
    const namespace = await this.load();
    const out: Selection<TKind>[] = [];
    for (const [provider, block] of Object.entries(namespace)) {
      if (provider === 'default' || !isRecord(block) || !this.registry.has(provider)) continue;
      for (const [kind, params] of Object.entries(block)) {
        if (isRecord(params) && isKindOf(this.spec, kind)) out.push({ provider, kind });
      }
    }
    return out;
  }

  reload(): void {
    this.generation += 1;
    this.namespace = undefined;
    this.loading = undefined;
    this.logger.info('Settings reload requested', { domain: this.domain, source: this.source.describe() });
  }

  private validate(namespace: Namespace, selection: Selection<TKind>): ResolvedConfiguration<TKind> {
    const name = formatSelection(selection);
    const context = { domain: this.domain, provider: selection.provider, kind: selection.kind };
    const block = this.rawBlock(namespace, selection);
    if (!block) {
      throw new ConfigurationNotFoundError(name, this.configuredNames(namespace), context);
    }

    const entry = this.registry.lookup(selection.provider);
    const { params, applied } = applyEnvOverrides(dropNulls(block), entry.envOverrides, this.env);
    const record = validateRecord(entry.definition, params, context);
    this.logger.debug('Settings resolved', { ...context, envOverrides: applied });
    return { provider: selection.provider, kind: selection.kind, selection: name, record };
  }

  private rawBlock(namespace: Namespace, selection: Selection): Record<string, unknown> | undefined {
    const providerBlock = namespace[selection.provider];
    if (!isRecord(providerBlock)) return undefined;
    const block = providerBlock[selection.kind];
    return isRecord(block) ? block : undefined;
  }

  private configuredNames(namespace: Namespace): string[] {
    const names: string[] = [];
    for (const [provider, block] of Object.entries(namespace)) {
      if (provider === 'default' || !isRecord(block)) continue;
      for (const [kind, params] of Object.entries(block)) {
        if (isRecord(params)) names.push(`${provider}.${kind}`);
      }
    }
    return names;
  }

  // Concurrent callers share one load; a failed load leaves nothing cached.
  private load(): Promise<Namespace> {
    if (this.namespace) return Promise.resolve(this.namespace);
    if (this.loading) return this.loading;

    const generation = this.generation;
    const pending = this.readNamespace().then(
      (namespace) => {
        if (generation === this.generation) {
          this.namespace = namespace;
          this.loading = undefined;
        }
        return namespace;
      },
      (err: unknown) => {
        if (generation === this.generation) this.loading = undefined;
        throw err;
      },
    );
    this.loading = pending;
    return pending;
  }

  private async readNamespace(): Promise<Namespace> {
    const origin = this.source.describe();
    const document = await this.source.load();
    if (!isRecord(document)) {
      throw new ConfigurationLoadError(`Configuration document from ${origin} is not a mapping`, {
        source: origin,
        domain: this.domain,
      });
    }
    const namespace = document[this.domain];
    if (!isRecord(namespace)) {
      throw new ConfigurationLoadError(`Configuration from ${origin} has no '${this.domain}' section`, {
        source: origin,
        domain: this.domain,
      });
    }
    this.logger.debug('Settings loaded', { domain: this.domain, source: origin });
    return namespace;
  }
}

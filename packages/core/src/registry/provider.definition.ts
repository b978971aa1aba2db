import type { ParamsParser } from '../config/configuration.record';

export type Domain = 'llm' | 'datasources';

export type ConstructionContext = {
  provider: string;
  kind: string;
  selection: string;
};

/**
 * Everything the core needs to know about one provider: how to validate its parameter block,
 * which environment variables override which fields, how to render constructor arguments and how
 * to build (and release) a client from them.
 *
 * `create` is optional: a provider registered without it can be validated and listed, but
 * requesting a client for it fails with `UnsupportedProviderError`.
 */
export interface ProviderDefinition<TParams extends object = object, TKwargs = unknown, TClient = unknown> {
  readonly id: string;
  readonly domain: Domain;
  readonly parse: ParamsParser<TParams>;
  // field name -> environment variable name; scalar fields only
  readonly envOverrides?: Readonly<Record<string, string>>;
  // npm packages the constructor loads at runtime
  readonly requires?: ReadonlyArray<string>;
  render(params: Readonly<TParams>, kind: string): TKwargs;
  create?(kwargs: TKwargs, context: ConstructionContext): TClient | Promise<TClient>;
  dispose?(client: TClient): void | Promise<void>;
  connectionString?(params: Readonly<TParams>): string;
  describe?(params: Readonly<TParams>): Record<string, unknown>;
}

export function defineProvider<TParams extends object, TKwargs, TClient>(
  definition: ProviderDefinition<TParams, TKwargs, TClient>,
): ProviderDefinition<TParams, TKwargs, TClient> {
  return definition;
}

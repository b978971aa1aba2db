import { beforeEach, describe, expect, it } from 'vitest';
import { ProviderUnavailableError, UnsupportedProviderError } from '../src/common/errors';
import { ClientFactory } from '../src/factory/client.factory';
import { LLM_DOMAIN, type LLMKind } from '../src/llm/llm.types';
import { defineProvider } from '../src/registry/provider.definition';
import { ProviderRegistry } from '../src/registry/provider.registry';
import { SettingsResolver } from '../src/settings/settings.resolver';
import {
  echoProvider,
  MutableSettingsSource,
  newCounters,
  quietLogger,
  tick,
  type EchoClient,
  type EchoCounters,
} from './helpers/fixtures';

const document = () => ({
  llm: {
    default: 'echo.fast',
    echo: {
      fast: { model_name: 'echo-small' },
      smart: { model_name: 'echo-large', slow: true },
      vision: { model_name: 'echo-eyes' },
    },
    bare: { fast: { model_name: 'plain' } },
    gated: { fast: { model_name: 'gated-model' } },
    late: { fast: { model_name: 'late-model' } },
    ghost: { fast: { model_name: 'nobody' } },
  },
});

describe('ClientFactory', () => {
  let counters: EchoCounters;
  let source: MutableSettingsSource;
  let registry: ProviderRegistry<EchoClient>;
  let factory: ClientFactory<EchoClient, LLMKind>;

  beforeEach(() => {
    counters = newCounters();
    source = new MutableSettingsSource(document());
    registry = new ProviderRegistry<EchoClient>('llm', (dep) => dep !== 'absent-sdk');
    registry.register(echoProvider('echo', counters));
    const logger = quietLogger();
    factory = new ClientFactory(new SettingsResolver(LLM_DOMAIN, source, registry, logger, {}), registry, logger);
  });

  it('returns the same client for repeated requests', async () => {
    const first = await factory.getClient('fast', 'echo');
    const second = await factory.getClient('fast', 'echo');
    const viaDefault = await factory.getClient();

    expect(second).toBe(first);
    expect(viaDefault).toBe(first);
    expect(first).toEqual({ serial: 1, provider: 'echo', model: 'echo-small' });
    expect(counters.built).toBe(1);
  });

  it('builds a new client after the cache is cleared and disposes the old one', async () => {
    const first = await factory.getClient('fast');
    await factory.clearCache();
    const second = await factory.getClient('fast');

    expect(second).not.toBe(first);
    expect(counters.built).toBe(2);
    expect(counters.disposed).toBe(1);
    expect(factory.isCached('echo.fast')).toBe(true);
  });

  it('shares one construction between concurrent first requests', async () => {
    const clients = await Promise.all([
      factory.getClient('smart'),
      factory.getClient('smart', 'echo'),
      factory.getClient('smart'),
    ]);

    expect(counters.built).toBe(1);
    expect(clients[1]).toBe(clients[0]);
    expect(clients[2]).toBe(clients[0]);
  });

  it('hands an in-flight construction to its caller when the cache is cleared', async () => {
    await factory.getAvailableModels();
    const pending = factory.getClient('smart');
    await tick(1);
    expect(factory.isCached('echo.smart')).toBe(true);
    expect(counters.built).toBe(0);
    await factory.clearCache();
    expect(factory.isCached('echo.smart')).toBe(false);

    const detached = await pending;
    expect(detached).toMatchObject({ serial: 1, model: 'echo-large' });
    expect(counters.disposed).toBe(0);

    const fresh = await factory.getClient('smart');
    expect(fresh).not.toBe(detached);
    expect(counters.built).toBe(2);

    await factory.clearCache();
    expect(counters.disposed).toBe(1);
  });

  it('does not cache a failed construction', async () => {
    counters.failNext = true;
    await expect(factory.getClient('vision')).rejects.toThrow('handshake refused');
    expect(factory.isCached('echo.vision')).toBe(false);

    await expect(factory.getClient('vision')).resolves.toEqual({ serial: 1, provider: 'echo', model: 'echo-eyes' });
  });

  it('raises UnsupportedProviderError for a provider without a constructor', async () => {
    registry.register(
      defineProvider<{ model_name: string }, string, EchoClient>({
        id: 'bare',
        domain: 'llm',
        parse: (raw) =>
          typeof raw.model_name === 'string'
            ? { success: true, data: { model_name: raw.model_name } }
            : { success: false, issues: [{ field: 'model_name', reason: 'is required' }] },
        render: (params) => params.model_name,
      }),
    );

    await expect(factory.getClient('fast', 'bare')).rejects.toThrow(
      new UnsupportedProviderError('bare', {}).message,
    );
    expect(factory.isCached('bare.fast')).toBe(false);
  });

  it('raises ProviderUnavailableError when a required package is missing', async () => {
    registry.register(echoProvider('gated', counters, { requires: ['absent-sdk'] }));

    const error = await factory.getClient('fast', 'gated').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({ dependency: 'absent-sdk', installHint: 'npm install absent-sdk' });
    expect(counters.built).toBe(0);
  });

  it('maps a module-not-found error thrown during construction', async () => {
    registry.register({
      ...echoProvider('late', counters, { requires: ['late-sdk'] }),
      create() {
        throw Object.assign(new Error("Cannot find package 'late-sdk' imported from /app/index.js"), {
          code: 'ERR_MODULE_NOT_FOUND',
        });
      },
    });

    const error = await factory.getClient('fast', 'late').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({ dependency: 'late-sdk', code: 'provider_unavailable' });
  });

  it('re-reads configuration on reloadSettings', async () => {
    const before = await factory.getClient('fast');

    const changed = document();
    changed.llm.echo.fast.model_name = 'echo-medium';
    source.document = changed;
    await factory.reloadSettings();

    const after = await factory.getClient('fast');
    expect(before.model).toBe('echo-small');
    expect(after.model).toBe('echo-medium');
    expect(counters.disposed).toBe(1);
  });

  it('reports providers and configured models', async () => {
    registry.register(echoProvider('gated', counters, { requires: ['absent-sdk'] }));

    expect(factory.getSupportedProviders()).toEqual(new Set(['echo', 'gated']));
    expect(factory.getProviderStatus()).toEqual([
      { provider: 'echo', constructible: true, available: true },
      { provider: 'gated', constructible: true, available: false, missingDependency: 'absent-sdk' },
    ]);
    await expect(factory.getAvailableModels()).resolves.toEqual([
      { provider: 'echo', kind: 'fast' },
      { provider: 'echo', kind: 'smart' },
      { provider: 'echo', kind: 'vision' },
      { provider: 'gated', kind: 'fast' },
    ]);
  });

  it('registers providers through the factory', async () => {
    factory.registerProvider(echoProvider('ghost', counters));
    await expect(factory.getClient('fast', 'ghost')).resolves.toMatchObject({ provider: 'ghost', model: 'nobody' });
  });
});

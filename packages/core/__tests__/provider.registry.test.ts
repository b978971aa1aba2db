import { describe, expect, it } from 'vitest';
import { RegistryConflictError, UnknownProviderError } from '../src/common/errors';
import { DatasourceProviderRegistry } from '../src/datasource/datasourceProvider.registry';
import { builtinDatasourceProviders } from '../src/datasource/providers';
import { LLMProviderRegistry } from '../src/llm/llmProvider.registry';
import { builtinLLMProviders } from '../src/llm/providers';
import { ProviderRegistry } from '../src/registry/provider.registry';
import { echoProvider, newCounters, type EchoClient } from './helpers/fixtures';

describe('ProviderRegistry', () => {
  it('rejects a duplicate id unless replace is set', () => {
    const registry = new ProviderRegistry<EchoClient>('llm', () => true);
    const first = echoProvider('echo', newCounters());
    const second = echoProvider('echo', newCounters());
    registry.register(first);

    expect(() => registry.register(second)).toThrow(RegistryConflictError);
    expect(registry.lookup('echo').definition).toBe(first);

    registry.register(second, { replace: true });
    expect(registry.lookup('echo').definition).toBe(second);
  });

  it('rejects a definition that belongs to another domain', () => {
    const registry = new ProviderRegistry<EchoClient>('datasources', () => true);
    expect(() => registry.register(echoProvider('echo', newCounters()))).toThrow(
      "Cannot register datasources provider 'echo': definition targets the 'llm' domain",
    );
  });

  it('raises UnknownProviderError listing registered ids', () => {
    const registry = new ProviderRegistry<EchoClient>('llm', () => true);
    registry.register(echoProvider('echo', newCounters()));

    expect(() => registry.lookup('nope')).toThrow(UnknownProviderError);
    expect(() => registry.lookup('nope')).toThrow("Unknown llm provider 'nope'. Registered: echo");
  });

  it('records missing optional dependencies at registration', () => {
    const probed: string[] = [];
    const registry = new ProviderRegistry<EchoClient>('llm', (dep) => {
      probed.push(dep);
      return dep !== 'absent-sdk';
    });
    registry.register(echoProvider('ready', newCounters(), { requires: ['present-sdk'] }));
    registry.register(echoProvider('blocked', newCounters(), { requires: ['present-sdk', 'absent-sdk'] }));

    expect(probed).toEqual(['present-sdk', 'present-sdk', 'absent-sdk']);
    expect(registry.status('ready')).toEqual({ provider: 'ready', constructible: true, available: true });
    expect(registry.status('blocked')).toEqual({
      provider: 'blocked',
      constructible: true,
      available: false,
      missingDependency: 'absent-sdk',
    });
  });

  it('freezes the environment override map', () => {
    const registry = new ProviderRegistry<EchoClient>('llm', () => true);
    const entry = registry.register(echoProvider('echo', newCounters(), { envOverrides: { model_name: 'ECHO_MODEL' } }));
    expect(Object.isFrozen(entry.envOverrides)).toBe(true);
    expect(entry.envOverrides).toEqual({ model_name: 'ECHO_MODEL' });
  });

  it('ships the built-in providers for both domains', () => {
    expect(new LLMProviderRegistry().ids()).toEqual(['openai', 'azure_openai', 'anthropic', 'huggingface', 'aws_bedrock']);
    expect(new DatasourceProviderRegistry().ids()).toEqual([
      'postgresql',
      'mysql',
      'aws_rds_postgresql',
      'aws_rds_mysql',
      'sqlite',
      'azure_sql',
    ]);
    for (const [id, definition] of Object.entries({ ...builtinLLMProviders, ...builtinDatasourceProviders })) {
      expect(definition.id).toBe(id);
    }
    const llm = new LLMProviderRegistry();
    expect(llm.status('aws_bedrock').constructible).toBe(false);
    expect(llm.status('openai')).toEqual({ provider: 'openai', constructible: true, available: true });
  });
});

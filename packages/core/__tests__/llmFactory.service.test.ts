import { Embeddings, LLM } from '@switchyard/llm';
import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidSelectionError, UnsupportedProviderError } from '../src/common/errors';
import { LLMFactoryService } from '../src/llm/llmFactory.service';
import { LLMProviderRegistry } from '../src/llm/llmProvider.registry';
import { LLMSettingsResolver } from '../src/llm/llmSettings.resolver';
import { StaticSettingsSource } from '../src/settings/settings.source';
import { quietLogger } from './helpers/fixtures';

const document = {
  llm: {
    default: 'openai.fast',
    openai: {
      fast: { model_name: 'gpt-4o-mini', api_key: 'test-secret' },
      embedding: { model_name: 'text-embedding-3-small', api_key: 'test-secret', dimensions: 256 },
    },
    anthropic: {
      fast: { model_name: 'claude-3-5-haiku-latest', api_key: 'test-secret' },
    },
    huggingface: {
      embedding: { endpoint_url: 'http://tei.local:8080', task: 'feature-extraction', model_name: 'bge-small' },
    },
    aws_bedrock: {
      fast: { model_name: 'anthropic.claude-3-haiku', region_name: 'eu-west-1' },
    },
  },
};

describe('LLMFactoryService', () => {
  let factory: LLMFactoryService;

  beforeEach(() => {
    const registry = new LLMProviderRegistry();
    const logger = quietLogger();
    const settings = new LLMSettingsResolver(new StaticSettingsSource(document), registry, logger, {});
    factory = new LLMFactoryService(settings, registry, logger);
  });

  it('returns the default chat model and caches it', async () => {
    const llm = await factory.getLLM();

    expect(llm).toBeInstanceOf(LLM);
    expect(llm.model).toBe('gpt-4o-mini');
    expect(await factory.getLLM('fast', 'openai')).toBe(llm);
  });

  it('refuses to hand out an embeddings client as a chat model', async () => {
    await expect(factory.getLLM('embedding')).rejects.toThrow(
      new InvalidSelectionError('openai.embedding', 'resolves to an embeddings model, not a chat model').message,
    );
  });

  it('returns embeddings clients per provider', async () => {
    const openai = await factory.getEmbeddings();
    const hf = await factory.getEmbeddings('huggingface');

    expect(openai).toBeInstanceOf(Embeddings);
    expect(openai.model).toBe('text-embedding-3-small');
    expect(hf.provider).toBe('huggingface');
  });

  it('raises UnsupportedProviderError for configuration-only providers', async () => {
    await expect(factory.getLLM('fast', 'aws_bedrock')).rejects.toBeInstanceOf(UnsupportedProviderError);
  });

  it('groups configured models by provider and by kind', async () => {
    await expect(factory.getModelsByProvider('openai')).resolves.toEqual(['fast', 'embedding']);
    await expect(factory.getModelsByKind('fast')).resolves.toEqual(['openai', 'anthropic', 'aws_bedrock']);
    await expect(factory.getModelsByKind('vision')).resolves.toEqual([]);
  });
});

import { AnthropicChatModel, type AnthropicDefaults } from '@switchyard/llm';
import { z } from 'zod';
import { UnsupportedProviderError } from '../../common/errors';
import { zodParams } from '../../config/configuration.record';
import { integer, secret, url } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { LLMClient } from '../llm.types';
import { clientTimeouts, modelShape, type ClientTimeouts } from './base';

export const anthropicParamsSchema = z.strictObject({
  ...modelShape,
  max_tokens: integer({ positive: true }).default(1024),
  api_key: secret(),
  base_url: url().optional(),
});

export type AnthropicParams = z.infer<typeof anthropicParamsSchema>;

export type AnthropicKwargs = {
  client: ClientTimeouts & { apiKey: string; baseURL?: string };
  model: AnthropicDefaults;
};

export const anthropicProvider = defineProvider<AnthropicParams, AnthropicKwargs, LLMClient>({
  id: 'anthropic',
  domain: 'llm',
  parse: zodParams(anthropicParamsSchema),
  envOverrides: { api_key: 'ANTHROPIC_API_KEY' },
  requires: ['@anthropic-ai/sdk'],
  render(params) {
    const kwargs: AnthropicKwargs = {
      client: { apiKey: params.api_key, ...clientTimeouts(params) },
      model: { model: params.model_name, maxTokens: params.max_tokens, temperature: params.temperature },
    };
    if (params.base_url !== undefined) kwargs.client.baseURL = params.base_url;
    return kwargs;
  },
  async create(kwargs, { provider, kind, selection }) {
    if (kind === 'embedding') {
      throw new UnsupportedProviderError(provider, { domain: 'llm', kind, selection }, 'has no embeddings model');
    }
    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    return new AnthropicChatModel(new Anthropic(kwargs.client), kwargs.model);
  },
});

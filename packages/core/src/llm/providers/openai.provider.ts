import { Embeddings, LLM, type ChatModelDefaults } from '@switchyard/llm';
import OpenAI from 'openai';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { integer, secret, text, url } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { LLMClient } from '../llm.types';
import { clientTimeouts, modelDefaults, modelShape, type ClientTimeouts } from './base';

export const openAIParamsSchema = z.strictObject({
  ...modelShape,
  api_key: secret(),
  organization: text().optional(),
  base_url: url().optional(),
  dimensions: integer({ positive: true }).optional(),
});

export type OpenAIParams = z.infer<typeof openAIParamsSchema>;

export type OpenAIKwargs = {
  client: ClientTimeouts & { apiKey: string; organization?: string; baseURL?: string };
  model: ChatModelDefaults;
  embedding?: { model: string; dimensions?: number };
};

export const openAIProvider = defineProvider<OpenAIParams, OpenAIKwargs, LLMClient>({
  id: 'openai',
  domain: 'llm',
  parse: zodParams(openAIParamsSchema),
  envOverrides: {
    api_key: 'OPENAI_API_KEY',
    organization: 'OPENAI_ORGANIZATION',
    base_url: 'OPENAI_BASE_URL',
  },
  render(params, kind) {
    const kwargs: OpenAIKwargs = {
      client: { apiKey: params.api_key, ...clientTimeouts(params) },
      model: modelDefaults(params),
    };
    if (params.organization !== undefined) kwargs.client.organization = params.organization;
    if (params.base_url !== undefined) kwargs.client.baseURL = params.base_url;
    if (kind === 'embedding') kwargs.embedding = { model: params.model_name, dimensions: params.dimensions };
    return kwargs;
  },
  create(kwargs, { provider }) {
    const client = new OpenAI(kwargs.client);
    if (kwargs.embedding) return new Embeddings(client, kwargs.embedding, provider);
    return new LLM(client, kwargs.model, provider);
  },
});

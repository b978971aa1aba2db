import { Embeddings, LLM, type ChatModelDefaults } from '@switchyard/llm';
import { AzureOpenAI } from 'openai';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { integer, number, secret, text, url } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { LLMClient } from '../llm.types';
import { clientTimeouts, modelDefaults, modelShape, type ClientTimeouts } from './base';

export const azureOpenAIParamsSchema = z.strictObject({
  ...modelShape,
  api_key: secret(),
  endpoint: url(),
  api_version: text().default('2024-02-15-preview'),
  top_p: number({ min: 0, max: 1 }).default(1),
  frequency_penalty: number({ min: -2, max: 2 }).default(0),
  presence_penalty: number({ min: -2, max: 2 }).default(0),
  dimensions: integer({ positive: true }).optional(),
});

export type AzureOpenAIParams = z.infer<typeof azureOpenAIParamsSchema>;

export type AzureOpenAIKwargs = {
  // `model_name` is the deployment name on Azure
  client: ClientTimeouts & { apiKey: string; endpoint: string; apiVersion: string; deployment: string };
  model: ChatModelDefaults;
  embedding?: { model: string; dimensions?: number };
};

export const azureOpenAIProvider = defineProvider<AzureOpenAIParams, AzureOpenAIKwargs, LLMClient>({
  id: 'azure_openai',
  domain: 'llm',
  parse: zodParams(azureOpenAIParamsSchema),
  envOverrides: {
    api_key: 'AZURE_OPENAI_API_KEY',
    endpoint: 'AZURE_OPENAI_ENDPOINT',
    api_version: 'AZURE_OPENAI_API_VERSION',
  },
  render(params, kind) {
    const kwargs: AzureOpenAIKwargs = {
      client: {
        apiKey: params.api_key,
        endpoint: params.endpoint,
        apiVersion: params.api_version,
        deployment: params.model_name,
        ...clientTimeouts(params),
      },
      model: modelDefaults(params),
    };
    if (kind === 'embedding') kwargs.embedding = { model: params.model_name, dimensions: params.dimensions };
    return kwargs;
  },
  create(kwargs, { provider }) {
    const client = new AzureOpenAI(kwargs.client);
    if (kwargs.embedding) return new Embeddings(client, kwargs.embedding, provider);
    return new LLM(client, kwargs.model, provider);
  },
});

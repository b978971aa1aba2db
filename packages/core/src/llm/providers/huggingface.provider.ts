import { Embeddings, LLM, type ChatModelDefaults } from '@switchyard/llm';
import OpenAI from 'openai';
import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { oneOf, secret, text, url } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { LLMClient } from '../llm.types';
import { clientTimeouts, modelDefaults, modelShape, type ClientTimeouts } from './base';

export const HF_TASKS = ['text-generation', 'feature-extraction'] as const;

// Self-hosted inference endpoints (TGI for generation, TEI for embeddings) expose an
// OpenAI-compatible API under /v1.
export const huggingFaceParamsSchema = z.strictObject({
  ...modelShape,
  model_name: text().default('tgi'),
  endpoint_url: url(),
  api_token: secret().optional(),
  task: oneOf(HF_TASKS).default('text-generation'),
});

export type HuggingFaceParams = z.infer<typeof huggingFaceParamsSchema>;

export type HuggingFaceKwargs = {
  client: ClientTimeouts & { apiKey: string; baseURL: string };
  task: (typeof HF_TASKS)[number];
  model: ChatModelDefaults;
};

// The OpenAI client refuses an empty key; unauthenticated endpoints ignore this one.
const ANONYMOUS_TOKEN = 'anonymous';

export const huggingFaceProvider = defineProvider<HuggingFaceParams, HuggingFaceKwargs, LLMClient>({
  id: 'huggingface',
  domain: 'llm',
  parse: zodParams(huggingFaceParamsSchema),
  envOverrides: { api_token: 'HF_TOKEN', endpoint_url: 'HF_INFERENCE_ENDPOINT' },
  render(params) {
    return {
      client: {
        apiKey: params.api_token ?? ANONYMOUS_TOKEN,
        baseURL: `${params.endpoint_url}/v1`,
        ...clientTimeouts(params),
      },
      task: params.task,
      model: modelDefaults(params),
    };
  },
  create(kwargs, { provider }) {
    const client = new OpenAI(kwargs.client);
    if (kwargs.task === 'feature-extraction') {
      return new Embeddings(client, { model: kwargs.model.model }, provider);
    }
    return new LLM(client, kwargs.model, provider);
  },
});

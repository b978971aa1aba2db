import type { ChatModelDefaults } from '@switchyard/llm';
import { integer, number, text } from '../../config/fields';

// Fields shared by every model provider.
export const modelShape = {
  model_name: text(),
  temperature: number({ min: 0, max: 2 }).default(0.7),
  max_tokens: integer({ positive: true }).optional(),
  // seconds
  timeout: number({ positive: true }).default(30),
  max_retries: integer({ min: 0 }).default(3),
};

export type ModelParams = {
  model_name: string;
  temperature: number;
  max_tokens?: number;
  timeout: number;
  max_retries: number;
  top_p?: number;
};

export type ClientTimeouts = {
  // milliseconds, as the SDKs take it
  timeout: number;
  maxRetries: number;
};

export function clientTimeouts(params: ModelParams): ClientTimeouts {
  return { timeout: Math.round(params.timeout * 1000), maxRetries: params.max_retries };
}

export function modelDefaults(params: ModelParams): ChatModelDefaults {
  const defaults: ChatModelDefaults = { model: params.model_name, temperature: params.temperature };
  if (params.max_tokens !== undefined) defaults.maxOutputTokens = params.max_tokens;
  if (params.top_p !== undefined) defaults.topP = params.top_p;
  return defaults;
}

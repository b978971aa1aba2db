import { z } from 'zod';
import { zodParams } from '../../config/configuration.record';
import { secret, text } from '../../config/fields';
import { defineProvider } from '../../registry/provider.definition';
import type { LLMClient } from '../llm.types';
import { modelShape } from './base';

export const awsBedrockParamsSchema = z.strictObject({
  ...modelShape,
  region_name: text().default('us-east-1'),
  aws_access_key_id: secret().optional(),
  aws_secret_access_key: secret().optional(),
  aws_session_token: secret().optional(),
});

export type AwsBedrockParams = z.infer<typeof awsBedrockParamsSchema>;

export type AwsBedrockKwargs = {
  modelId: string;
  region: string;
  credentials?: { accessKeyId: string; secretAccessKey: string; sessionToken?: string };
  inferenceConfig: { temperature: number; maxTokens?: number };
};

// Validated and listed, but no client is wired: requesting one raises UnsupportedProviderError.
export const awsBedrockProvider = defineProvider<AwsBedrockParams, AwsBedrockKwargs, LLMClient>({
  id: 'aws_bedrock',
  domain: 'llm',
  parse: zodParams(awsBedrockParamsSchema),
  envOverrides: {
    aws_access_key_id: 'AWS_ACCESS_KEY_ID',
    aws_secret_access_key: 'AWS_SECRET_ACCESS_KEY',
    aws_session_token: 'AWS_SESSION_TOKEN',
    region_name: 'AWS_DEFAULT_REGION',
  },
  render(params) {
    const kwargs: AwsBedrockKwargs = {
      modelId: params.model_name,
      region: params.region_name,
      inferenceConfig: { temperature: params.temperature, maxTokens: params.max_tokens },
    };
    if (params.aws_access_key_id && params.aws_secret_access_key) {
      kwargs.credentials = {
        accessKeyId: params.aws_access_key_id,
        secretAccessKey: params.aws_secret_access_key,
        sessionToken: params.aws_session_token,
      };
    }
    return kwargs;
  },
});

import type { ProviderDefinition } from '../../registry/provider.definition';
import type { ProviderRegistry } from '../../registry/provider.registry';
import { BUILTIN_LLM_PROVIDERS, type BuiltinLLMProvider, type LLMClient } from '../llm.types';
import { anthropicProvider } from './anthropic.provider';
import { awsBedrockProvider } from './awsBedrock.provider';
import { azureOpenAIProvider } from './azureOpenai.provider';
import { huggingFaceProvider } from './huggingface.provider';
import { openAIProvider } from './openai.provider';

export { anthropicProvider, awsBedrockProvider, azureOpenAIProvider, huggingFaceProvider, openAIProvider };

export const builtinLLMProviders: Record<BuiltinLLMProvider, ProviderDefinition<object, unknown, LLMClient>> = {
  openai: openAIProvider,
  azure_openai: azureOpenAIProvider,
  anthropic: anthropicProvider,
  huggingface: huggingFaceProvider,
  aws_bedrock: awsBedrockProvider,
};

export function registerBuiltinLLMProviders(registry: ProviderRegistry<LLMClient>): void {
  for (const id of BUILTIN_LLM_PROVIDERS) registry.register(builtinLLMProviders[id]);
}

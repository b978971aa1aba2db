import type { ChatModel, Embeddings } from '@switchyard/llm';
import type { DomainSpec } from '../settings/domain';

export const LLM_KINDS = ['fast', 'smart', 'embedding', 'vision'] as const;
export type LLMKind = (typeof LLM_KINDS)[number];

export const BUILTIN_LLM_PROVIDERS = ['openai', 'azure_openai', 'anthropic', 'huggingface', 'aws_bedrock'] as const;
export type BuiltinLLMProvider = (typeof BUILTIN_LLM_PROVIDERS)[number];

export const LLM_DOMAIN: DomainSpec<LLMKind> = { name: 'llm', kinds: LLM_KINDS };

export type LLMClient = ChatModel | Embeddings;

export { LLM } from './llm';
export type { ResponsesClient, ResponsesRequest, ResponsesResult } from './llm';
export { AnthropicChatModel } from './anthropicChatModel';
export type { AnthropicDefaults, MessagesClient, MessagesRequest, MessagesResult } from './anthropicChatModel';
export { Embeddings } from './embeddings';
export type { EmbeddingsClient, EmbeddingsDefaults, EmbeddingsRequest, EmbeddingsResult } from './embeddings';
export { toMessages } from './chatModel';
export type { ChatCallParams, ChatMessage, ChatModel, ChatModelDefaults, ChatResult, ChatRole, ChatUsage } from './chatModel';

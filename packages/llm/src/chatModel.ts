export type ChatRole = 'system' | 'developer' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type ChatResult = {
  text: string;
  model: string;
  usage?: ChatUsage;
};

export type ChatCallParams = {
  input: string | ChatMessage[];
  instructions?: string;
  // Per-call overrides of the model defaults
  temperature?: number;
  maxOutputTokens?: number;
};

/**
 * Provider-neutral chat capability handed out by the client factory.
 * Implementations wrap an SDK client and the model parameters rendered from configuration.
 */
export interface ChatModel {
  readonly provider: string;
  readonly model: string;
  call(params: ChatCallParams): Promise<ChatResult>;
}

export type ChatModelDefaults = {
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
};

export function toMessages(input: string | ChatMessage[]): ChatMessage[] {
  if (typeof input === 'string') return [{ role: 'user', content: input }];
  return input;
}

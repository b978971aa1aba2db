import type { ChatCallParams, ChatModel, ChatResult } from './chatModel';
import { toMessages } from './chatModel';

export type MessagesRequest = {
  model: string;
  max_tokens: number;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  system?: string;
  temperature?: number;
  top_p?: number;
};

export type MessagesResult = {
  model: string;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
};

export interface MessagesClient {
  messages: {
    create(body: MessagesRequest): Promise<MessagesResult>;
  };
}

export type AnthropicDefaults = {
  model: string;
  maxTokens: number;
  temperature?: number;
  topP?: number;
};

// Anthropic takes system text as a request field, so system/developer turns are folded into it.
export class AnthropicChatModel implements ChatModel {
  readonly provider = 'anthropic';

  constructor(
    private client: MessagesClient,
    private defaults: AnthropicDefaults,
  ) {}

  get model(): string {
    return this.defaults.model;
  }

  async call(params: ChatCallParams): Promise<ChatResult> {
    const system: string[] = params.instructions ? [params.instructions] : [];
    const messages: MessagesRequest['messages'] = [];
    for (const m of toMessages(params.input)) {
      if (m.role === 'system' || m.role === 'developer') system.push(m.content);
      else messages.push({ role: m.role, content: m.content });
    }

    const request: MessagesRequest = {
      model: this.defaults.model,
      max_tokens: params.maxOutputTokens ?? this.defaults.maxTokens,
      messages,
    };
    if (system.length) request.system = system.join('\n\n');
    const temperature = params.temperature ?? this.defaults.temperature;
    if (temperature !== undefined) request.temperature = temperature;
    if (this.defaults.topP !== undefined) request.top_p = this.defaults.topP;

    const response = await this.client.messages.create(request);
    const text = response.content
      .map((block) => (block.type === 'text' ? (block.text ?? '') : ''))
      .join('');

    return {
      text,
      model: response.model,
      usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
    };
  }
}

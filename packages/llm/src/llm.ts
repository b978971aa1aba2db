import type { ChatCallParams, ChatModel, ChatModelDefaults, ChatResult, ChatRole } from './chatModel';
import { toMessages } from './chatModel';

export type ResponsesRequest = {
  model: string;
  input: Array<{ role: ChatRole; content: string }>;
  instructions?: string;
  temperature?: number;
  max_output_tokens?: number;
  top_p?: number;
};

export type ResponsesResult = {
  output_text: string;
  model: string;
  usage?: { input_tokens: number; output_tokens: number } | null;
};

// Subset of the OpenAI SDK client used here; OpenAI and AzureOpenAI both satisfy it.
export interface ResponsesClient {
  responses: {
    create(body: ResponsesRequest): Promise<ResponsesResult>;
  };
}

export class LLM implements ChatModel {
  constructor(
    private openAI: ResponsesClient,
    private defaults: ChatModelDefaults,
    readonly provider: string = 'openai',
  ) {}

  get model(): string {
    return this.defaults.model;
  }

  async call(params: ChatCallParams): Promise<ChatResult> {
    const request: ResponsesRequest = {
      model: this.defaults.model,
      input: toMessages(params.input).map((m) => ({ role: m.role, content: m.content })),
    };
    if (params.instructions !== undefined) request.instructions = params.instructions;

    const temperature = params.temperature ?? this.defaults.temperature;
    if (temperature !== undefined) request.temperature = temperature;
    const maxOutputTokens = params.maxOutputTokens ?? this.defaults.maxOutputTokens;
    if (maxOutputTokens !== undefined) request.max_output_tokens = maxOutputTokens;
    if (this.defaults.topP !== undefined) request.top_p = this.defaults.topP;

    const response = await this.openAI.responses.create(request);

    return {
      text: response.output_text,
      model: response.model,
      usage: response.usage
        ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
        : undefined,
    };
  }
}

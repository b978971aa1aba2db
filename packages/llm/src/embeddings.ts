export type EmbeddingsRequest = {
  model: string;
  input: string | string[];
  dimensions?: number;
};

export type EmbeddingsResult = {
  data: Array<{ embedding: number[]; index: number }>;
};

export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingsRequest): Promise<EmbeddingsResult>;
  };
}

export type EmbeddingsDefaults = {
  model: string;
  dimensions?: number;
};

export class Embeddings {
  constructor(
    private client: EmbeddingsClient,
    private defaults: EmbeddingsDefaults,
    readonly provider: string = 'openai',
  ) {}

  get model(): string {
    return this.defaults.model;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([text]);
    return vector ?? [];
  }

  // Vectors are returned in input order regardless of the order the API lists them.
  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    const request: EmbeddingsRequest = { model: this.defaults.model, input: texts };
    if (this.defaults.dimensions !== undefined) request.dimensions = this.defaults.dimensions;
    const response = await this.client.embeddings.create(request);
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}

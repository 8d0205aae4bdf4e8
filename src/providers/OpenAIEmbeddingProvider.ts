import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  /** Default text-embedding-3-small. */
  model?: string;
  /** Must match the vector column on historical_cases. Default 1536. */
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly dimensions: number;
  private readonly model: string;
  private readonly client: OpenAI;

  constructor({ apiKey, model = 'text-embedding-3-small', dimensions = 1536 }: OpenAIEmbeddingProviderOptions) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
    this.dimensions = dimensions;
  }

  async generate(text: string): Promise<number[]> {
    const { data } = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimensions,
    });

    const vector = data[0]?.embedding;
    if (!vector) throw new Error('OpenAI returned no embedding');
    return vector;
  }
}

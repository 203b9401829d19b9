import OpenAI from 'openai';
import { MatchError } from './errors.js';
import type { Embedder, EmbeddingSettings } from './types.js';

/** Query embeddings from any OpenAI-compatible `/embeddings` endpoint */
export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;

  constructor(private settings: EmbeddingSettings) {
    this.client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl });
  }

  async embed(text: string, dimensions: number): Promise<number[]> {
    const response = await this.client.embeddings
      .create({
        model: this.settings.model,
        input: text,
        dimensions,
        encoding_format: 'float',
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        throw new MatchError(`Embedding request failed: ${message}`, { cause: err });
      });

    const embedding = response.data[0]?.embedding;
    if (!Array.isArray(embedding) || embedding.length === 0) {
      throw new MatchError(`Embedding response for model "${this.settings.model}" contained no vector`);
    }
    return embedding;
  }
}

import type OpenAI from 'openai';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { EmbeddingServiceError } from '../../utils/errors.js';
import { EmbeddingClientFactory } from './EmbeddingClientFactory.js';
import type { TextEmbedder } from './TextEmbedder.interface.js';

export class EmbeddingService implements TextEmbedder {
  readonly model: string;
  private client: OpenAI;

  constructor(client?: OpenAI) {
    this.client = client ?? EmbeddingClientFactory.getClient();
    this.model = config.embedding.model;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (texts.some(t => t.trim().length === 0)) {
      throw new EmbeddingServiceError('Cannot embed empty text');
    }

    try {
      logger.debug({ count: texts.length }, 'Generating embeddings');

      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        ...(config.embedding.dimension ? { dimensions: config.embedding.dimension } : {}),
      });

      // The API may return items out of order; index says where each belongs.
      const embeddings = [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
      if (embeddings.length !== texts.length) {
        throw new Error(`Embedding count mismatch: ${embeddings.length} embeddings for ${texts.length} texts`);
      }

      logger.debug({ count: embeddings.length, dimension: embeddings[0]?.length }, 'Generated embeddings');
      return embeddings;
    } catch (error) {
      logger.error({ error, count: texts.length }, 'Failed to generate embeddings');
      throw new EmbeddingServiceError('Embedding generation failed', error);
    }
  }
}

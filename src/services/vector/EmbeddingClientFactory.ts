import OpenAI from 'openai';
import { config } from '../../config/index.js';

export class EmbeddingClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    const { apiKey, endpoint, apiVersion, model, timeoutMs } = config.embedding;

    this.instance = endpoint
      ? new OpenAI({
          apiKey,
          baseURL: `${endpoint.replace(/\/$/, '')}/openai/deployments/${model}`,
          defaultQuery: { 'api-version': apiVersion },
          defaultHeaders: { 'api-key': apiKey },
          timeout: timeoutMs,
          maxRetries: 2,
        })
      : new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 2 });

    return this.instance;
  }
}

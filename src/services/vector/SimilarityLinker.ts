import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { IncidentRecord } from '../../domain/entities/Incident.js';
import type { ExcludedIncident, SimilarityLink } from '../../domain/entities/SimilarityLink.js';
import type { TextEmbedder } from './TextEmbedder.interface.js';
import { cosineSimilarity } from './similarity.js';

const logger = createLogger('linker');

export interface SimilarityOptions {
  threshold: number;
  batchSize: number;
  /** Expected vector length; the first embedding decides when unset */
  dimension?: number;
}

export interface EmbeddedIncident {
  incidentId: string;
  vector: number[];
}

export interface LinkResult {
  links: SimilarityLink[];
  excluded: ExcludedIncident[];
  /** Number of pairs compared */
  comparisons: number;
}

export class SimilarityLinker {
  private options: SimilarityOptions;

  constructor(
    private embedder: TextEmbedder,
    options: Partial<SimilarityOptions> = {}
  ) {
    this.options = {
      threshold: config.similarity.threshold,
      batchSize: config.embedding.batchSize,
      dimension: config.embedding.dimension,
      ...options,
    };
  }

  get method(): string {
    return `cosine:${this.embedder.model}`;
  }

  async link(records: IncidentRecord[]): Promise<LinkResult> {
    const { embedded, excluded } = await this.embedAll(records);
    const links = this.pairLinks(embedded);
    const comparisons = (embedded.length * (embedded.length - 1)) / 2;

    logger.info(
      { incidents: records.length, embedded: embedded.length, excluded: excluded.length, comparisons, links: links.length },
      'Similarity linking complete'
    );
    return { links, excluded, comparisons };
  }

  /** Every pair i < j at or above the threshold, in input order */
  pairLinks(embedded: EmbeddedIncident[]): SimilarityLink[] {
    const { threshold } = this.options;
    const links: SimilarityLink[] = [];

    for (let i = 0; i < embedded.length; i++) {
      for (let j = i + 1; j < embedded.length; j++) {
        if (embedded[i].incidentId === embedded[j].incidentId) continue;
        const score = cosineSimilarity(embedded[i].vector, embedded[j].vector);
        if (score >= threshold) {
          links.push({
            incidentA: embedded[i].incidentId,
            incidentB: embedded[j].incidentId,
            score,
            threshold,
            method: this.method,
          });
        }
      }
    }
    return links;
  }

  async embedAll(records: IncidentRecord[]): Promise<{ embedded: EmbeddedIncident[]; excluded: ExcludedIncident[] }> {
    const embedded: EmbeddedIncident[] = [];
    const excluded: ExcludedIncident[] = [];
    let expectedDimension = this.options.dimension;

    const exclude = (record: IncidentRecord, reason: string) => {
      logger.warn({ incidentId: record.incidentId, reason }, 'Excluding incident from similarity comparison');
      excluded.push({ incidentId: record.incidentId, reason });
    };

    const accept = (record: IncidentRecord, vector: number[]) => {
      expectedDimension ??= vector.length;
      if (vector.length === 0 || vector.length !== expectedDimension) {
        exclude(record, `embedding has dimension ${vector.length}, expected ${expectedDimension}`);
        return;
      }
      embedded.push({ incidentId: record.incidentId, vector });
    };

    for (let start = 0; start < records.length; start += this.options.batchSize) {
      const batch = records.slice(start, start + this.options.batchSize);

      const vectors = await this.embedBatch(batch.map(r => r.narrative)).catch((error: unknown) => {
        logger.warn(
          { batchStart: start, size: batch.length, error: errorMessage(error) },
          'Embedding batch failed, retrying one narrative at a time'
        );
        return null;
      });

      if (vectors) {
        batch.forEach((record, i) => accept(record, vectors[i]));
        continue;
      }

      for (const record of batch) {
        try {
          const [vector] = await this.embedBatch([record.narrative]);
          accept(record, vector);
        } catch (error) {
          exclude(record, `embedding service failure: ${errorMessage(error)}`);
        }
      }
    }

    return { embedded, excluded };
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors = await this.embedder.generateEmbeddings(texts);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding count mismatch: ${vectors.length} embeddings for ${texts.length} texts`);
    }
    return vectors;
  }
}

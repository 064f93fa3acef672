import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import type { MentionKind } from '../../domain/entities/EntityMention.js';
import type { ResolutionAmbiguity } from '../../domain/entities/CanonicalEntity.js';
import type { ExcludedIncident, SimilarityLink } from '../../domain/entities/SimilarityLink.js';
import type { GraphRepository, WriteCounters } from '../graph/GraphRepository.interface.js';
import { GraphUpsertEngine, type UpsertProgress, type UpsertReport } from '../graph/GraphUpsertEngine.js';
import type { TextEmbedder } from '../vector/TextEmbedder.interface.js';
import { SimilarityLinker } from '../vector/SimilarityLinker.js';
import { writeLinkedIncidents } from '../storage/LinkedIncidentsWriter.js';
import { CfrReference } from '../reference/CfrReference.js';
import { RecordValidator, type RecordLine, type RejectedRecord } from './RecordValidator.js';
import { EntityResolver, countByKind } from './EntityResolver.js';

const logger = createLogger('orchestrator');

export interface BuildOptions {
  threshold: number;
  scorePrecision: number;
  upsertConcurrency: number;
  embeddingBatchSize: number;
  /** Where to write the linked-incidents CSV; nothing is written when null */
  outputPath: string | null;
  onUpsertProgress?: (progress: UpsertProgress) => void;
}

export interface BuildResult {
  runId: string;
  processingTime: string;
  records: {
    read: number;
    accepted: number;
    rejected: RejectedRecord[];
  };
  entities: Partial<Record<MentionKind, number>>;
  ambiguities: ResolutionAmbiguity[];
  /** CFR reference rows written as Regulation nodes; null without a graph or a reference */
  referenceRegulations: WriteCounters | null;
  upsert: UpsertReport | null;
  similarity: {
    threshold: number;
    comparisons: number;
    links: SimilarityLink[];
    excluded: ExcludedIncident[];
    outputPath: string | null;
  };
}

export class GraphBuildOrchestrator {
  private options: BuildOptions;
  private validator: RecordValidator;
  private resolver: EntityResolver;
  private upsertEngine: GraphUpsertEngine | null;
  private linker: SimilarityLinker;

  constructor(
    graphRepo: GraphRepository | null,
    embedder: TextEmbedder,
    private reference: CfrReference = CfrReference.empty(),
    options: Partial<BuildOptions> = {}
  ) {
    this.options = {
      threshold: config.similarity.threshold,
      scorePrecision: config.similarity.scorePrecision,
      upsertConcurrency: config.upsert.concurrency,
      embeddingBatchSize: config.embedding.batchSize,
      outputPath: config.paths.output,
      ...options,
    };
    this.validator = new RecordValidator();
    this.resolver = new EntityResolver(reference);
    this.upsertEngine = graphRepo
      ? new GraphUpsertEngine(graphRepo, {
          concurrency: this.options.upsertConcurrency,
          onProgress: this.options.onUpsertProgress,
        })
      : null;
    this.linker = new SimilarityLinker(embedder, {
      threshold: this.options.threshold,
      batchSize: this.options.embeddingBatchSize,
    });
  }

  async build(lines: RecordLine[]): Promise<BuildResult> {
    const startTime = Date.now();
    const runId = `run-${uuidv4()}`;
    logger.info({ runId, lines: lines.length, graph: this.upsertEngine !== null }, 'Starting graph build');

    const { records, rejected } = this.validator.validateBatch(lines);

    // Resolution sees the whole batch before the first write
    const resolution = this.resolver.resolve(records);

    const referenceRegulations = this.upsertEngine ? await this.upsertEngine.upsertReference(this.reference) : null;

    const [upsert, similarity] = await Promise.all([
      this.upsertEngine ? this.upsertEngine.upsert(records, resolution) : Promise.resolve(null),
      this.linker.link(records),
    ]);

    const { outputPath, scorePrecision } = this.options;
    if (outputPath) {
      await writeLinkedIncidents(outputPath, similarity.links, scorePrecision);
    }

    const processingTime = `${((Date.now() - startTime) / 1000).toFixed(1)}s`;
    const result: BuildResult = {
      runId,
      processingTime,
      records: { read: lines.length, accepted: records.length, rejected },
      entities: countByKind(resolution.entities),
      ambiguities: resolution.ambiguities,
      referenceRegulations,
      upsert,
      similarity: {
        threshold: this.options.threshold,
        comparisons: similarity.comparisons,
        links: similarity.links,
        excluded: similarity.excluded,
        outputPath,
      },
    };

    logger.info(
      {
        runId,
        processingTime,
        accepted: records.length,
        rejected: rejected.length,
        failedWrites: upsert?.failed ?? 0,
        links: similarity.links.length,
      },
      'Graph build complete'
    );
    return result;
  }
}

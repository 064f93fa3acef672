import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { Neo4jRepository } from '../../services/graph/Neo4jRepository.js';
import type { GraphRepository } from '../../services/graph/GraphRepository.interface.js';
import { EmbeddingService } from '../../services/vector/EmbeddingService.js';
import type { TextEmbedder } from '../../services/vector/TextEmbedder.interface.js';
import { loadCfrReference } from '../../services/reference/CfrReference.js';
import { readRecordLines } from '../../services/storage/RecordReader.js';
import { GraphBuildOrchestrator, type BuildResult } from '../../services/ingestion/GraphBuildOrchestrator.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import type { BuildConfig } from './types.js';

const TOTAL_STEPS = 3;

/** Stores the builder uses; Neo4j and the configured embedding service by default */
export interface GraphBuilderDeps {
  graphRepo?: GraphRepository;
  embedder?: TextEmbedder;
}

export class GraphBuilder {
  private graphRepo: GraphRepository | null;
  private embedder: TextEmbedder | null;

  constructor(
    private buildConfig: BuildConfig,
    deps: GraphBuilderDeps = {}
  ) {
    this.graphRepo = buildConfig.skipGraph ? null : (deps.graphRepo ?? new Neo4jRepository());
    this.embedder = deps.embedder ?? null;
  }

  /** Connects to Neo4j; an unreachable store is fatal for the run. */
  async initialize(reporter: ProgressReporter): Promise<void> {
    if (!this.graphRepo) {
      logger.info('Graph writes disabled, computing similarity links only');
      return;
    }

    reporter.update({ phase: 'connecting', current: 1, total: TOTAL_STEPS });
    await this.graphRepo.connect();
    await this.graphRepo.ensureConstraints();

    if (this.buildConfig.reset) {
      const deleted = await this.graphRepo.clearGraph();
      reporter.warn(`Graph reset: ${deleted} nodes deleted`);
    }
    reporter.complete('Connected to Neo4j');
  }

  async close(): Promise<void> {
    await this.graphRepo?.disconnect();
    logger.info('GraphBuilder closed');
  }

  async run(reporter: ProgressReporter): Promise<BuildResult> {
    reporter.update({ phase: 'loading', current: 2, total: TOTAL_STEPS, detail: this.buildConfig.input });
    const lines = await readRecordLines(this.buildConfig.input);
    const reference = await loadCfrReference(this.buildConfig.cfrReference);
    reporter.complete(`Loaded ${lines.length} records and ${reference.size} CFR reference entries`);

    reporter.update({ phase: 'building', current: 3, total: TOTAL_STEPS });
    const embedder = this.embedder ?? new EmbeddingService();
    const orchestrator = new GraphBuildOrchestrator(this.graphRepo, embedder, reference, {
      threshold: this.buildConfig.threshold,
      outputPath: this.buildConfig.output,
      onUpsertProgress: progress => reporter.recordWritten(progress),
    });
    const result = await orchestrator.build(lines);

    if (result.upsert && result.upsert.failed > 0) {
      reporter.warn(`${result.upsert.failed} incidents failed to write; re-run to retry them`);
    }
    reporter.complete(`Build complete in ${result.processingTime}`);

    if (this.graphRepo) {
      // A store that dropped mid-run has already failed its records; the summary still prints
      await this.graphRepo.countGraph().then(
        counts => logger.info(counts, 'Graph size after build'),
        (error: unknown) => logger.warn({ error: errorMessage(error) }, 'Could not count graph after build')
      );
    }

    return result;
  }
}

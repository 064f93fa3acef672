#!/usr/bin/env node
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { BuildResult } from '../../services/ingestion/GraphBuildOrchestrator.js';
import { GraphBuilder } from './index.js';
import { HELP, parseArgs } from './args.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import type { BuildConfig } from './types.js';

const printSummary = (result: BuildResult) => {
  const { records, upsert, similarity } = result;
  console.log('\nRecords:');
  console.log(`  Read:      ${records.read}`);
  console.log(`  Accepted:  ${records.accepted}`);
  console.log(`  Rejected:  ${records.rejected.length}`);
  for (const rejected of records.rejected) {
    console.log(`    line ${rejected.line ?? '?'} (${rejected.incidentId ?? 'no id'}): ${rejected.reason}`);
  }

  console.log('\nCanonical entities:');
  for (const [kind, count] of Object.entries(result.entities)) {
    console.log(`  ${kind}: ${count}`);
  }
  if (result.ambiguities.length > 0) {
    console.log(`  Ambiguities resolved: ${result.ambiguities.length}`);
  }

  if (result.referenceRegulations) {
    console.log('\nCFR reference:');
    console.log(`  Regulation nodes created: ${result.referenceRegulations.nodesCreated}`);
  }

  if (upsert) {
    console.log('\nGraph:');
    console.log(`  Upserted:              ${upsert.upserted}`);
    console.log(`  Failed:                ${upsert.failed}`);
    console.log(`  Nodes created:         ${upsert.nodesCreated}`);
    console.log(`  Relationships created: ${upsert.relationshipsCreated}`);
    for (const failure of upsert.results.filter(r => r.status === 'failed')) {
      console.log(`    ${failure.incidentId}: ${failure.error}`);
    }
  }

  console.log('\nSimilarity:');
  console.log(`  Threshold:   ${similarity.threshold}`);
  console.log(`  Comparisons: ${similarity.comparisons}`);
  console.log(`  Links:       ${similarity.links.length}`);
  for (const excluded of similarity.excluded) {
    console.log(`    excluded ${excluded.incidentId}: ${excluded.reason}`);
  }
  if (similarity.outputPath) {
    console.log(`  Written to:  ${similarity.outputPath}`);
  }
};

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (args.errors.length > 0) {
    args.errors.forEach(error => console.error(`Error: ${error}`));
    console.log(HELP);
    process.exit(1);
  }

  const buildConfig: BuildConfig = {
    input: args.input ?? config.paths.input,
    cfrReference: args.cfr ?? config.paths.cfrReference,
    output: args.output ?? config.paths.output,
    threshold: args.threshold ?? config.similarity.threshold,
    reset: args.reset ?? config.graph.resetBeforeBuild,
    skipGraph: args.skipGraph ?? false,
    format: args.format ?? 'table',
  };

  const progressReporter = new ProgressReporter(buildConfig.format !== 'json');
  const builder = new GraphBuilder(buildConfig);

  try {
    await builder.initialize(progressReporter);

    logger.info({ input: buildConfig.input, threshold: buildConfig.threshold }, 'Starting graph build');
    const result = await builder.run(progressReporter);

    if (buildConfig.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printSummary(result);
    }
  } catch (error) {
    logger.error({ error }, 'Graph build failed');
    progressReporter.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    await builder.close();
  }
};

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});

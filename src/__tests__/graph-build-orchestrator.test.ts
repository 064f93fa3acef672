import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { GraphBuildOrchestrator, type BuildOptions } from '../services/ingestion/GraphBuildOrchestrator.js';
import { CfrReference } from '../services/reference/CfrReference.js';
import { splitRecordLines } from '../services/storage/RecordReader.js';
import { RelationshipType } from '../domain/relationships/types.js';
import { FakeEmbedder } from './helpers/FakeEmbedder.js';
import { InMemoryGraphRepository } from './helpers/InMemoryGraphRepository.js';

const jsonl = [
  {
    incidentId: '1',
    narrative: 'Feedwater valve seal leaked.',
    mentions: [{ kind: 'CorrectiveAction', text: 'Replace valve seal' }],
    regulations: ['10 CFR 50.55a'],
  },
  {
    incidentId: '2',
    narrative: 'Second feedwater valve seal leak.',
    mentions: [{ kind: 'CorrectiveAction', text: 'replace VALVE SEAL' }],
    regulations: '10CFR50.55a',
  },
  {
    incidentId: '3',
    narrative: 'Level transmitter drifted high.',
    mentions: [
      { kind: 'Cause', text: 'Drift' },
      { kind: 'CorrectiveAction', text: 'Recalibrate level transmitter' },
    ],
  },
]
  .map(record => JSON.stringify(record))
  .concat(['{"incidentId": "4", "narrative": ""}'])
  .join('\n');

const vectors = {
  'Feedwater valve seal leaked.': [1, 0],
  'Second feedwater valve seal leak.': [3, 4],
  'Level transmitter drifted high.': [0, -1],
};

const baseOptions: BuildOptions = {
  threshold: 0.5,
  scorePrecision: 4,
  upsertConcurrency: 2,
  embeddingBatchSize: 16,
  outputPath: null,
};

describe('GraphBuildOrchestrator', () => {
  let repo: InMemoryGraphRepository;

  beforeEach(async () => {
    repo = new InMemoryGraphRepository();
    await repo.connect();
  });

  it('builds the graph and the similarity links for a batch', async () => {
    const reference = CfrReference.fromRows([{ CFR: '50.55a', class_1: 'Codes', class_2: 'Inservice testing' }]);
    const orchestrator = new GraphBuildOrchestrator(repo, new FakeEmbedder(vectors), reference, baseOptions);

    const result = await orchestrator.build(splitRecordLines(jsonl));

    expect(result.runId.startsWith('run-')).toBe(true);
    expect(result.records.read).toBe(4);
    expect(result.records.accepted).toBe(3);
    expect(result.records.rejected).toEqual([{ line: 4, incidentId: '4', reason: 'narrative: narrative is empty' }]);
    expect(result.entities).toEqual({ CorrectiveAction: 2, Regulation: 1, Cause: 1 });

    expect(result.upsert?.upserted).toBe(3);
    expect(result.upsert?.failed).toBe(0);
    expect(repo.nodesWithLabel('CorrectiveAction')).toHaveLength(2);
    expect(
      repo.incidentsLinkedTo('CorrectiveAction', 'replace valve seal', RelationshipType.HAS_CORRECTIVE_ACTION)
    ).toEqual(['1', '2']);
    expect(repo.incidentsLinkedTo('Regulation', '10 CFR 50.55a', RelationshipType.CITES)).toEqual(['1', '2']);
    expect(repo.node('Regulation', '10 CFR 50.55a')).toMatchObject({
      name: '10 CFR 50.55a',
      upperClass: 'Codes',
      lowerClass: 'Inservice testing',
    });

    expect(result.similarity.comparisons).toBe(3);
    expect(result.similarity.links.map(l => [l.incidentA, l.incidentB, l.score])).toEqual([['1', '2', 0.6]]);
    expect(result.similarity.outputPath).toBeNull();
  });

  it('loads uncited reference regulations into the graph', async () => {
    const reference = CfrReference.fromRows([
      { CFR: '50.55a', class_1: 'Codes', class_2: 'Inservice testing' },
      { CFR: '50.9', class_1: 'Completeness', class_2: 'Accuracy' },
    ]);
    const orchestrator = new GraphBuildOrchestrator(repo, new FakeEmbedder(vectors), reference, baseOptions);

    const result = await orchestrator.build(splitRecordLines(jsonl));

    expect(result.referenceRegulations).toEqual({ nodesCreated: 2, relationshipsCreated: 0 });
    expect(repo.node('Regulation', '10 CFR 50.9')).toMatchObject({ upperClass: 'Completeness', lowerClass: 'Accuracy' });
    expect(repo.incidentsLinkedTo('Regulation', '10 CFR 50.9', RelationshipType.CITES)).toEqual([]);
    expect(repo.nodesWithLabel('Regulation')).toHaveLength(2);
  });

  it('links nothing above a higher threshold', async () => {
    const orchestrator = new GraphBuildOrchestrator(repo, new FakeEmbedder(vectors), CfrReference.empty(), {
      ...baseOptions,
      threshold: 0.7,
    });
    const result = await orchestrator.build(splitRecordLines(jsonl));
    expect(result.similarity.links).toEqual([]);
    expect(result.similarity.threshold).toBe(0.7);
  });

  it('computes links without a graph store', async () => {
    const orchestrator = new GraphBuildOrchestrator(null, new FakeEmbedder(vectors), CfrReference.empty(), baseOptions);
    const result = await orchestrator.build(splitRecordLines(jsonl));
    expect(result.upsert).toBeNull();
    expect(result.referenceRegulations).toBeNull();
    expect(result.similarity.links).toHaveLength(1);
  });

  it('produces the same graph when a batch is rebuilt', async () => {
    const orchestrator = new GraphBuildOrchestrator(repo, new FakeEmbedder(vectors), CfrReference.empty(), baseOptions);
    await orchestrator.build(splitRecordLines(jsonl));
    const before = await repo.countGraph();

    const again = await orchestrator.build(splitRecordLines(jsonl));

    expect(again.upsert?.nodesCreated).toBe(0);
    expect(await repo.countGraph()).toEqual(before);
  });

  describe('with an output path', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'graph-build-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes the linked incidents CSV', async () => {
      const outputPath = join(dir, 'linked_incidents.csv');
      const orchestrator = new GraphBuildOrchestrator(repo, new FakeEmbedder(vectors), CfrReference.empty(), {
        ...baseOptions,
        outputPath,
      });

      const result = await orchestrator.build(splitRecordLines(jsonl));

      expect(result.similarity.outputPath).toBe(outputPath);
      expect(await readFile(outputPath, 'utf-8')).toBe('incident_a,incident_b,similarity\n1,2,0.6000\n');
    });
  });
});

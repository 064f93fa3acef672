import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatLinkedIncidentsCsv, writeLinkedIncidents } from '../services/storage/LinkedIncidentsWriter.js';
import type { SimilarityLink } from '../domain/entities/SimilarityLink.js';

const link = (incidentA: string, incidentB: string, score: number): SimilarityLink => ({
  incidentA,
  incidentB,
  score,
  threshold: 0.5,
  method: 'cosine:fake-embedder',
});

describe('LinkedIncidentsWriter', () => {
  it('writes a header and one row per link at fixed precision', () => {
    expect(formatLinkedIncidentsCsv([link('A', 'B', 0.75), link('A', 'C', 1)], 4)).toBe(
      'incident_a,incident_b,similarity\nA,B,0.7500\nA,C,1.0000\n'
    );
  });

  it('quotes ids that contain the separator', () => {
    expect(formatLinkedIncidentsCsv([link('LER, 2023-001', 'B', 0.5)], 2)).toBe(
      'incident_a,incident_b,similarity\n"LER, 2023-001",B,0.50\n'
    );
  });

  it('writes only the header when nothing links', () => {
    expect(formatLinkedIncidentsCsv([], 4)).toBe('incident_a,incident_b,similarity\n');
  });

  describe('writeLinkedIncidents', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'linked-incidents-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('creates missing directories and writes the file', async () => {
      const filePath = join(dir, 'nested', 'links.csv');
      await writeLinkedIncidents(filePath, [link('1', '2', 0.6)], 4);
      expect(await readFile(filePath, 'utf-8')).toBe('incident_a,incident_b,similarity\n1,2,0.6000\n');
    });
  });
});

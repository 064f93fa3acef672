import { describe, it, expect } from 'vitest';
import { formatUpsertTick } from '../skills/build-graph/reporters/ProgressReporter.js';

describe('formatUpsertTick', () => {
  it('counts written incidents', () => {
    expect(formatUpsertTick({ incidentId: 'A', status: 'upserted', done: 12, failed: 0, total: 40 })).toBe(
      '12/40 incidents written'
    );
  });

  it('adds failures when there are any', () => {
    expect(formatUpsertTick({ incidentId: 'B', status: 'failed', done: 13, failed: 1, total: 40 })).toBe(
      '12/40 incidents written, 1 failed'
    );
  });
});

import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { StoreWriteFailureError, errorMessage } from '../../utils/errors.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import type { IncidentRecord } from '../../domain/entities/Incident.js';
import type { CanonicalEntity } from '../../domain/entities/CanonicalEntity.js';
import { MENTION_RELATIONSHIP } from '../../domain/relationships/types.js';
import { normalizeText } from '../ingestion/normalization.js';
import type { Resolution } from '../ingestion/EntityResolver.js';
import type { CfrReference } from '../reference/CfrReference.js';
import type {
  EntityNodeWrite,
  FacilityNodeWrite,
  GraphRepository,
  IncidentGraphWrite,
  WriteCounters,
} from './GraphRepository.interface.js';

const logger = createLogger('upsert');

export interface RecordUpsertResult {
  incidentId: string;
  status: 'upserted' | 'failed';
  nodesCreated: number;
  relationshipsCreated: number;
  error?: string;
}

export interface UpsertReport {
  results: RecordUpsertResult[];
  upserted: number;
  failed: number;
  nodesCreated: number;
  relationshipsCreated: number;
}

export interface UpsertProgress {
  incidentId: string;
  status: RecordUpsertResult['status'];
  /** Records finished so far, this one included */
  done: number;
  failed: number;
  total: number;
}

export interface GraphUpsertOptions {
  concurrency: number;
  /** Called once per record as its transaction commits or fails */
  onProgress?: (progress: UpsertProgress) => void;
}

export class GraphUpsertEngine {
  private options: GraphUpsertOptions;

  constructor(
    private graphRepo: GraphRepository,
    options: Partial<GraphUpsertOptions> = {}
  ) {
    this.options = { concurrency: config.upsert.concurrency, ...options };
  }

  /** Writes every reference regulation, cited or not. Nothing is written for an empty reference. */
  async upsertReference(reference: CfrReference): Promise<WriteCounters | null> {
    if (reference.size === 0) return null;
    return this.graphRepo.upsertRegulations(reference.regulationNodes());
  }

  /**
   * Writes every record through its own transaction. A failed record is
   * reported and skipped; records already committed stay in the store.
   */
  async upsert(records: IncidentRecord[], resolution: Resolution): Promise<UpsertReport> {
    const entitiesById = new Map(resolution.entities.map(e => [e.id, e]));
    logger.info({ records: records.length, concurrency: this.options.concurrency }, 'Starting graph upsert');

    let done = 0;
    let failed = 0;
    const results = await mapWithConcurrency(records, this.options.concurrency, async record => {
      const result = await this.upsertRecord(record, resolution, entitiesById);
      done++;
      if (result.status === 'failed') failed++;
      this.options.onProgress?.({
        incidentId: result.incidentId,
        status: result.status,
        done,
        failed,
        total: records.length,
      });
      return result;
    });

    const report: UpsertReport = {
      results,
      upserted: results.filter(r => r.status === 'upserted').length,
      failed: results.filter(r => r.status === 'failed').length,
      nodesCreated: results.reduce((sum, r) => sum + r.nodesCreated, 0),
      relationshipsCreated: results.reduce((sum, r) => sum + r.relationshipsCreated, 0),
    };
    logger.info(
      {
        upserted: report.upserted,
        failed: report.failed,
        nodesCreated: report.nodesCreated,
        relationshipsCreated: report.relationshipsCreated,
      },
      'Graph upsert complete'
    );
    return report;
  }

  private async upsertRecord(
    record: IncidentRecord,
    resolution: Resolution,
    entitiesById: Map<string, CanonicalEntity>
  ): Promise<RecordUpsertResult> {
    try {
      const write = this.buildWrite(record, resolution, entitiesById);
      const counters = await this.graphRepo.upsertIncident(write);
      return { incidentId: record.incidentId, status: 'upserted', ...counters };
    } catch (error) {
      const failure = new StoreWriteFailureError(
        `Store write failed for incident ${record.incidentId}: ${errorMessage(error)}`,
        record.incidentId,
        error
      );
      logger.error({ incidentId: failure.incidentId, error: errorMessage(error) }, 'Incident upsert failed');
      return {
        incidentId: record.incidentId,
        status: 'failed',
        nodesCreated: 0,
        relationshipsCreated: 0,
        error: failure.message,
      };
    }
  }

  buildWrite(
    record: IncidentRecord,
    resolution: Resolution,
    entitiesById: Map<string, CanonicalEntity>
  ): IncidentGraphWrite {
    const entities = new Map<string, EntityNodeWrite>();

    for (const mention of record.mentions) {
      const id = resolution.assignments.get(mention.id);
      const entity = id ? entitiesById.get(id) : undefined;
      if (!entity) {
        throw new Error(`Mention ${mention.id} has no canonical entity`);
      }
      if (entities.has(entity.id)) continue;
      entities.set(entity.id, {
        label: entity.kind,
        key: entity.key,
        name: entity.label,
        aliases: entity.aliases,
        properties: entity.properties,
        relationship: MENTION_RELATIONSHIP[entity.kind],
      });
    }

    const nodes = [...entities.values()];
    const causes = nodes.filter(n => n.label === 'Cause');
    const actions = nodes.filter(n => n.label === 'CorrectiveAction');

    return {
      incident: {
        incidentId: record.incidentId,
        narrative: record.narrative,
        title: record.title ?? null,
        eventDate: record.eventDate ?? null,
        system: record.system ?? null,
      },
      facility: this.facilityWrite(record),
      entities: nodes,
      addressedBy: causes.flatMap(cause => actions.map(action => ({ causeKey: cause.key, actionKey: action.key }))),
    };
  }

  private facilityWrite(record: IncidentRecord): FacilityNodeWrite | null {
    if (!record.facility) return null;
    const { name, unit } = record.facility;
    return {
      key: unit ? `${normalizeText(name)}|${normalizeText(unit)}` : normalizeText(name),
      name,
      unit: unit ?? null,
    };
  }
}

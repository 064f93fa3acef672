import neo4j, { type Driver, type Session } from 'neo4j-driver';
import { config } from '../../config/index.js';
import type { Config } from '../../config/validation.js';
import { createLogger } from '../../utils/logger.js';
import { GraphPersistenceError } from '../../utils/errors.js';
import type { MentionKind } from '../../domain/entities/EntityMention.js';
import type {
  EntityNodeWrite,
  GraphCounts,
  GraphRepository,
  IncidentGraphWrite,
  RegulationNodeWrite,
  WriteCounters,
} from './GraphRepository.interface.js';
import {
  CLEAR_GRAPH,
  CONSTRAINTS,
  COUNT_NODES,
  UPSERT_FACILITY,
  UPSERT_INCIDENT,
  UPSERT_MENTIONED_ENTITIES,
  UPSERT_REGULATIONS,
} from './queries/entity-queries.js';
import { COUNT_RELATIONSHIPS, UPSERT_ADDRESSED_BY } from './queries/relationship-queries.js';
import { toJsNumber } from './utils.js';

const logger = createLogger('neo4j');

/** The part of a managed transaction the write functions use */
export interface CypherRunner {
  run(query: string, parameters: Record<string, unknown>): PromiseLike<{
    summary: { counters: { updates(): Record<string, number> } };
  }>;
}

export interface Neo4jCredentials {
  uri: string;
  user: string;
  password: string;
}

/** Graph writes need all three settings; similarity-only runs need none */
export function neo4jCredentials(settings: Config['neo4j']): Neo4jCredentials {
  const { uri, user, password } = settings;
  if (!uri || !user || !password) {
    throw new GraphPersistenceError('NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD must be set to write the graph');
  }
  return { uri, user, password };
}

const groupBy = <T, K>(items: T[], keyOf: (item: T) => K): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    groups.set(key, [...(groups.get(key) ?? []), item]);
  }
  return groups;
};

const counting = (tx: CypherRunner) => {
  const totals: WriteCounters = { nodesCreated: 0, relationshipsCreated: 0 };
  const run = async (query: string, params: Record<string, unknown>) => {
    const result = await tx.run(query, params);
    const updates = result.summary.counters.updates();
    totals.nodesCreated += updates.nodesCreated ?? 0;
    totals.relationshipsCreated += updates.relationshipsCreated ?? 0;
  };
  return { totals, run };
};

/**
 * Everything one incident contributes, as MERGE statements in one transaction:
 * the incident, its facility, one statement per (label, relationship) group of
 * entities, then the Cause → CorrectiveAction pairs.
 */
export async function writeIncident(tx: CypherRunner, write: IncidentGraphWrite): Promise<WriteCounters> {
  const { totals, run } = counting(tx);

  const { incidentId, ...props } = write.incident;
  await run(UPSERT_INCIDENT, { incidentId, props });

  if (write.facility) {
    await run(UPSERT_FACILITY, { incidentId, ...write.facility });
  }

  for (const [label, entities] of groupBy<EntityNodeWrite, MentionKind>(write.entities, e => e.label)) {
    for (const [relationship, group] of groupBy(entities, e => e.relationship)) {
      await run(UPSERT_MENTIONED_ENTITIES(label, relationship), {
        incidentId,
        entities: group.map(({ key, name, aliases, properties }) => ({ key, name, aliases, properties })),
      });
    }
  }

  if (write.addressedBy.length > 0) {
    await run(UPSERT_ADDRESSED_BY, { pairs: write.addressedBy });
  }

  return totals;
}

export async function writeRegulations(tx: CypherRunner, regulations: RegulationNodeWrite[]): Promise<WriteCounters> {
  const { totals, run } = counting(tx);
  if (regulations.length > 0) {
    await run(UPSERT_REGULATIONS, { regulations });
  }
  return totals;
}

export class Neo4jRepository implements GraphRepository {
  private driver: Driver | null = null;

  constructor(private settings: Config['neo4j'] = config.neo4j) {}

  async connect(): Promise<void> {
    const { uri, user, password } = neo4jCredentials(this.settings);
    try {
      this.driver = neo4j.driver(uri, neo4j.auth.basic(user, password), {
        maxConnectionLifetime: 30 * 60 * 1000,
        maxConnectionPoolSize: 50,
        connectionAcquisitionTimeout: 30 * 1000,
        connectionTimeout: 30 * 1000,
      });
      await this.driver.verifyConnectivity();
      logger.info({ uri }, 'Connected to Neo4j');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Neo4j');
      await this.disconnect();
      throw new GraphPersistenceError('Neo4j connection failed', error);
    }
  }

  async disconnect(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      logger.info('Disconnected from Neo4j');
    }
  }

  private getSession(): Session {
    if (!this.driver) {
      throw new GraphPersistenceError('Neo4j driver not initialized');
    }
    return this.driver.session({
      database: this.settings.database,
      defaultAccessMode: neo4j.session.WRITE,
    });
  }

  private get txConfig() {
    return { timeout: this.settings.queryTimeoutMs };
  }

  async ensureConstraints(): Promise<void> {
    const session = this.getSession();
    try {
      for (const statement of CONSTRAINTS) {
        await session.run(statement, {}, this.txConfig);
      }
      logger.info({ count: CONSTRAINTS.length }, 'Neo4j constraints ensured');
    } catch (error) {
      logger.error({ error }, 'Failed to create constraints');
      throw new GraphPersistenceError('Constraint creation failed', error);
    } finally {
      await session.close();
    }
  }

  async clearGraph(): Promise<number> {
    const session = this.getSession();
    try {
      const result = await session.executeWrite(tx => tx.run(CLEAR_GRAPH), this.txConfig);
      const deleted = toJsNumber(result.records[0]?.get('deleted'));
      logger.info({ deleted }, 'Graph cleared before build');
      return deleted;
    } catch (error) {
      logger.error({ error }, 'Failed to clear graph');
      throw new GraphPersistenceError('Graph reset failed', error);
    } finally {
      await session.close();
    }
  }

  async upsertRegulations(regulations: RegulationNodeWrite[]): Promise<WriteCounters> {
    const session = this.getSession();
    try {
      const counters = await session.executeWrite(tx => writeRegulations(tx, regulations), this.txConfig);
      logger.info({ regulations: regulations.length, ...counters }, 'Upserted CFR reference regulations');
      return counters;
    } catch (error) {
      logger.error({ error }, 'Failed to upsert CFR reference regulations');
      throw new GraphPersistenceError('Regulation upsert failed', error);
    } finally {
      await session.close();
    }
  }

  async upsertIncident(write: IncidentGraphWrite): Promise<WriteCounters> {
    const session = this.getSession();
    try {
      const counters = await session.executeWrite(tx => writeIncident(tx, write), this.txConfig);
      logger.debug({ incidentId: write.incident.incidentId, ...counters }, 'Upserted incident');
      return counters;
    } finally {
      await session.close();
    }
  }

  async countGraph(): Promise<GraphCounts> {
    const session = this.getSession();
    try {
      const nodes = await session.run(COUNT_NODES, {}, this.txConfig);
      const relationships = await session.run(COUNT_RELATIONSHIPS, {}, this.txConfig);
      return {
        nodes: toJsNumber(nodes.records[0]?.get('count')),
        relationships: toJsNumber(relationships.records[0]?.get('count')),
      };
    } catch (error) {
      logger.error({ error }, 'Failed to count graph');
      throw new GraphPersistenceError('Graph count failed', error);
    } finally {
      await session.close();
    }
  }
}

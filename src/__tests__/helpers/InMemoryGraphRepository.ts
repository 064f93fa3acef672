import { GraphPersistenceError } from '../../utils/errors.js';
import type { NodeLabel } from '../../domain/relationships/types.js';
import { RelationshipType } from '../../domain/relationships/types.js';
import type {
  GraphCounts,
  GraphRepository,
  IncidentGraphWrite,
  RegulationNodeWrite,
  WriteCounters,
} from '../../services/graph/GraphRepository.interface.js';

type NodeProps = Record<string, unknown>;

const nodeId = (label: NodeLabel, key: string) => `${label}:${key}`;

/**
 * Applies the same natural-key MERGE semantics as the Cypher queries, one
 * transaction per call. Incidents listed in `failingIncidents` throw before
 * anything is staged; `countsUnavailable` makes `countGraph` throw.
 */
export class InMemoryGraphRepository implements GraphRepository {
  nodes = new Map<string, NodeProps>();
  relationships = new Set<string>();
  failingIncidents = new Set<string>();
  attempts: string[] = [];
  countsUnavailable = false;
  private connected = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async ensureConstraints(): Promise<void> {}

  async clearGraph(): Promise<number> {
    const deleted = this.nodes.size;
    this.nodes.clear();
    this.relationships.clear();
    return deleted;
  }

  async upsertRegulations(regulations: RegulationNodeWrite[]): Promise<WriteCounters> {
    this.assertConnected();
    const tx = this.begin();
    for (const regulation of regulations) {
      tx.mergeNode('Regulation', regulation.key, { name: regulation.name }, regulation.aliases, regulation.properties);
    }
    return tx.commit();
  }

  async upsertIncident(write: IncidentGraphWrite): Promise<WriteCounters> {
    const { incidentId } = write.incident;
    this.attempts.push(incidentId);
    this.assertConnected();
    if (this.failingIncidents.has(incidentId)) throw new Error('Connection reset by peer');

    const tx = this.begin();
    const incident = tx.mergeNode('Incident', incidentId, {}, [], { ...write.incident });

    if (write.facility) {
      const facility = tx.mergeNode('Facility', write.facility.key, {
        name: write.facility.name,
        unit: write.facility.unit,
      });
      tx.mergeRelationship(incident, RelationshipType.OCCURRED_AT, facility);
    }

    for (const entity of write.entities) {
      const id = tx.mergeNode(entity.label, entity.key, { name: entity.name }, entity.aliases, entity.properties);
      tx.mergeRelationship(incident, entity.relationship, id);
    }

    for (const { causeKey, actionKey } of write.addressedBy) {
      tx.mergeRelationship(
        nodeId('Cause', causeKey),
        RelationshipType.ADDRESSED_BY,
        nodeId('CorrectiveAction', actionKey)
      );
    }

    return tx.commit();
  }

  async countGraph(): Promise<GraphCounts> {
    if (this.countsUnavailable) throw new GraphPersistenceError('Graph count failed');
    return { nodes: this.nodes.size, relationships: this.relationships.size };
  }

  node(label: NodeLabel, key: string): NodeProps | undefined {
    return this.nodes.get(nodeId(label, key));
  }

  nodesWithLabel(label: NodeLabel): NodeProps[] {
    return [...this.nodes.values()].filter(n => n.label === label);
  }

  /** Incident ids with a `type` relationship into the given node, sorted */
  incidentsLinkedTo(label: NodeLabel, key: string, type: RelationshipType): string[] {
    const suffix = `-[${type}]->${nodeId(label, key)}`;
    return [...this.relationships]
      .filter(r => r.startsWith('Incident:') && r.endsWith(suffix))
      .map(r => r.slice('Incident:'.length, r.length - suffix.length))
      .sort();
  }

  private assertConnected(): void {
    if (!this.connected) throw new GraphPersistenceError('Neo4j driver not initialized');
  }

  /** Stages writes on copies; nothing is visible until `commit` */
  private begin() {
    const nodes = new Map(this.nodes);
    const relationships = new Set(this.relationships);
    const counters: WriteCounters = { nodesCreated: 0, relationshipsCreated: 0 };

    const mergeNode = (
      label: NodeLabel,
      key: string,
      onCreate: NodeProps,
      aliases: string[] = [],
      set: NodeProps = {}
    ): string => {
      const id = nodeId(label, key);
      const existing = nodes.get(id);
      if (!existing) {
        nodes.set(id, { label, key, ...onCreate, aliases, ...set });
        counters.nodesCreated++;
        return id;
      }
      const known = Array.isArray(existing.aliases) ? existing.aliases.map(String) : [];
      nodes.set(id, { ...existing, aliases: [...known, ...aliases.filter(a => !known.includes(a))], ...set });
      return id;
    };

    const mergeRelationship = (from: string, type: RelationshipType, to: string): void => {
      const id = `${from}-[${type}]->${to}`;
      if (!relationships.has(id)) {
        relationships.add(id);
        counters.relationshipsCreated++;
      }
    };

    const commit = (): WriteCounters => {
      this.nodes = nodes;
      this.relationships = relationships;
      return counters;
    };

    return { mergeNode, mergeRelationship, commit };
  }
}

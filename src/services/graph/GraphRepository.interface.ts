import type { MentionKind } from '../../domain/entities/EntityMention.js';
import type { RelationshipType } from '../../domain/relationships/types.js';

export interface IncidentNodeWrite {
  incidentId: string;
  narrative: string;
  title: string | null;
  eventDate: string | null;
  system: string | null;
}

export interface FacilityNodeWrite {
  key: string;
  name: string;
  unit: string | null;
}

export interface EntityNodeWrite {
  label: MentionKind;
  key: string;
  name: string;
  aliases: string[];
  properties: Record<string, string | null>;
  /** Relationship from the incident to this node */
  relationship: RelationshipType;
}

/** A CFR reference row as a Regulation node, written whether or not an incident cites it */
export interface RegulationNodeWrite {
  key: string;
  name: string;
  aliases: string[];
  properties: Record<string, string | null>;
}

export interface AddressedByWrite {
  causeKey: string;
  actionKey: string;
}

/** Everything one incident contributes to the graph, written atomically */
export interface IncidentGraphWrite {
  incident: IncidentNodeWrite;
  facility: FacilityNodeWrite | null;
  entities: EntityNodeWrite[];
  addressedBy: AddressedByWrite[];
}

export interface WriteCounters {
  nodesCreated: number;
  relationshipsCreated: number;
}

export interface GraphCounts {
  nodes: number;
  relationships: number;
}

export interface GraphRepository {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Uniqueness constraints on every natural key */
  ensureConstraints(): Promise<void>;
  clearGraph(): Promise<number>;

  /** Create-or-merge reference Regulation nodes and their classes */
  upsertRegulations(regulations: RegulationNodeWrite[]): Promise<WriteCounters>;

  /** Create-or-merge every node and relationship of one incident in a single transaction */
  upsertIncident(write: IncidentGraphWrite): Promise<WriteCounters>;

  countGraph(): Promise<GraphCounts>;
}

import type { MentionKind } from '../../../domain/entities/EntityMention.js';
import type { RelationshipType } from '../../../domain/relationships/types.js';

export const CONSTRAINTS = [
  'CREATE CONSTRAINT incident_id IF NOT EXISTS FOR (n:Incident) REQUIRE n.incidentId IS UNIQUE',
  'CREATE CONSTRAINT cause_key IF NOT EXISTS FOR (n:Cause) REQUIRE n.key IS UNIQUE',
  'CREATE CONSTRAINT corrective_action_key IF NOT EXISTS FOR (n:CorrectiveAction) REQUIRE n.key IS UNIQUE',
  'CREATE CONSTRAINT component_key IF NOT EXISTS FOR (n:Component) REQUIRE n.key IS UNIQUE',
  'CREATE CONSTRAINT regulation_key IF NOT EXISTS FOR (n:Regulation) REQUIRE n.key IS UNIQUE',
  'CREATE CONSTRAINT facility_key IF NOT EXISTS FOR (n:Facility) REQUIRE n.key IS UNIQUE',
];

export const UPSERT_INCIDENT = `
  MERGE (i:Incident {incidentId: $incidentId})
  ON CREATE SET i.createdAt = datetime()
  SET i += $props, i.updatedAt = datetime()
`;

export const UPSERT_FACILITY = `
  MATCH (i:Incident {incidentId: $incidentId})
  MERGE (f:Facility {key: $key})
  ON CREATE SET f.name = $name, f.unit = $unit
  MERGE (i)-[:OCCURRED_AT]->(f)
`;

// Label and type come from closed enums; Cypher cannot parameterize them.
export const UPSERT_MENTIONED_ENTITIES = (label: MentionKind, relType: RelationshipType) => `
  MATCH (i:Incident {incidentId: $incidentId})
  UNWIND $entities AS entity
  MERGE (e:${label} {key: entity.key})
  ON CREATE SET e.name = entity.name, e.aliases = entity.aliases, e.createdAt = datetime()
  ON MATCH SET e.aliases = coalesce(e.aliases, []) + [a IN entity.aliases WHERE NOT a IN coalesce(e.aliases, [])]
  SET e += entity.properties
  MERGE (i)-[:${relType}]->(e)
`;

export const UPSERT_REGULATIONS = `
  UNWIND $regulations AS regulation
  MERGE (r:Regulation {key: regulation.key})
  ON CREATE SET r.name = regulation.name, r.aliases = regulation.aliases, r.createdAt = datetime()
  ON MATCH SET r.aliases = coalesce(r.aliases, []) + [a IN regulation.aliases WHERE NOT a IN coalesce(r.aliases, [])]
  SET r += regulation.properties
`;

export const CLEAR_GRAPH = `
  MATCH (n)
  DETACH DELETE n
  RETURN count(n) as deleted
`;

export const COUNT_NODES = `MATCH (n) RETURN count(n) as count`;

import type { MentionKind } from '../entities/EntityMention.js';

export enum RelationshipType {
  CAUSED_BY = 'CAUSED_BY',
  HAS_CORRECTIVE_ACTION = 'HAS_CORRECTIVE_ACTION',
  INVOLVES_COMPONENT = 'INVOLVES_COMPONENT',
  CITES = 'CITES',
  OCCURRED_AT = 'OCCURRED_AT',
  ADDRESSED_BY = 'ADDRESSED_BY',
}

export type NodeLabel = 'Incident' | 'Facility' | MentionKind;

export const MENTION_RELATIONSHIP: Record<MentionKind, RelationshipType> = {
  Cause: RelationshipType.CAUSED_BY,
  CorrectiveAction: RelationshipType.HAS_CORRECTIVE_ACTION,
  Component: RelationshipType.INVOLVES_COMPONENT,
  Regulation: RelationshipType.CITES,
};

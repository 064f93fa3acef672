import type { MentionKind } from './EntityMention.js';

export interface CanonicalEntity {
  /** `<kind>:<key>` */
  id: string;
  kind: MentionKind;
  /** Natural key used for graph upserts */
  key: string;
  label: string;
  aliases: string[];
  mentionIds: string[];
  properties: Record<string, string | null>;
}

export const canonicalId = (kind: MentionKind, key: string): string => `${kind}:${key}`;

export interface ResolutionAmbiguity {
  kind: MentionKind;
  /** Forms that normalized differently */
  forms: string[];
  chosen: string | null;
  reason: string;
}

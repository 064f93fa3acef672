export const MENTION_KINDS = ['Cause', 'CorrectiveAction', 'Component', 'Regulation'] as const;

export type MentionKind = (typeof MENTION_KINDS)[number];

export const isMentionKind = (value: string): value is MentionKind =>
  MENTION_KINDS.some(kind => kind === value);

export interface EntityMention {
  /** `<incidentId>#<index>`, unique within a batch */
  id: string;
  incidentId: string;
  kind: MentionKind;
  /** Raw text with whitespace collapsed */
  text: string;
  /** Lower-cased, punctuation-stripped form; never empty */
  normalized: string;
}

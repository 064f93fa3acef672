import { createLogger } from '../../utils/logger.js';
import type { IncidentRecord } from '../../domain/entities/Incident.js';
import type { EntityMention, MentionKind } from '../../domain/entities/EntityMention.js';
import {
  canonicalId,
  type CanonicalEntity,
  type ResolutionAmbiguity,
} from '../../domain/entities/CanonicalEntity.js';
import { CfrReference } from '../reference/CfrReference.js';
import {
  compareSpecificity,
  formatCfrCitation,
  isCitationPrefix,
  parseCfrCitation,
  regulationKey,
  type CfrCitation,
} from './cfr.js';

const logger = createLogger('resolver');

export interface Resolution {
  entities: CanonicalEntity[];
  /** mention id → canonical entity id */
  assignments: Map<string, string>;
  ambiguities: ResolutionAmbiguity[];
}

interface ResolvedMention {
  mention: EntityMention;
  key: string;
  citation: CfrCitation | null;
  /** Forms that lost a disagreement between normalization passes */
  aliases: string[];
}

/**
 * Groups a batch of mentions into canonical entities. Nothing is carried over
 * between calls: the result depends only on the batch and the CFR reference.
 */
export class EntityResolver {
  constructor(private reference: CfrReference = CfrReference.empty()) {}

  resolve(records: IncidentRecord[]): Resolution {
    const ambiguities: ResolutionAmbiguity[] = [];
    const resolved: ResolvedMention[] = [];

    for (const record of records) {
      for (const mention of record.mentions) {
        resolved.push(
          mention.kind === 'Regulation'
            ? this.resolveRegulation(mention, ambiguities)
            : { mention, key: mention.normalized, citation: null, aliases: [] }
        );
      }
    }

    const folded = this.foldLessSpecificCitations(resolved, ambiguities);
    const entities = this.buildEntities(resolved, folded);

    const assignments = new Map<string, string>();
    for (const { mention, key } of resolved) {
      assignments.set(mention.id, canonicalId(mention.kind, folded.get(key) ?? key));
    }

    for (const ambiguity of ambiguities) {
      logger.warn(ambiguity, 'Resolution ambiguity');
    }
    logger.info(
      { mentions: resolved.length, entities: entities.length, ambiguities: ambiguities.length },
      'Entity resolution complete'
    );

    return { entities, assignments, ambiguities };
  }

  private resolveRegulation(mention: EntityMention, ambiguities: ResolutionAmbiguity[]): ResolvedMention {
    const parsed = parseCfrCitation(mention.text);
    if (!parsed) {
      const entry = this.reference.get(mention.normalized);
      const fromReference = entry?.canonical ? parseCfrCitation(entry.canonical) : null;
      if (fromReference) {
        return { mention, key: formatCfrCitation(fromReference), citation: fromReference, aliases: [mention.text] };
      }
      logger.debug({ mentionId: mention.id, text: mention.text }, 'Regulation is not a CFR citation');
      return { mention, key: mention.normalized, citation: null, aliases: [] };
    }

    const parsedForm = formatCfrCitation(parsed);
    const entry = this.reference.get(parsedForm);
    const fromReference = entry?.canonical ? parseCfrCitation(entry.canonical) : null;
    if (!fromReference || formatCfrCitation(fromReference) === parsedForm) {
      return { mention, key: parsedForm, citation: parsed, aliases: [] };
    }

    const referenceForm = formatCfrCitation(fromReference);
    const [winner, loser]: [CfrCitation, string] =
      compareSpecificity(fromReference, parsed) > 0 ? [fromReference, parsedForm] : [parsed, referenceForm];
    const winnerForm = formatCfrCitation(winner);
    ambiguities.push({
      kind: 'Regulation',
      forms: [parsedForm, referenceForm],
      chosen: winnerForm,
      reason: 'citation format and CFR reference disagree; kept the more specific form',
    });
    return { mention, key: winnerForm, citation: winner, aliases: [loser] };
  }

  /**
   * A citation that is a prefix of exactly one maximal citation in the batch
   * is folded into it. Returns less specific key → more specific key.
   */
  private foldLessSpecificCitations(
    resolved: ResolvedMention[],
    ambiguities: ResolutionAmbiguity[]
  ): Map<string, string> {
    const citations = new Map<string, CfrCitation>();
    for (const { key, citation } of resolved) {
      if (citation && !citations.has(key)) citations.set(key, citation);
    }

    const forms = [...citations.entries()];
    const maximal = forms.filter(([, c]) => !forms.some(([, other]) => isCitationPrefix(c, other)));

    const folded = new Map<string, string>();
    for (const [key, citation] of forms) {
      const extensions = maximal.filter(([, other]) => isCitationPrefix(citation, other)).map(([k]) => k);
      if (extensions.length === 0) continue;

      if (extensions.length === 1) {
        folded.set(key, extensions[0]);
        ambiguities.push({
          kind: 'Regulation',
          forms: [key, extensions[0]],
          chosen: extensions[0],
          reason: 'less specific citation folded into the more specific one',
        });
      } else {
        ambiguities.push({
          kind: 'Regulation',
          forms: [key, ...extensions],
          chosen: null,
          reason: 'citation is a prefix of several more specific citations; kept as its own entity',
        });
      }
    }
    return folded;
  }

  private buildEntities(resolved: ResolvedMention[], folded: Map<string, string>): CanonicalEntity[] {
    const byId = new Map<string, CanonicalEntity>();
    const addAlias = (entity: CanonicalEntity, alias: string) => {
      if (alias && alias !== entity.label && !entity.aliases.includes(alias)) {
        entity.aliases.push(alias);
      }
    };

    for (const { mention, key, citation, aliases } of resolved) {
      const finalKey = folded.get(key) ?? key;
      const id = canonicalId(mention.kind, finalKey);
      const entity: CanonicalEntity = byId.get(id) ?? {
        id,
        kind: mention.kind,
        key: finalKey,
        label: citation ? finalKey : mention.text,
        aliases: [],
        mentionIds: [],
        properties: {},
      };
      byId.set(id, entity);

      entity.mentionIds.push(mention.id);
      addAlias(entity, mention.text);
      if (finalKey !== key) addAlias(entity, key);
      aliases.forEach(alias => addAlias(entity, alias));
    }

    for (const entity of byId.values()) {
      if (entity.kind === 'Regulation') {
        entity.properties = this.regulationProperties(entity);
      }
    }

    return [...byId.values()];
  }

  private regulationProperties(entity: CanonicalEntity): Record<string, string | null> {
    const entry = [entity.key, ...entity.aliases]
      .map(form => this.reference.get(regulationKey(form)))
      .find(e => e !== undefined);
    return {
      upperClass: entry?.upperClass ?? null,
      lowerClass: entry?.lowerClass ?? null,
    };
  }
}

export const countByKind = (entities: CanonicalEntity[]): Partial<Record<MentionKind, number>> => {
  const counts: Partial<Record<MentionKind, number>> = {};
  for (const entity of entities) {
    counts[entity.kind] = (counts[entity.kind] ?? 0) + 1;
  }
  return counts;
};

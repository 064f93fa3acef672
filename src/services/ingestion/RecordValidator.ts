import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import { MalformedRecordError, errorMessage } from '../../utils/errors.js';
import { isMentionKind, type EntityMention, type MentionKind } from '../../domain/entities/EntityMention.js';
import type { Facility, IncidentRecord } from '../../domain/entities/Incident.js';
import { collapseWhitespace, normalizeText } from './normalization.js';

const logger = createLogger('validator');

// Spellings emitted by the upstream extraction prompt
const KIND_ALIASES: Record<string, MentionKind> = {
  'Corrective Action': 'CorrectiveAction',
  'Corrective Actions': 'CorrectiveAction',
};

// Placeholders the upstream CFR merge writes for reports without a citation
const MISSING_CODES = new Set(['none', 'nan', 'n a', 'null']);

const optionalText = z
  .string()
  .transform(s => collapseWhitespace(s))
  .optional()
  .transform(s => (s ? s : undefined));

const facilitySchema = z.union([
  z.string().transform(name => ({ name })),
  z.object({
    name: z.string(),
    unit: z.union([z.string(), z.number()]).optional(),
  }),
]);

const mentionSchema = z.object({
  kind: z.string(),
  text: z.string(),
  normalized: z.string().optional(),
});

const regulationsSchema = z
  .union([z.array(z.string()), z.string()])
  .transform(value => (Array.isArray(value) ? value : value.split(/[,;]/)));

export const rawRecordSchema = z.object({
  incidentId: z.union([z.string(), z.number()]).transform(id => String(id).trim()).pipe(z.string().min(1, 'incidentId is empty')),
  narrative: z.string({ required_error: 'narrative is missing' }).transform(s => s.trim()).pipe(z.string().min(1, 'narrative is empty')),
  title: optionalText,
  eventDate: optionalText,
  facility: facilitySchema.optional(),
  system: optionalText,
  mentions: z.array(mentionSchema).default([]),
  regulations: regulationsSchema.default([]),
});

export type RawRecord = z.input<typeof rawRecordSchema>;

export interface RecordLine {
  line: number;
  text: string;
}

export interface RejectedRecord {
  line?: number;
  incidentId?: string;
  reason: string;
}

export interface ValidationResult {
  records: IncidentRecord[];
  rejected: RejectedRecord[];
}

const incidentIdOf = (raw: unknown): string | undefined => {
  if (typeof raw !== 'object' || raw === null || !('incidentId' in raw)) return undefined;
  const id = raw.incidentId;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
};

export class RecordValidator {
  validateLine(text: string): IncidentRecord {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new MalformedRecordError(`Invalid JSON: ${errorMessage(error)}`);
    }
    return this.validateRecord(raw);
  }

  validateRecord(raw: unknown): IncidentRecord {
    const parsed = rawRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
        .join('; ');
      throw new MalformedRecordError(reason, incidentIdOf(raw), parsed.error.issues);
    }

    const record = parsed.data;
    const mentions: EntityMention[] = [];

    const addMention = (kind: MentionKind, rawText: string, normalizedHint?: string) => {
      const text = collapseWhitespace(rawText);
      if (!text) return;
      if (kind === 'Regulation' && MISSING_CODES.has(normalizeText(text))) return;
      const normalized = normalizeText(normalizedHint ?? '') || normalizeText(text);
      if (!normalized) return;
      mentions.push({
        id: `${record.incidentId}#${mentions.length}`,
        incidentId: record.incidentId,
        kind,
        text,
        normalized,
      });
    };

    for (const mention of record.mentions) {
      const kind = this.resolveKind(mention.kind);
      if (!kind) {
        throw new MalformedRecordError(`Unrecognized mention kind: ${mention.kind}`, record.incidentId, {
          kind: mention.kind,
        });
      }
      addMention(kind, mention.text, mention.normalized);
    }

    for (const code of record.regulations) {
      addMention('Regulation', code);
    }

    return {
      incidentId: record.incidentId,
      narrative: record.narrative,
      title: record.title,
      eventDate: record.eventDate,
      facility: this.toFacility(record.facility),
      system: record.system,
      mentions,
    };
  }

  validateBatch(lines: RecordLine[]): ValidationResult {
    const records: IncidentRecord[] = [];
    const rejected: RejectedRecord[] = [];
    const seen = new Set<string>();

    for (const { line, text } of lines) {
      try {
        const record = this.validateLine(text);
        if (seen.has(record.incidentId)) {
          throw new MalformedRecordError('duplicate incidentId', record.incidentId);
        }
        seen.add(record.incidentId);
        records.push(record);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) throw error;
        logger.warn({ line, incidentId: error.incidentId, reason: error.message }, 'Skipping malformed record');
        rejected.push({ line, incidentId: error.incidentId, reason: error.message });
      }
    }

    logger.info({ accepted: records.length, rejected: rejected.length }, 'Record validation complete');
    return { records, rejected };
  }

  private resolveKind(kind: string): MentionKind | undefined {
    const trimmed = kind.trim();
    if (isMentionKind(trimmed)) return trimmed;
    return KIND_ALIASES[trimmed];
  }

  private toFacility(facility: { name: string; unit?: string | number } | undefined): Facility | undefined {
    if (!facility) return undefined;
    const name = collapseWhitespace(facility.name);
    if (!name) return undefined;
    const unit = facility.unit === undefined ? '' : collapseWhitespace(String(facility.unit));
    return unit ? { name, unit } : { name };
  }
}

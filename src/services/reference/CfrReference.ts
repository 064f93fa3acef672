import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import { createLogger } from '../../utils/logger.js';
import { compareSpecificity, formatCfrCitation, parseCfrCitation, regulationKey } from '../ingestion/cfr.js';
import type { RegulationNodeWrite } from '../graph/GraphRepository.interface.js';

const logger = createLogger('cfr-reference');

export interface CfrReferenceEntry {
  code: string;
  /** Canonical identifier the reference assigns to `code`, when it names one */
  canonical?: string;
  upperClass: string | null;
  lowerClass: string | null;
}

export type CfrReferenceRow = Record<string, unknown>;

const cell = (row: CfrReferenceRow, ...columns: string[]): string => {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== null && String(value).trim() !== '') {
      return String(value).trim();
    }
  }
  return '';
};

export class CfrReference {
  private entries = new Map<string, CfrReferenceEntry>();

  static empty(): CfrReference {
    return new CfrReference();
  }

  static fromRows(rows: CfrReferenceRow[]): CfrReference {
    const reference = new CfrReference();
    for (const row of rows) {
      const code = cell(row, 'CFR', 'cfr', 'code');
      if (!code) continue;
      const canonical = cell(row, 'canonical', 'Canonical');
      reference.add({
        code,
        canonical: canonical || undefined,
        upperClass: cell(row, 'class_1', 'upper') || null,
        lowerClass: cell(row, 'class_2', 'lower') || null,
      });
    }
    return reference;
  }

  add(entry: CfrReferenceEntry): void {
    const key = regulationKey(entry.code);
    if (!key) return;
    if (this.entries.has(key)) {
      logger.debug({ code: entry.code, key }, 'Duplicate CFR reference row, keeping first');
      return;
    }
    this.entries.set(key, entry);
  }

  get(key: string): CfrReferenceEntry | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * One Regulation node per entry, keyed the way incident citations of that
   * entry resolve: the more specific of the code and its canonical form.
   */
  regulationNodes(): RegulationNodeWrite[] {
    return [...this.entries].map(([key, entry]) => {
      const parsed = parseCfrCitation(entry.code);
      const canonical = entry.canonical ? parseCfrCitation(entry.canonical) : null;
      const citation = canonical && (!parsed || compareSpecificity(canonical, parsed) > 0) ? canonical : parsed;
      const name = citation ? formatCfrCitation(citation) : entry.code;
      return {
        key: citation ? name : key,
        name,
        aliases: entry.code === name ? [] : [entry.code],
        properties: { upperClass: entry.upperClass, lowerClass: entry.lowerClass },
      };
    });
  }
}

export async function loadCfrReference(filePath: string | undefined): Promise<CfrReference> {
  if (!filePath) {
    logger.info('No CFR reference configured, regulations resolve by citation format only');
    return CfrReference.empty();
  }

  const buffer = await readFile(filePath);
  // raw: keep "50.720" and friends as text instead of numbers
  const workbook = XLSX.read(buffer, { type: 'buffer', raw: true });
  const rows: CfrReferenceRow[] = [];
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    rows.push(...XLSX.utils.sheet_to_json<CfrReferenceRow>(sheet, { raw: false, defval: '' }));
  }

  const reference = CfrReference.fromRows(rows);
  logger.info({ filePath, rows: rows.length, entries: reference.size }, 'Loaded CFR reference');
  return reference;
}

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../../utils/logger.js';
import type { SimilarityLink } from '../../domain/entities/SimilarityLink.js';

export const LINKED_INCIDENTS_HEADER = ['incident_a', 'incident_b', 'similarity'] as const;

export function formatLinkedIncidentsCsv(links: SimilarityLink[], precision: number): string {
  // Scores go in as text so the sheet keeps the fixed precision
  const rows: string[][] = [
    [...LINKED_INCIDENTS_HEADER],
    ...links.map(link => [link.incidentA, link.incidentB, link.score.toFixed(precision)]),
  ];
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  return `${XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n', blankrows: false })}\n`;
}

export async function writeLinkedIncidents(
  filePath: string,
  links: SimilarityLink[],
  precision: number
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, formatLinkedIncidentsCsv(links, precision), 'utf-8');
  logger.info({ filePath, links: links.length }, 'Wrote linked incidents');
}

import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import type { RecordLine } from '../ingestion/RecordValidator.js';

/** Non-blank lines of a JSON Lines document, numbered from 1 */
export const splitRecordLines = (content: string): RecordLine[] =>
  content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((text, index) => ({ line: index + 1, text: text.trim() }))
    .filter(({ text }) => text.length > 0);

export async function readRecordLines(filePath: string): Promise<RecordLine[]> {
  const content = await readFile(filePath, 'utf-8');
  const lines = splitRecordLines(content);
  logger.info({ filePath, lines: lines.length }, 'Read incident records');
  return lines;
}

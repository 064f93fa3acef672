import { normalizeText } from './normalization.js';

export interface CfrCitation {
  title: number;
  part: number;
  /** Section number with its optional letter suffix, e.g. `72` or `55a` */
  section: string;
  paragraphs: string[];
}

const DEFAULT_TITLE = 10;

const CFR_PATTERN =
  /^(?:(\d+)\s*C\.?\s*F\.?\s*R\.?)?\s*(?:§+|part\b|sec(?:tion|t?\.)?)?\s*0*(\d+)\s*[.\-:\s]\s*0*(\d+)\s*([a-z]?)\s*((?:\(\s*[a-z0-9]+\s*\)\s*)*)$/i;

const PARAGRAPH_PATTERN = /\(\s*([a-z0-9]+)\s*\)/gi;

// Fourth-level paragraphs are capital letters: 50.72(b)(3)(v)(A)
const paragraphCase = (designator: string, depth: number): string =>
  depth === 3 ? designator.toUpperCase() : designator.toLowerCase();

export function parseCfrCitation(text: string): CfrCitation | null {
  const match = CFR_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, title, part, section, suffix, paragraphText] = match;
  const paragraphs = [...(paragraphText ?? '').matchAll(PARAGRAPH_PATTERN)].map((m, depth) =>
    paragraphCase(m[1], depth)
  );

  return {
    title: title ? parseInt(title, 10) : DEFAULT_TITLE,
    part: parseInt(part, 10),
    section: `${parseInt(section, 10)}${(suffix ?? '').toLowerCase()}`,
    paragraphs,
  };
}

export const formatCfrCitation = (citation: CfrCitation): string =>
  `${citation.title} CFR ${citation.part}.${citation.section}${citation.paragraphs.map(p => `(${p})`).join('')}`;

/** Positive when `a` is more specific than `b` */
export const compareSpecificity = (a: CfrCitation, b: CfrCitation): number =>
  a.paragraphs.length - b.paragraphs.length || formatCfrCitation(a).length - formatCfrCitation(b).length;

/** True when `narrow` extends `broad` with at least one more paragraph level */
export function isCitationPrefix(broad: CfrCitation, narrow: CfrCitation): boolean {
  if (broad.title !== narrow.title || broad.part !== narrow.part || broad.section !== narrow.section) {
    return false;
  }
  if (broad.paragraphs.length >= narrow.paragraphs.length) return false;
  return broad.paragraphs.every((p, i) => p === narrow.paragraphs[i]);
}

/** Natural key of a regulation code: canonical citation, or the generic text key when it does not parse */
export function regulationKey(code: string): string {
  const citation = parseCfrCitation(code);
  return citation ? formatCfrCitation(citation) : normalizeText(code);
}

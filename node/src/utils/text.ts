// Vietnamese-aware text helpers shared by extraction, parsing and lexical scoring.

/** NFC, lowercase, collapsed whitespace. Every pattern table is matched against this form. */
export function normalizeText(s: string | null | undefined): string {
  if (!s) return '';
  return s.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Strip Vietnamese diacritics (`Hải Phòng` → `hai phong`); `đ` has no decomposition so it is mapped by hand. */
export function foldDiacritics(s: string): string {
  return s
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/đ/g, 'd')
    .replace(/Đ/g, 'D')
    .normalize('NFC');
}

export function foldedText(s: string | null | undefined): string {
  return foldDiacritics(normalizeText(s));
}

const WORD_RE = /[\p{L}\p{N}]+/gu;

/** Letter/number runs of already-normalized text. */
export function words(normalized: string): string[] {
  return normalized.match(WORD_RE) ?? [];
}

export function charLength(s: string): number {
  return Array.from(s).length;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// JS `\b` only knows ASCII word characters, so word edges are spelled out with Unicode classes.
const WORD_START = '(?<![\\p{L}\\p{N}])';
const WORD_END = '(?![\\p{L}\\p{N}])';

/** Regex source (may contain alternation and `.*`) matched only at word edges. */
export function compilePattern(source: string): RegExp {
  return new RegExp(`${WORD_START}(?:${source})${WORD_END}`, 'gu');
}

/** Literal phrase matched only at word edges. */
export function compilePhrase(phrase: string): RegExp {
  return compilePattern(escapeRegExp(normalizeText(phrase)));
}

export function countMatches(re: RegExp, text: string): number {
  re.lastIndex = 0;
  return Array.from(text.matchAll(re)).length;
}

export function hasMatch(re: RegExp, text: string): boolean {
  re.lastIndex = 0;
  const found = re.test(text);
  re.lastIndex = 0;
  return found;
}

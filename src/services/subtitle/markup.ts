import { type CueLine, type Segment } from '@/types/subtitle';

/**
 * Formatting markers, matched as bracket pairs:
 * - HTML-like tags: `<i>`, `</i>`, `<b>`, `<u>`, `<font color="#ffff00">`, `</font>`
 * - ASS override blocks: `{\an8}`, `{\i1}`
 * A `<` or `{` without its partner is plain text.
 */
const TAG_PATTERN = /<\/?[a-zA-Z][^<>]*>|\{\\[^{}]*\}/g;

const LETTER_PATTERN = /\p{L}/u;

export const tokenizeLine = (line: string): CueLine => {
  const segments: Segment[] = [];
  let cursor = 0;

  for (const match of line.matchAll(TAG_PATTERN)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: 'text', value: line.slice(cursor, start) });
    }
    segments.push({ kind: 'tag', value: match[0] });
    cursor = start + match[0].length;
  }

  if (cursor < line.length) {
    segments.push({ kind: 'text', value: line.slice(cursor) });
  }
  return segments;
};

export const renderLine = (segments: CueLine): string => segments.map((s) => s.value).join('');

/**
 * Only text with at least one letter goes to a backend.
 * Digits, music notes, dashes and ellipses are left as they are.
 */
export const isTranslatable = (text: string): boolean => LETTER_PATTERN.test(text);

/**
 * Separates surrounding whitespace so it can be reattached after translation:
 * `" world "` → `{ leading: ' ', core: 'world', trailing: ' ' }`
 */
export const splitPadding = (text: string): { leading: string; core: string; trailing: string } => {
  const leading = text.match(/^\s*/)?.[0] ?? '';
  const rest = text.slice(leading.length);
  const trailing = rest.match(/\s*$/)?.[0] ?? '';
  return { leading, core: rest.slice(0, rest.length - trailing.length), trailing };
};

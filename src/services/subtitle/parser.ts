import {
  type Cue,
  type LineEnding,
  type ParseOptions,
  type SubtitleDocument,
} from '@/types/subtitle';
import { parseTimingLine, TIMING_LINE_PATTERN } from '@/services/subtitle/time';
import { tokenizeLine } from '@/services/subtitle/markup';
import { SubtitleParseError } from '@/services/utils/errors';

const BOM = '\uFEFF';

const toLineEnding = (terminator: string): LineEnding =>
  terminator === '\r\n' ? '\r\n' : terminator === '\r' ? '\r' : '\n';

interface SourceLines {
  lines: string[];
  /** `endings[k]` terminates `lines[k]`; the last line has none without a final newline */
  endings: LineEnding[];
  finalNewline: boolean;
}

const splitLines = (body: string): SourceLines => {
  const lines: string[] = [];
  const endings: LineEnding[] = [];
  const pattern = /\r\n|\n|\r/g;
  let start = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(body)) !== null) {
    lines.push(body.slice(start, match.index));
    endings.push(toLineEnding(match[0]));
    start = match.index + match[0].length;
  }
  const finalNewline = lines.length > 0 && start === body.length;
  if (!finalNewline) lines.push(body.slice(start));
  return { lines, endings, finalNewline };
};

const isBlank = (line: string): boolean => line.trim() === '';

/**
 * Parses one block. `firstLine` is the 1-based source line of the index line.
 */
const parseBlock = (
  lines: string[],
  block: number,
  firstLine: number,
  separator: string[],
  lineEndings: LineEnding[],
  options: ParseOptions
): Cue => {
  const [indexLine, ...rest] = lines;

  if (TIMING_LINE_PATTERN.test(indexLine.trim())) {
    throw new SubtitleParseError('missing-index', block, firstLine);
  }
  const indexText = indexLine.trim();
  if (!/^\d+$/.test(indexText) || parseInt(indexText, 10) === 0) {
    throw new SubtitleParseError('invalid-index', block, firstLine, indexText);
  }

  if (rest.length === 0) {
    throw new SubtitleParseError('missing-timing', block, firstLine + 1);
  }
  const [timingLine, ...textLines] = rest;
  const timing = parseTimingLine(timingLine);
  if (!timing) {
    // A line without an arrow is text where the timestamp should be
    const reason = timingLine.includes('-->') ? 'invalid-timing' : 'missing-timing';
    throw new SubtitleParseError(reason, block, firstLine + 1, timingLine.trim());
  }

  if (textLines.length === 0 && !options.allowEmptyCues) {
    throw new SubtitleParseError('missing-text', block, firstLine + 2);
  }

  return {
    index: parseInt(indexText, 10),
    startTime: timing.start,
    endTime: timing.end,
    lines: textLines.map(tokenizeLine),
    layout: { indexLine, timingLine, separator, lineEndings },
  };
};

/**
 * Parses SRT content into a document.
 *
 * Blocks are separated by one or more blank lines. Every block needs an index line,
 * a `HH:MM:SS,mmm --> HH:MM:SS,mmm` timing line and at least one text line.
 * The first malformed block fails the whole parse with a {@link SubtitleParseError}.
 *
 * The terminator of every line, BOM, blank-line runs and trailing whitespace are
 * recorded so that `serializeSrt(parseSrt(x)) === x`, mixed line endings included.
 */
export const parseSrt = (content: string, options: ParseOptions = {}): SubtitleDocument => {
  const bom = content.startsWith(BOM);
  const body = bom ? content.slice(BOM.length) : content;
  const { lines, endings, finalNewline } = splitLines(body);
  const eol = endings[0] ?? '\n';

  const cues: Cue[] = [];
  let separator: string[] = [];
  let separatorStart = 0;
  let block = 0;
  let i = 0;

  while (i < lines.length) {
    if (isBlank(lines[i])) {
      separator.push(lines[i]);
      i++;
      continue;
    }

    const start = i;
    while (i < lines.length && !isBlank(lines[i])) i++;
    block++;
    const blockEndings = endings.slice(separatorStart, i);
    cues.push(parseBlock(lines.slice(start, i), block, start + 1, separator, blockEndings, options));
    separator = [];
    separatorStart = i;
  }

  if (cues.length === 0) {
    throw new SubtitleParseError('empty-document', 1, 1);
  }

  return {
    cues,
    eol,
    bom,
    trailer: separator,
    trailerEndings: endings.slice(separatorStart),
    finalNewline,
    renumbered: false,
  };
};

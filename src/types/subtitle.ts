/**
 * A run of characters inside a cue line.
 * - `text`: plain text, the only thing ever sent for translation
 * - `tag`: an opaque formatting marker such as `<i>`, `</font>` or `{\an8}`
 */
export type Segment = { kind: 'text'; value: string } | { kind: 'tag'; value: string };

export type CueLine = Segment[];

/** Raw source lines kept so that serialization reproduces the input byte for byte */
export interface CueLayout {
  indexLine: string;
  timingLine: string;
  /** Blank (or whitespace-only) lines preceding this block */
  separator: string[];
  /**
   * Terminator of each source line of the block, in order: separator lines, index
   * line, timing line, text lines. Lines without an entry take the document `eol`.
   */
  lineEndings?: LineEnding[];
}

export interface Cue {
  index: number;
  startTime: string; // Format: HH:MM:SS,mmm
  endTime: string; // Format: HH:MM:SS,mmm
  lines: CueLine[];
  layout: CueLayout;
}

export type LineEnding = '\n' | '\r\n' | '\r';

export interface SubtitleDocument {
  cues: Cue[];
  /** First line ending of the source; used for lines that have none recorded */
  eol: LineEnding;
  bom: boolean;
  /** Blank lines after the last block */
  trailer: string[];
  trailerEndings?: LineEnding[];
  finalNewline: boolean;
  renumbered: boolean;
}

export interface ParseOptions {
  /** Accept blocks that have an index and timing line but no text */
  allowEmptyCues?: boolean;
}

export interface SerializeOptions {
  renumber?: boolean;
}

export type ParseErrorReason =
  | 'empty-document'
  | 'missing-index'
  | 'invalid-index'
  | 'missing-timing'
  | 'invalid-timing'
  | 'missing-text';

import { type Cue, type CueLine, type SubtitleDocument } from '@/types/subtitle';
import { renderLine, tokenizeLine } from '@/services/subtitle/markup';
import { formatTimestamp } from '@/services/subtitle/time';

/** The cue's text as it would appear in the file */
export const cueText = (cue: Cue): string => cue.lines.map(renderLine).join('\n');

export interface CueInit {
  index: number;
  /** Milliseconds or an HH:MM:SS,mmm string */
  start: number | string;
  end: number | string;
  text: string;
}

/**
 * Builds a cue with canonical layout (`index`, `start --> end`, one blank line before it
 * unless it is the first cue).
 */
export const createCue = (init: CueInit, first = false): Cue => {
  const startTime = typeof init.start === 'number' ? formatTimestamp(init.start) : init.start;
  const endTime = typeof init.end === 'number' ? formatTimestamp(init.end) : init.end;
  const lines: CueLine[] = init.text === '' ? [] : init.text.split('\n').map(tokenizeLine);
  return {
    index: init.index,
    startTime,
    endTime,
    lines,
    layout: {
      indexLine: String(init.index),
      timingLine: `${startTime} --> ${endTime}`,
      separator: first ? [] : [''],
    },
  };
};

export const createDocument = (cues: CueInit[]): SubtitleDocument => ({
  cues: cues.map((cue, i) => createCue(cue, i === 0)),
  eol: '\n',
  bom: false,
  trailer: [],
  finalNewline: true,
  renumbered: false,
});

/**
 * Returns a copy numbered 1..n. Use after cues were added or removed.
 */
export const renumberDocument = (doc: SubtitleDocument): SubtitleDocument => ({
  ...doc,
  cues: doc.cues.map((cue, position) => ({
    ...cue,
    index: position + 1,
    layout: { ...cue.layout, indexLine: String(position + 1) },
  })),
  renumbered: true,
});

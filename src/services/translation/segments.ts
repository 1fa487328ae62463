import { type SubtitleDocument } from '@/types/subtitle';
import { isTranslatable, splitPadding } from '@/services/subtitle/markup';

/**
 * Position of one translatable text segment, with the whitespace around it kept aside.
 */
export interface SegmentRef {
  /** Position in the flat list returned by {@link collectSegments} */
  id: number;
  cuePosition: number;
  cueIndex: number;
  line: number;
  segment: number;
  leading: string;
  core: string;
  trailing: string;
}

export interface CollectedSegments {
  refs: SegmentRef[];
  /** Non-empty text segments without letters */
  skipped: number;
}

/**
 * Walks the document left to right. Tags, empty cues and text without letters
 * produce no refs.
 */
export function collectSegments(doc: SubtitleDocument): CollectedSegments {
  const refs: SegmentRef[] = [];
  let skipped = 0;

  doc.cues.forEach((cue, cuePosition) => {
    cue.lines.forEach((line, lineNumber) => {
      line.forEach((segment, segmentNumber) => {
        if (segment.kind !== 'text' || segment.value === '') return;
        if (!isTranslatable(segment.value)) {
          skipped++;
          return;
        }
        refs.push({
          id: refs.length,
          cuePosition,
          cueIndex: cue.index,
          line: lineNumber,
          segment: segmentNumber,
          ...splitPadding(segment.value),
        });
      });
    });
  });

  return { refs, skipped };
}

/** Groups refs by cue, keeping document order within and across groups */
export function groupByCue(refs: SegmentRef[]): SegmentRef[][] {
  const groups: SegmentRef[][] = [];
  let current: SegmentRef[] = [];
  for (const ref of refs) {
    if (current.length > 0 && current[0].cuePosition !== ref.cuePosition) {
      groups.push(current);
      current = [];
    }
    current.push(ref);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/** A translation must stay on the line it came from */
const flattenLineBreaks = (text: string): string => text.trim().replace(/\s*[\r\n]+\s*/g, ' ');

/**
 * Returns a new document with each ref's text replaced by its translation.
 * Refs whose translation is `undefined` keep their original text.
 */
export function applyTranslations(
  doc: SubtitleDocument,
  refs: SegmentRef[],
  translations: (string | undefined)[]
): SubtitleDocument {
  const replacements = new Map<string, string>();
  for (const ref of refs) {
    const translated = translations[ref.id];
    if (translated === undefined) continue;
    replacements.set(
      `${ref.cuePosition}:${ref.line}:${ref.segment}`,
      ref.leading + flattenLineBreaks(translated) + ref.trailing
    );
  }

  return {
    ...doc,
    cues: doc.cues.map((cue, cuePosition) => ({
      ...cue,
      lines: cue.lines.map((line, lineNumber) =>
        line.map((segment, segmentNumber) => {
          const value = replacements.get(`${cuePosition}:${lineNumber}:${segmentNumber}`);
          return value === undefined ? segment : { ...segment, value };
        })
      ),
    })),
  };
}

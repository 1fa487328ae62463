import { type LineEnding, type SerializeOptions, type SubtitleDocument } from '@/types/subtitle';
import { renderLine } from '@/services/subtitle/markup';

/**
 * Serializes a document back to SRT text.
 * Index lines are written verbatim unless renumbering is requested (or the
 * document was renumbered), in which case they run 1..n.
 */
export const serializeSrt = (doc: SubtitleDocument, options: SerializeOptions = {}): string => {
  const renumber = options.renumber ?? doc.renumbered;
  const lines: string[] = [];
  const endings: (LineEnding | undefined)[] = [];
  const push = (text: string[], recorded: LineEnding[] = []) => {
    text.forEach((line, k) => {
      lines.push(line);
      endings.push(recorded[k]);
    });
  };

  doc.cues.forEach((cue, position) => {
    push(
      [
        ...cue.layout.separator,
        renumber ? String(position + 1) : cue.layout.indexLine,
        cue.layout.timingLine,
        ...cue.lines.map(renderLine),
      ],
      cue.layout.lineEndings
    );
  });
  push(doc.trailer, doc.trailerEndings);

  const last = lines.length - 1;
  const body = lines
    .map((line, k) => (k < last || doc.finalNewline ? line + (endings[k] ?? doc.eol) : line))
    .join('');
  return doc.bom ? `\uFEFF${body}` : body;
};

/**
 * Subtitle files arrive as UTF-8 (with or without BOM) or as legacy ISO-8859-1 text.
 * The BOM is kept in the decoded string so the parser can record and reproduce it.
 */
export const decodeSubtitleBytes = (bytes: Uint8Array): string => {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    // TextDecoder('latin1') is windows-1252; Buffer maps every byte to the same code point
    return Buffer.from(bytes).toString('latin1');
  }
};

export const encodeSubtitleText = (text: string): Buffer => Buffer.from(text, 'utf-8');

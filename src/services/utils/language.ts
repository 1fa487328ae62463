/**
 * Language Utilities
 *
 * Language codes are ISO 639-1 / 639-3 primaries with optional BCP 47 subtags
 * (`pt-BR`, `zh-Hant`), which is what LibreTranslate and Argos packages use.
 */

/** Source code that asks the API backend to detect the language */
export const AUTO_DETECT = 'auto';

const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(?:-[a-z0-9]{2,8})*$/i;

export function isValidLanguageCode(code: string): boolean {
  return LANGUAGE_CODE_PATTERN.test(code);
}

/**
 * Canonical casing: primary lower-case, 4-letter script title-case,
 * 2-letter region upper-case. `PT-br` → `pt-BR`, `zh-hant` → `zh-Hant`.
 */
export function normalizeLanguageCode(code: string): string {
  const [primary, ...subtags] = code.trim().split('-');
  const normalized = subtags.map((tag) => {
    if (tag.length === 4) return tag.charAt(0).toUpperCase() + tag.slice(1).toLowerCase();
    if (tag.length === 2) return tag.toUpperCase();
    return tag.toLowerCase();
  });
  return [primary.toLowerCase(), ...normalized].join('-');
}

/** Primary language subtag: `pt-BR` → `pt` */
export function primaryLanguage(code: string): string {
  return code.split('-')[0].toLowerCase();
}

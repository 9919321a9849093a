/**
 * Localization support for command definitions
 *
 * Provides:
 * - Resolution of LocalizedText values for a language
 * - Language detection from the system locale
 * - Construction helpers used by the loader and built-in definitions
 */

import type { LocalizedText } from '../catalog/types.js';

/** Language used when a translation map has no entry for the requested code */
export const DEFAULT_LANGUAGE = 'en';

/**
 * Resolve a LocalizedText to a string for `lang`.
 *
 * Plain text is returned as-is. A translation map is tried for the exact
 * code, then the default language, then its lexicographically first key.
 * Never throws; an empty map resolves to ''.
 *
 * @example
 * ```typescript
 * const text = localized({ en: 'Record changes', zh: '记录变更' });
 * resolveText(text, 'zh'); // '记录变更'
 * resolveText(text, 'fr'); // 'Record changes'
 * ```
 */
export function resolveText(text: LocalizedText, lang: string): string {
  if (text.kind === 'plain') {
    return text.text;
  }

  const { translations } = text;
  const exact = ownTranslation(translations, lang);
  if (exact !== undefined) {
    return exact;
  }

  const fallback = ownTranslation(translations, DEFAULT_LANGUAGE);
  if (fallback !== undefined) {
    return fallback;
  }

  const firstKey = Object.keys(translations).sort()[0];
  return firstKey !== undefined ? ownTranslation(translations, firstKey) ?? '' : '';
}

// Codes such as "constructor" must not reach Object.prototype
function ownTranslation(translations: Readonly<Record<string, string>>, lang: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(translations, lang) ? translations[lang] : undefined;
}

export function plain(text: string): LocalizedText {
  return { kind: 'plain', text };
}

export function localized(translations: Record<string, string>): LocalizedText {
  return { kind: 'localized', translations: { ...translations } };
}

/**
 * Normalize a locale string to a bare language code
 * ("zh_CN.UTF-8" -> "zh", "en-US" -> "en"). Returns undefined for
 * empty values and the POSIX "C"/"POSIX" locales.
 */
export function normalizeLanguage(locale: string | undefined): string | undefined {
  if (!locale) {
    return undefined;
  }

  const code = locale.split(/[_.@-]/)[0]?.trim().toLowerCase();
  if (!code || code === 'c' || code === 'posix') {
    return undefined;
  }
  return code;
}

/**
 * Detect the display language from the environment.
 * Only Chinese has bundled translations besides English, so any other
 * locale maps to the default language.
 */
export function detectSystemLanguage(env: NodeJS.ProcessEnv = process.env): string {
  const code = normalizeLanguage(env.LC_ALL || env.LC_MESSAGES || env.LANG);
  return code === 'zh' ? 'zh' : DEFAULT_LANGUAGE;
}

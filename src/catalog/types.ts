/**
 * Command catalog data model
 *
 * A catalog is a forest of CommandSpec trees. Every node owns its children
 * directly; catalogs are frozen after construction and replaced wholesale.
 */

// ============================================================================
// Localized text
// ============================================================================

/** A single string shown for every language */
export interface PlainText {
  readonly kind: 'plain';
  readonly text: string;
}

/** Per-language strings keyed by language code ("en", "zh", ...) */
export interface TranslatedText {
  readonly kind: 'localized';
  readonly translations: Readonly<Record<string, string>>;
}

export type LocalizedText = PlainText | TranslatedText;

// ============================================================================
// Command specs
// ============================================================================

export interface FlagSpec {
  /** Long name without dashes, rendered as `--name` */
  readonly long?: string;
  /** Single character, rendered as `-c` */
  readonly short?: string;
  readonly description: LocalizedText;
  /** A value-taking flag can only end a short-flag chain */
  readonly takesValue: boolean;
}

export interface CommandExample {
  /** Literal invocation, e.g. `git commit -am "fix"` */
  readonly cmd: string;
  readonly scenario: LocalizedText;
}

/** A commonly used short-flag combination such as `xzf` for tar */
export interface FlagCombo {
  readonly combo: string;
  readonly description: LocalizedText;
}

export interface CommandSpec {
  readonly name: string;
  readonly description: LocalizedText;
  readonly subcommands: readonly CommandSpec[];
  readonly flags: readonly FlagSpec[];
  readonly examples: readonly CommandExample[];
  readonly flagCombos: readonly FlagCombo[];
  /** Offer filesystem entries when nothing structured matches */
  readonly pathCompletion: boolean;
}

// ============================================================================
// Engine outputs
// ============================================================================

export type SuggestionKind =
  | 'command'
  | 'subcommand'
  | 'flag'
  | 'combo'
  | 'example'
  | 'path'
  | 'search';

export interface Suggestion {
  /** Replacement text */
  text: string;
  kind: SuggestionKind;
  /** Resolved description for the active language, if any */
  description?: string;
  /** Start offset (inclusive) of the replaced span in the input line */
  replaceStart: number;
  /** End offset (exclusive) of the replaced span, i.e. the cursor */
  replaceEnd: number;
  /** Whether the front end should append a space after accepting */
  appendSpace: boolean;
}

export type SearchFieldKind = 'name' | 'description' | 'example';

export interface SearchResult {
  /** Command path, e.g. ['git', 'checkout'] */
  path: string[];
  fieldKind: SearchFieldKind;
  score: number;
  /** Line shown in the result list */
  display: string;
  /** Text loaded into the input buffer when the result is executed or edited */
  invocation: string;
  /** Text the query matched against */
  matchedText: string;
}

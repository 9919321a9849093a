/**
 * Public library surface
 */

export * from './catalog/types.js';
export { Catalog, validateCommands, type ResolvedExample } from './catalog/catalog.js';
export {
  DefinitionLoader,
  loadCatalog,
  definitionSources,
  parseDefinitionFile,
  type DefinitionOrigin,
  type DefinitionSource,
  type LoadDiagnostic,
  type LoadResult,
  type LoaderOptions,
} from './catalog/loader.js';
export { builtinDefinitions } from './catalog/builtin-definitions.js';
export { complete, resolveCommand, type CompleteOptions, type Resolution } from './completion/completer.js';
export { tokenize, resolveContext, type Token, type CompletionContext } from './completion/tokenizer.js';
export { fuzzyMatch, fuzzyScore, type FuzzyMatch } from './search/fuzzy.js';
export { SearchIndex } from './search/search-index.js';
export {
  SearchResultSelector,
  resolveSelection,
  type SelectionAction,
  type SelectorState,
} from './search/result-selector.js';
export { CompletionSession, type CompletionSessionOptions } from './session/completion-session.js';
export { DEFAULT_LANGUAGE, resolveText, plain, localized, detectSystemLanguage } from './i18n/index.js';
export { loadAppConfig, type AppConfig } from './config/app-config.js';
export * from './errors/index.js';

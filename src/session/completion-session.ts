/**
 * Completion Session
 *
 * Owns the current catalog snapshot with its search index, and the active
 * language. Every engine call receives the snapshot and language explicitly;
 * the session is the only place either changes.
 */

import { EventEmitter } from 'events';
import { Catalog } from '../catalog/catalog.js';
import type { SearchResult, Suggestion } from '../catalog/types.js';
import { complete, type CompleteOptions } from '../completion/completer.js';
import { DEFAULT_LANGUAGE, normalizeLanguage } from '../i18n/index.js';
import { SearchIndex } from '../search/search-index.js';
import { SearchResultSelector } from '../search/result-selector.js';
import { logger } from '../utils/logger.js';

export interface CompletionSessionOptions {
  /** Active language (default: 'en') */
  language?: string;
  /** Input prefix that switches to catalog search (default: '/') */
  searchPrefix?: string;
  /** Default number of search results (default: 20) */
  searchLimit?: number;
  /** Options passed to tree-descent completion */
  completion?: CompleteOptions;
}

export interface CompletionSessionEvents {
  'catalog:replaced': (catalog: Catalog) => void;
  'language:changed': (language: string) => void;
}

interface Snapshot {
  catalog: Catalog;
  index: SearchIndex;
}

export class CompletionSession extends EventEmitter {
  private snapshot: Snapshot;
  private language: string;
  private readonly searchPrefix: string;
  private readonly searchLimit: number;
  private readonly completionOptions: CompleteOptions;

  constructor(catalog: Catalog = Catalog.empty(), options: CompletionSessionOptions = {}) {
    super();
    this.snapshot = { catalog, index: new SearchIndex(catalog) };
    this.language = normalizeLanguage(options.language) ?? DEFAULT_LANGUAGE;
    this.searchPrefix = options.searchPrefix ?? '/';
    this.searchLimit = options.searchLimit ?? 20;
    this.completionOptions = options.completion ?? {};
  }

  get catalog(): Catalog {
    return this.snapshot.catalog;
  }

  getLanguage(): string {
    return this.language;
  }

  setLanguage(language: string): void {
    const normalized = normalizeLanguage(language) ?? DEFAULT_LANGUAGE;
    if (normalized === this.language) {
      return;
    }
    this.language = normalized;
    logger.debug(`Language set to ${normalized}`);
    this.emit('language:changed', normalized);
  }

  /**
   * Swap in a freshly loaded catalog. The search index is rebuilt before the
   * swap so callers never observe a catalog paired with a stale index.
   */
  replaceCatalog(catalog: Catalog): void {
    this.snapshot = { catalog, index: new SearchIndex(catalog) };
    logger.debug(`Catalog replaced (${catalog.size} root command(s))`);
    this.emit('catalog:replaced', catalog);
  }

  isSearchInput(line: string): boolean {
    return line.trimStart().startsWith(this.searchPrefix);
  }

  /**
   * Suggestions for `line` at `cursor`: catalog search when the line starts
   * with the search prefix, tree descent otherwise.
   */
  complete(line: string, cursor: number = line.length): Suggestion[] {
    const { catalog, index } = this.snapshot;

    if (this.isSearchInput(line)) {
      const end = Math.max(0, Math.min(cursor, line.length));
      const prefixEnd = line.indexOf(this.searchPrefix) + this.searchPrefix.length;
      const query = line.slice(prefixEnd, Math.max(prefixEnd, end));
      return index.search(query, this.language, this.searchLimit).map((result) => ({
        text: result.invocation,
        kind: 'search' as const,
        description: `[${result.fieldKind}] ${result.display}`,
        replaceStart: 0,
        replaceEnd: end,
        appendSpace: false,
      }));
    }

    return complete(catalog, line, cursor, this.language, this.completionOptions);
  }

  search(query: string, limit: number = this.searchLimit): SearchResult[] {
    return this.snapshot.index.search(query, this.language, limit);
  }

  /**
   * A selector whose re-queries search this session's current catalog.
   */
  createSelector(limit: number = this.searchLimit): SearchResultSelector {
    return new SearchResultSelector((query) => this.search(query, limit));
  }
}

/**
 * Search-Result Selector
 *
 * After search results are shown, the next input picks what happens:
 *   "N"   run result N (1-based)
 *   "eN"  load result N into the input buffer without running it
 *   ""    cancel
 *   other text searches again
 * An index outside the list cancels.
 */

import type { SearchResult } from '../catalog/types.js';

export type SelectionAction<T = SearchResult> =
  | { type: 'execute'; result: T }
  | { type: 'edit'; result: T }
  | { type: 'cancel' }
  | { type: 'requery'; query: string };

export type SelectorState<T = SearchResult> =
  | { kind: 'idle' }
  | { kind: 'showing'; query: string; results: T[] };

function pick<T>(results: readonly T[], index: string): T | undefined {
  const n = Number.parseInt(index, 10);
  return n >= 1 && n <= results.length ? results[n - 1] : undefined;
}

/**
 * Map a follow-up input to an action on the displayed results.
 */
export function resolveSelection<T>(input: string, results: readonly T[]): SelectionAction<T> {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { type: 'cancel' };
  }

  const execute = /^(\d+)$/.exec(trimmed);
  if (execute) {
    const result = pick(results, execute[1] ?? '');
    return result !== undefined ? { type: 'execute', result } : { type: 'cancel' };
  }

  const edit = /^e(\d+)$/.exec(trimmed);
  if (edit) {
    const result = pick(results, edit[1] ?? '');
    return result !== undefined ? { type: 'edit', result } : { type: 'cancel' };
  }

  return { type: 'requery', query: trimmed };
}

export class SearchResultSelector<T = SearchResult> {
  private current: SelectorState<T> = { kind: 'idle' };

  constructor(private readonly runSearch: (query: string) => T[]) {}

  get state(): SelectorState<T> {
    return this.current;
  }

  /**
   * Run a search and show its results.
   */
  show(query: string): T[] {
    const results = this.runSearch(query);
    this.current = { kind: 'showing', query, results };
    return results;
  }

  /**
   * Feed one line of input. While idle, non-empty input starts a search.
   */
  handle(input: string): SelectionAction<T> {
    if (this.current.kind === 'idle') {
      const query = input.trim();
      if (!query) {
        return { type: 'cancel' };
      }
      this.show(query);
      return { type: 'requery', query };
    }

    const action = resolveSelection(input, this.current.results);
    if (action.type === 'requery') {
      this.show(action.query);
    } else {
      this.current = { kind: 'idle' };
    }
    return action;
  }

  reset(): void {
    this.current = { kind: 'idle' };
  }
}

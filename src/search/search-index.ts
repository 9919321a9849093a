/**
 * Fuzzy Search Index
 *
 * Flattened view of a catalog: one entry per command path, per description
 * and per example. Built once per catalog; localized texts are resolved once
 * per language and cached.
 */

import { resolveText } from '../i18n/index.js';
import type { Catalog } from '../catalog/catalog.js';
import type { LocalizedText, SearchFieldKind, SearchResult } from '../catalog/types.js';
import { fuzzyScore } from './fuzzy.js';

/** Name matches outrank description matches of similar quality */
export const NAME_BOOST = 100;
/** Examples rank slightly below descriptions */
export const EXAMPLE_PENALTY = 10;

interface IndexEntry {
  path: string[];
  pathText: string;
  fieldKind: SearchFieldKind;
  description: LocalizedText;
  /** Example invocation, for example entries */
  cmd?: string;
  /** Example scenario, for example entries */
  scenario?: LocalizedText;
}

interface ResolvedEntry {
  description: string;
  scenario: string;
}

interface Scored {
  result: SearchResult;
  order: number;
}

export class SearchIndex {
  private readonly entries: readonly IndexEntry[];
  private readonly resolved = new Map<string, ResolvedEntry[]>();

  constructor(catalog: Catalog) {
    const entries: IndexEntry[] = [];

    for (const { command, path } of catalog.walk()) {
      const pathText = path.join(' ');
      entries.push({ path, pathText, fieldKind: 'name', description: command.description });
      entries.push({ path, pathText, fieldKind: 'description', description: command.description });
      for (const example of command.examples) {
        entries.push({
          path,
          pathText,
          fieldKind: 'example',
          description: command.description,
          cmd: example.cmd,
          scenario: example.scenario,
        });
      }
    }

    this.entries = entries;
  }

  get size(): number {
    return this.entries.length;
  }

  private resolveFor(lang: string): ResolvedEntry[] {
    let resolved = this.resolved.get(lang);
    if (!resolved) {
      resolved = this.entries.map((entry) => ({
        description: resolveText(entry.description, lang),
        scenario: entry.scenario ? resolveText(entry.scenario, lang) : '',
      }));
      this.resolved.set(lang, resolved);
    }
    return resolved;
  }

  private scoreEntry(entry: IndexEntry, texts: ResolvedEntry, query: string): SearchResult | null {
    const described = (head: string, tail: string): string => (tail ? `${head} - ${tail}` : head);

    switch (entry.fieldKind) {
      case 'name': {
        const score = fuzzyScore(query, entry.pathText);
        if (score === null) return null;
        return {
          path: [...entry.path],
          fieldKind: 'name',
          score: score + NAME_BOOST,
          display: described(entry.pathText, texts.description),
          invocation: entry.pathText,
          matchedText: entry.pathText,
        };
      }

      case 'description': {
        if (!texts.description) return null;
        const score = fuzzyScore(query, texts.description);
        if (score === null) return null;
        return {
          path: [...entry.path],
          fieldKind: 'description',
          score,
          display: described(entry.pathText, texts.description),
          invocation: entry.pathText,
          matchedText: texts.description,
        };
      }

      case 'example': {
        const cmd = entry.cmd ?? '';
        const cmdScore = fuzzyScore(query, cmd);
        const scenarioScore = texts.scenario ? fuzzyScore(query, texts.scenario) : null;
        if (cmdScore === null && scenarioScore === null) return null;

        const useScenario = scenarioScore !== null && (cmdScore === null || scenarioScore > cmdScore);
        const score = (useScenario ? scenarioScore : cmdScore) ?? 0;
        return {
          path: [...entry.path],
          fieldKind: 'example',
          score: Math.max(1, score - EXAMPLE_PENALTY),
          display: texts.scenario ? `${texts.scenario} - ${cmd}` : cmd,
          invocation: cmd,
          matchedText: useScenario ? texts.scenario : cmd,
        };
      }
    }
  }

  /**
   * Search the whole catalog. Results are ordered by descending score,
   * ties by catalog order, one result per invocation text, at most `limit`.
   */
  search(query: string, lang: string, limit: number): SearchResult[] {
    const trimmed = query.trim();
    const max = Number.isFinite(limit) ? Math.floor(limit) : 0;
    if (!trimmed || max <= 0) {
      return [];
    }

    const texts = this.resolveFor(lang);
    const scored: Scored[] = [];

    this.entries.forEach((entry, order) => {
      const resolved = texts[order];
      if (!resolved) return;
      const result = this.scoreEntry(entry, resolved, trimmed);
      if (result) {
        scored.push({ result, order });
      }
    });

    scored.sort((a, b) => b.result.score - a.result.score || a.order - b.order);

    const seen = new Set<string>();
    const results: SearchResult[] = [];
    for (const { result } of scored) {
      if (seen.has(result.invocation)) continue;
      seen.add(result.invocation);
      results.push(result);
      if (results.length >= max) break;
    }
    return results;
  }
}

/**
 * CLI Formatting Tests
 */

import chalk from 'chalk';
import {
  formatAction,
  formatCommandTree,
  formatDiagnostic,
  formatSearchResults,
  formatSuggestion,
} from '../../src/cli/format.js';
import { SearchIndex } from '../../src/search/search-index.js';
import type { SearchResult } from '../../src/catalog/types.js';
import { createTestCatalog, tarCommand } from '../helpers/catalog-fixtures.js';

describe('CLI format', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should format a suggestion with and without description', () => {
    expect(
      formatSuggestion({ text: 'commit', kind: 'subcommand', description: 'Record changes', replaceStart: 4, replaceEnd: 7, appendSpace: true })
    ).toBe('commit  Record changes');
    expect(formatSuggestion({ text: '-am', kind: 'combo', replaceStart: 0, replaceEnd: 2, appendSpace: false })).toBe(
      '-am'
    );
  });

  it('should number search results', () => {
    const results = new SearchIndex(createTestCatalog()).search('gco', 'en', 2);
    expect(formatSearchResults(results)).toBe(
      '1. git commit - Record changes [name]\n2. git config - Get and set options [name]'
    );
  });

  it('should pad result numbers to the widest', () => {
    const result: SearchResult = {
      path: ['ls'],
      fieldKind: 'name',
      score: 1,
      display: 'ls',
      invocation: 'ls',
      matchedText: 'ls',
    };
    const lines = formatSearchResults(Array.from({ length: 10 }, () => result)).split('\n');
    expect(lines[0]).toBe(' 1. ls [name]');
    expect(lines[9]).toBe('10. ls [name]');
  });

  it('should report an empty result list', () => {
    expect(formatSearchResults([])).toBe('No matching commands.');
  });

  it('should describe selection actions', () => {
    const [result] = new SearchIndex(createTestCatalog()).search('gco', 'en', 1);
    if (!result) throw new Error('expected a search result');

    expect(formatAction({ type: 'execute', result })).toBe('run git commit');
    expect(formatAction({ type: 'edit', result })).toBe('edit git commit');
    expect(formatAction({ type: 'cancel' })).toBe('cancelled');
    expect(formatAction({ type: 'requery', query: 'tar' })).toBe('search tar');
  });

  it('should render a command tree with flags', () => {
    expect(formatCommandTree(tarCommand(), 'en')).toEqual([
      'tar  Archive files',
      '  -c  Create',
      '  -x  Extract',
      '  -z  Gzip',
      '  -f <value>  Archive file',
    ]);
  });

  it('should indent subcommands', () => {
    const commit = createTestCatalog().resolve(['git', 'commit']);
    if (!commit) throw new Error('expected git commit');

    expect(formatCommandTree(commit, 'zh', 1)).toEqual([
      '  commit  记录变更',
      '    -a, --all  Stage tracked files',
      '    -m, --message <value>  Commit message',
      '    --amend  Amend last commit',
    ]);
  });

  it('should describe loader diagnostics', () => {
    expect(formatDiagnostic({ kind: 'shadowed', source: 'builtin', command: 'cd', winner: '/defs/cd.yaml' })).toBe(
      'shadowed cd in builtin (using /defs/cd.yaml)'
    );
  });
});

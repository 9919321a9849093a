/**
 * Search-Result Selector Tests
 */

import { SearchResultSelector, resolveSelection } from '../../src/search/result-selector.js';

const results = ['first', 'second', 'third', 'fourth', 'fifth'];

describe('resolveSelection', () => {
  it('should execute a result by 1-based index', () => {
    expect(resolveSelection('2', results)).toEqual({ type: 'execute', result: 'second' });
    expect(resolveSelection(' 3 ', results)).toEqual({ type: 'execute', result: 'third' });
  });

  it('should edit a result with the e prefix', () => {
    expect(resolveSelection('e1', results)).toEqual({ type: 'edit', result: 'first' });
    expect(resolveSelection('e5', results)).toEqual({ type: 'edit', result: 'fifth' });
  });

  it('should cancel on empty input', () => {
    expect(resolveSelection('', results)).toEqual({ type: 'cancel' });
    expect(resolveSelection('  ', results)).toEqual({ type: 'cancel' });
  });

  it('should cancel on an index outside the list', () => {
    expect(resolveSelection('7', results)).toEqual({ type: 'cancel' });
    expect(resolveSelection('0', results)).toEqual({ type: 'cancel' });
    expect(resolveSelection('e9', results)).toEqual({ type: 'cancel' });
    expect(resolveSelection('1', [])).toEqual({ type: 'cancel' });
  });

  it('should treat anything else as a new query', () => {
    expect(resolveSelection('commit', results)).toEqual({ type: 'requery', query: 'commit' });
    expect(resolveSelection('e', results)).toEqual({ type: 'requery', query: 'e' });
    expect(resolveSelection('E1', results)).toEqual({ type: 'requery', query: 'E1' });
    expect(resolveSelection(' git log ', results)).toEqual({ type: 'requery', query: 'git log' });
  });
});

describe('SearchResultSelector', () => {
  let search: jest.Mock<string[], [string]>;
  let selector: SearchResultSelector<string>;

  beforeEach(() => {
    search = jest.fn((query: string) => [`${query}-1`, `${query}-2`]);
    selector = new SearchResultSelector(search);
  });

  it('should start idle', () => {
    expect(selector.state).toEqual({ kind: 'idle' });
  });

  it('should show results for a query', () => {
    expect(selector.show('git')).toEqual(['git-1', 'git-2']);
    expect(selector.state).toEqual({ kind: 'showing', query: 'git', results: ['git-1', 'git-2'] });
  });

  it('should start a search from idle input', () => {
    expect(selector.handle(' tar ')).toEqual({ type: 'requery', query: 'tar' });
    expect(search).toHaveBeenCalledWith('tar');
    expect(selector.state.kind).toBe('showing');
  });

  it('should cancel empty input while idle without searching', () => {
    expect(selector.handle('')).toEqual({ type: 'cancel' });
    expect(search).not.toHaveBeenCalled();
  });

  it('should return to idle after executing', () => {
    selector.show('git');
    expect(selector.handle('2')).toEqual({ type: 'execute', result: 'git-2' });
    expect(selector.state).toEqual({ kind: 'idle' });
  });

  it('should return to idle after editing or cancelling', () => {
    selector.show('git');
    expect(selector.handle('e1')).toEqual({ type: 'edit', result: 'git-1' });
    expect(selector.state.kind).toBe('idle');

    selector.show('git');
    expect(selector.handle('9')).toEqual({ type: 'cancel' });
    expect(selector.state.kind).toBe('idle');
  });

  it('should stay showing with new results on a requery', () => {
    selector.show('git');
    expect(selector.handle('docker')).toEqual({ type: 'requery', query: 'docker' });
    expect(selector.state).toEqual({ kind: 'showing', query: 'docker', results: ['docker-1', 'docker-2'] });
    expect(search).toHaveBeenCalledTimes(2);
  });

  it('should reset to idle', () => {
    selector.show('git');
    selector.reset();
    expect(selector.state).toEqual({ kind: 'idle' });
  });
});

/**
 * Command Catalog Tests
 */

import { Catalog, validateCommands } from '../../src/catalog/catalog.js';
import { CatalogValidationError } from '../../src/errors/index.js';
import { command, createTestCatalog, flag } from '../helpers/catalog-fixtures.js';

describe('Catalog', () => {
  describe('validation', () => {
    it('should reject duplicate sibling names', () => {
      expect(() => new Catalog([command('git', 'a'), command('git', 'b')])).toThrow(CatalogValidationError);
    });

    it('should report the path of a nested duplicate', () => {
      const issues = validateCommands([
        command('git', '', { subcommands: [command('add', ''), command('add', '')] }),
      ]);
      expect(issues).toEqual(['duplicate command "git add"']);
    });

    it('should allow the same name under different parents', () => {
      const catalog = new Catalog([
        command('git', '', { subcommands: [command('config', '')] }),
        command('config', ''),
      ]);
      expect(catalog.commandNames()).toEqual(['git', 'config']);
    });

    it('should reject a flag without a name', () => {
      const issues = validateCommands([command('ls', '', { flags: [flag({ description: 'nameless' })] })]);
      expect(issues).toEqual(['ls flag #1 has neither a long nor a short name']);
    });

    it('should reject malformed flag names', () => {
      const issues = validateCommands([
        command('ls', '', { flags: [flag({ long: 'a' }), flag({ short: 'ab' })] }),
      ]);
      expect(issues).toEqual([
        'ls flag #1 long name "a" must have at least two characters',
        'ls flag #2 short name "ab" must be a single character',
      ]);
    });

    it('should reject names with whitespace', () => {
      expect(validateCommands([command('git log', '')])).toEqual(['command name "git log" contains whitespace']);
    });

    it('should carry every issue on the thrown error', () => {
      try {
        new Catalog([command('a', ''), command('a', ''), command('b', '', { flags: [flag({})] })]);
        throw new Error('expected validation to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(CatalogValidationError);
        if (error instanceof CatalogValidationError) {
          expect(error.issues).toHaveLength(2);
          expect(error.code).toBe('CATALOG_VALIDATION_ERROR');
        }
      }
    });
  });

  describe('queries', () => {
    const catalog = createTestCatalog();

    it('should look up root commands', () => {
      expect(catalog.size).toBe(2);
      expect(catalog.has('git')).toBe(true);
      expect(catalog.has('svn')).toBe(false);
      expect(catalog.get('tar')?.name).toBe('tar');
    });

    it('should resolve full paths exactly', () => {
      expect(catalog.resolve(['git', 'commit'])?.name).toBe('commit');
      expect(catalog.resolve(['git', 'Commit'])).toBeUndefined();
      expect(catalog.resolve(['git', 'commit', 'x'])).toBeUndefined();
      expect(catalog.resolve([])).toBeUndefined();
    });

    it('should list commands with examples', () => {
      expect(catalog.commandsWithExamples()).toEqual(['git commit', 'tar']);
    });

    it('should resolve examples for a path', () => {
      expect(catalog.examplesFor('git  commit', 'en')).toEqual([
        { cmd: 'git commit -m "msg"', scenario: 'Commit with message' },
        { cmd: 'git commit --amend', scenario: 'Amend last commit' },
      ]);
      expect(catalog.examplesFor('git push', 'en')).toEqual([]);
    });

    it('should walk depth-first in catalog order', () => {
      expect(Array.from(catalog.walk(), (entry) => entry.path.join(' '))).toEqual([
        'git',
        'git checkout',
        'git commit',
        'git add',
        'git config',
        'tar',
      ]);
    });
  });

  it('should freeze the command tree', () => {
    const catalog = createTestCatalog();
    const commit = catalog.resolve(['git', 'commit']);
    expect(Object.isFrozen(catalog.roots)).toBe(true);
    expect(Object.isFrozen(commit)).toBe(true);
    expect(Object.isFrozen(commit?.flags[0])).toBe(true);
  });

  it('should build an empty catalog', () => {
    const catalog = Catalog.empty();
    expect(catalog.size).toBe(0);
    expect(catalog.commandsWithExamples()).toEqual([]);
    expect(Array.from(catalog.walk())).toEqual([]);
  });
});

/**
 * Path Completion Tests
 *
 * fs is mocked so directory listing failures can be produced without
 * depending on the permissions of the user running the suite.
 */

import * as path from 'path';
import { listPathEntries, splitPathPrefix } from '../../src/completion/path-completion.js';
import { logger } from '../../src/utils/logger.js';

const mockReaddirSync = jest.fn();
const mockStatSync = jest.fn();

jest.mock('fs', () => ({
  ...jest.requireActual<typeof import('fs')>('fs'),
  readdirSync: (...args: unknown[]) => mockReaddirSync(...args),
  statSync: (...args: unknown[]) => mockStatSync(...args),
}));

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function dirent(name: string, kind: 'file' | 'dir' | 'link') {
  return {
    name,
    isDirectory: () => kind === 'dir',
    isSymbolicLink: () => kind === 'link',
  };
}

function fsError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('splitPathPrefix', () => {
  it('should split the directory part from the name prefix', () => {
    expect(splitPathPrefix('src/comp')).toEqual({ dirPart: 'src/', namePrefix: 'comp' });
    expect(splitPathPrefix('comp')).toEqual({ dirPart: '', namePrefix: 'comp' });
    expect(splitPathPrefix('/')).toEqual({ dirPart: '/', namePrefix: '' });
  });
});

describe('listPathEntries', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should return nothing when the directory cannot be read', () => {
    mockReaddirSync.mockImplementation(() => {
      throw fsError('EACCES', "EACCES: permission denied, scandir '/srv/private'");
    });

    expect(listPathEntries('private/', { cwd: '/srv' })).toEqual([]);
    expect(mockReaddirSync).toHaveBeenCalledWith(path.resolve('/srv', 'private/'), { withFileTypes: true });
    expect(logger.debug).toHaveBeenCalledWith(`Path completion skipped for ${path.resolve('/srv', 'private/')}`, {
      error: "EACCES: permission denied, scandir '/srv/private'",
    });
  });

  it('should keep the typed directory part in each entry', () => {
    mockReaddirSync.mockReturnValue([dirent('lib', 'dir'), dirent('app.ts', 'file')]);

    expect(listPathEntries('src/', { cwd: '/work' })).toEqual([
      { text: 'src/app.ts', isDirectory: false },
      { text: `src/lib${path.sep}`, isDirectory: true },
    ]);
  });

  it('should follow symlinks to directories and treat broken links as files', () => {
    mockReaddirSync.mockReturnValue([dirent('current', 'link'), dirent('stale', 'link')]);
    mockStatSync.mockImplementation((target: string) => {
      if (target.endsWith('stale')) {
        throw fsError('ENOENT', 'no such file or directory');
      }
      return { isDirectory: () => true };
    });

    expect(listPathEntries('', { cwd: '/releases' })).toEqual([
      { text: `current${path.sep}`, isDirectory: true },
      { text: 'stale', isDirectory: false },
    ]);
  });
});

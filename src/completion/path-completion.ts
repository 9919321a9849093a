/**
 * Filesystem entries for path completion.
 *
 * Listing is synchronous and capped; any filesystem failure yields no
 * entries so a completion request can never hang on or fail because of it.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getErrorMessage } from '../errors/definition-error.js';
import { logger } from '../utils/logger.js';

export interface PathEntry {
  /** Completion text: the typed directory part, the entry name, and a separator for directories */
  text: string;
  isDirectory: boolean;
}

export interface PathCompletionOptions {
  /** Directory relative paths resolve against */
  cwd: string;
  /** Maximum number of entries returned */
  maxEntries?: number;
}

export const DEFAULT_MAX_PATH_ENTRIES = 200;

function expandHome(dir: string): string {
  if (dir === '~' || dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return dir;
}

/**
 * Split "src/comp" into the directory part "src/" and the name prefix "comp".
 */
export function splitPathPrefix(partial: string): { dirPart: string; namePrefix: string } {
  const lastSeparator = Math.max(partial.lastIndexOf('/'), partial.lastIndexOf(path.sep));
  if (lastSeparator < 0) {
    return { dirPart: '', namePrefix: partial };
  }
  return {
    dirPart: partial.slice(0, lastSeparator + 1),
    namePrefix: partial.slice(lastSeparator + 1),
  };
}

function resolvesToDirectory(entry: fs.Dirent, fullPath: string): boolean {
  if (entry.isDirectory()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return fs.statSync(fullPath).isDirectory();
  } catch (error) {
    // Broken link, or the target vanished between readdir and stat
    logger.debug(`Cannot stat ${fullPath}`, { error: getErrorMessage(error) });
    return false;
  }
}

export function listPathEntries(partial: string, options: PathCompletionOptions): PathEntry[] {
  const { dirPart, namePrefix } = splitPathPrefix(partial);
  const directory = dirPart ? path.resolve(options.cwd, expandHome(dirPart)) : options.cwd;
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_PATH_ENTRIES;
  const showHidden = namePrefix.startsWith('.');

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    logger.debug(`Path completion skipped for ${directory}`, { error: getErrorMessage(error) });
    return [];
  }

  return entries
    .filter((entry) => entry.name.startsWith(namePrefix) && (showHidden || !entry.name.startsWith('.')))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, Math.max(0, maxEntries))
    .map((entry) => {
      const isDirectory = resolvesToDirectory(entry, path.join(directory, entry.name));
      return {
        text: `${dirPart}${entry.name}${isDirectory ? path.sep : ''}`,
        isDirectory,
      };
    });
}

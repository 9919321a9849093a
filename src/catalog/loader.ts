/**
 * Definition Loader
 *
 * Builds a Catalog from YAML definition directories, highest priority first:
 * - Explicit definitions directory from configuration
 * - ./definitions in the working directory
 * - definitions/ beside the executable
 * - User config directory
 * - System-wide share directories
 * - Built-in definitions
 *
 * A root command defined in several sources is taken wholesale from the
 * highest-priority one. Files that fail to parse or validate are reported as
 * diagnostics and skipped; the catalog is built from everything else.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { CatalogValidationError, DefinitionParseError, getErrorMessage } from '../errors/definition-error.js';
import { logger } from '../utils/logger.js';
import { builtinDefinitions } from './builtin-definitions.js';
import { Catalog, validateCommands } from './catalog.js';
import { formatZodIssues, parseDefinitionDocument } from './schema.js';
import type { CommandSpec } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type DefinitionOrigin = 'config' | 'cwd' | 'executable' | 'user' | 'system' | 'builtin';

export interface DefinitionSource {
  origin: DefinitionOrigin;
  /** Directory path, or 'builtin' for the built-in definitions */
  location: string;
}

export type LoadDiagnostic =
  | { kind: 'error'; source: string; error: DefinitionParseError | CatalogValidationError }
  | { kind: 'shadowed'; source: string; command: string; winner: string };

export interface LoadedSource extends DefinitionSource {
  files: number;
  commands: number;
}

export interface LoadResult {
  catalog: Catalog;
  diagnostics: LoadDiagnostic[];
  /** Sources that existed, in precedence order */
  sources: LoadedSource[];
}

export interface LoaderOptions {
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Path of the running executable (default: process.argv[1]) */
  executablePath?: string;
  /** Base config directory (default: $XDG_CONFIG_HOME or ~/.config) */
  configHome?: string;
  /** Explicit definitions directory, highest priority */
  definitionsDir?: string;
  /** System-wide directories (default: /usr/share and /usr/local/share) */
  systemDirs?: string[];
  /** Append the built-in definitions (default: true) */
  includeBuiltins?: boolean;
}

const APP_DIR_NAME = 'smart-command';
const DEFINITIONS_DIR_NAME = 'definitions';
const DEFINITION_EXTENSIONS = new Set(['.yaml', '.yml']);

const DEFAULT_SYSTEM_DIRS = [
  path.join('/usr/share', APP_DIR_NAME, DEFINITIONS_DIR_NAME),
  path.join('/usr/local/share', APP_DIR_NAME, DEFINITIONS_DIR_NAME),
];

// ============================================================================
// Source discovery
// ============================================================================

export function defaultConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

/**
 * Candidate definition directories in precedence order, duplicates removed.
 */
export function definitionSources(options: LoaderOptions = {}): DefinitionSource[] {
  const cwd = options.cwd ?? process.cwd();
  const executablePath = options.executablePath ?? process.argv[1];
  const configHome = options.configHome ?? defaultConfigHome();

  const candidates: DefinitionSource[] = [];
  if (options.definitionsDir) {
    candidates.push({ origin: 'config', location: path.resolve(cwd, options.definitionsDir) });
  }
  candidates.push({ origin: 'cwd', location: path.join(cwd, DEFINITIONS_DIR_NAME) });
  if (executablePath) {
    candidates.push({
      origin: 'executable',
      location: path.join(path.dirname(path.resolve(executablePath)), DEFINITIONS_DIR_NAME),
    });
  }
  candidates.push({ origin: 'user', location: path.join(configHome, APP_DIR_NAME, DEFINITIONS_DIR_NAME) });
  for (const dir of options.systemDirs ?? DEFAULT_SYSTEM_DIRS) {
    candidates.push({ origin: 'system', location: dir });
  }

  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.location)) {
      return false;
    }
    seen.add(candidate.location);
    return true;
  });
}

// ============================================================================
// File parsing
// ============================================================================

/**
 * Parse and validate one definition file's contents.
 *
 * @throws DefinitionParseError on YAML or schema errors
 * @throws CatalogValidationError on duplicate sibling names
 */
export function parseDefinitionFile(content: string, source: string): CommandSpec[] {
  let document: unknown;
  try {
    document = yaml.load(content, { filename: source });
  } catch (error) {
    throw new DefinitionParseError(source, getErrorMessage(error), {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (document === undefined || document === null) {
    return [];
  }

  let commands: CommandSpec[];
  try {
    commands = parseDefinitionDocument(document);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new DefinitionParseError(source, formatZodIssues(error).join('; '), { cause: error });
    }
    throw error;
  }

  const issues = validateCommands(commands);
  if (issues.length > 0) {
    throw new CatalogValidationError(issues, { source });
  }
  return commands;
}

async function listDefinitionFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries
    .filter((entry) => DEFINITION_EXTENSIONS.has(path.extname(entry).toLowerCase()))
    .sort()
    .map((entry) => path.join(dir, entry));
}

async function isDirectory(dir: string): Promise<boolean> {
  if (!(await fs.pathExists(dir))) {
    return false;
  }
  const stat = await fs.stat(dir);
  return stat.isDirectory();
}

// ============================================================================
// Loader
// ============================================================================

export class DefinitionLoader {
  private readonly options: LoaderOptions;

  constructor(options: LoaderOptions = {}) {
    this.options = options;
  }

  async load(): Promise<LoadResult> {
    const diagnostics: LoadDiagnostic[] = [];
    const loadedSources: LoadedSource[] = [];
    const roots = new Map<string, { command: CommandSpec; source: string }>();

    const accept = (commands: CommandSpec[], source: string): void => {
      for (const command of commands) {
        const existing = roots.get(command.name);
        if (existing) {
          diagnostics.push({ kind: 'shadowed', source, command: command.name, winner: existing.source });
          logger.debug(`Definition of "${command.name}" in ${source} shadowed by ${existing.source}`);
          continue;
        }
        roots.set(command.name, { command, source });
      }
    };

    for (const source of definitionSources(this.options)) {
      let files: string[];
      try {
        if (!(await isDirectory(source.location))) {
          continue;
        }
        files = await listDefinitionFiles(source.location);
      } catch (error) {
        logger.warn(`Cannot read definitions directory ${source.location}`, { error: getErrorMessage(error) });
        continue;
      }

      let commandCount = 0;
      for (const file of files) {
        try {
          const content = await fs.readFile(file, 'utf-8');
          const commands = parseDefinitionFile(content, file);
          accept(commands, file);
          commandCount += commands.length;
        } catch (error) {
          const failure =
            error instanceof DefinitionParseError || error instanceof CatalogValidationError
              ? error
              : new DefinitionParseError(file, getErrorMessage(error), {
                  cause: error instanceof Error ? error : undefined,
                });
          diagnostics.push({ kind: 'error', source: file, error: failure });
          logger.warn(failure.message, { code: failure.code, source: failure.source });
        }
      }

      loadedSources.push({ ...source, files: files.length, commands: commandCount });
      logger.debug(`Loaded ${commandCount} command(s) from ${source.location}`, { origin: source.origin });
    }

    if (this.options.includeBuiltins ?? true) {
      const builtins = builtinDefinitions();
      accept(builtins, 'builtin');
      loadedSources.push({ origin: 'builtin', location: 'builtin', files: 0, commands: builtins.length });
    }

    const catalog = new Catalog(Array.from(roots.values(), (entry) => entry.command));
    logger.debug(`Catalog ready with ${catalog.size} root command(s)`);

    return { catalog, diagnostics, sources: loadedSources };
  }
}

/**
 * Load a catalog from the default sources
 */
export async function loadCatalog(options: LoaderOptions = {}): Promise<LoadResult> {
  return new DefinitionLoader(options).load();
}

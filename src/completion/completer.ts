/**
 * Tree-Descent Completer
 *
 * Walks the catalog with the completed tokens of a line and proposes
 * candidates at the deepest command reached (the resolution context).
 * Candidate tiers, highest first:
 *   1. subcommands
 *   2. flags (long forms, short forms, short-flag combinations)
 *   3. examples continuing the typed text
 *   4. filesystem entries, for commands that take paths
 * Only the highest non-empty tier is returned.
 *
 * The argument of `example`, `examples` or `ex` completes to the paths of
 * commands that carry examples, unless the catalog defines that command.
 */

import { getErrorMessage } from '../errors/definition-error.js';
import { resolveText } from '../i18n/index.js';
import { logger } from '../utils/logger.js';
import type { Catalog } from '../catalog/catalog.js';
import type { CommandSpec, Suggestion } from '../catalog/types.js';
import { fuzzyMatch } from '../search/fuzzy.js';
import { flagCandidates } from './flags.js';
import { listPathEntries } from './path-completion.js';
import { resolveContext, type CompletionContext } from './tokenizer.js';

/** Shell commands whose argument is a command path with examples */
export const EXAMPLE_COMMANDS: ReadonlySet<string> = new Set(['example', 'examples', 'ex']);

const EXAMPLE_SEARCH_ENTRY = 'search';

export interface CompleteOptions {
  /** Directory for relative path completion (default: process.cwd()) */
  cwd?: string;
  /** Cap on filesystem entries (default: 200) */
  maxPathEntries?: number;
  /** Offer file completion after a command the catalog does not know (default: true) */
  pathCompletionForUnknownCommands?: boolean;
}

export interface Resolution {
  /** Deepest command reached, or undefined at the catalog root */
  command: CommandSpec | undefined;
  /** Names of the commands descended through */
  path: string[];
  context: CompletionContext;
}

/**
 * Descend the catalog along the completed tokens of `line`.
 * Descent stops silently at the first token that is not a subcommand.
 */
export function resolveCommand(catalog: Catalog, line: string, cursor: number): Resolution {
  const context = resolveContext(line, cursor);
  let command: CommandSpec | undefined;
  const commandPath: string[] = [];

  for (const token of context.completed) {
    const candidates = command ? command.subcommands : catalog.roots;
    const next = candidates.find((candidate) => candidate.name === token.value);
    if (!next) {
      break;
    }
    command = next;
    commandPath.push(next.name);
  }

  return { command, path: commandPath, context };
}

/**
 * Text for a candidate that replaces the partial token. A token opened with
 * a quote keeps it, and text containing whitespace gets one; the quote is
 * closed unless the candidate is meant to be extended (a directory).
 */
export function quoteCandidate(text: string, context: CompletionContext, close: boolean): string {
  const quote = context.quote ?? (/\s/.test(text) ? '"' : undefined);
  if (quote === undefined) {
    return text;
  }
  return `${quote}${text}${close ? quote : ''}`;
}

function subcommandSuggestions(
  subcommands: readonly CommandSpec[],
  context: CompletionContext,
  lang: string,
  kind: 'command' | 'subcommand',
  filter: boolean
): Suggestion[] {
  const prefix = context.partial.toLowerCase();
  return subcommands
    .filter((sub) => !filter || sub.name.toLowerCase().startsWith(prefix))
    .map((sub) => ({
      text: quoteCandidate(sub.name, context, true),
      kind,
      description: resolveText(sub.description, lang),
      replaceStart: context.partialStart,
      replaceEnd: context.cursor,
      appendSpace: true,
    }));
}

function exampleSuggestions(command: CommandSpec, line: string, context: CompletionContext, lang: string): Suggestion[] {
  const typed = line.slice(0, context.cursor);
  const trimmed = typed.trimStart();
  const start = typed.length - trimmed.length;

  return command.examples
    .filter((example) => example.cmd !== trimmed && example.cmd.startsWith(trimmed))
    .map((example) => ({
      text: example.cmd,
      kind: 'example' as const,
      description: resolveText(example.scenario, lang),
      replaceStart: start,
      replaceEnd: context.cursor,
      appendSpace: false,
    }));
}

function pathSuggestions(context: CompletionContext, options: CompleteOptions): Suggestion[] {
  return listPathEntries(context.partial, {
    cwd: options.cwd ?? process.cwd(),
    maxEntries: options.maxPathEntries,
  }).map((entry) => ({
    text: quoteCandidate(entry.text, context, !entry.isDirectory),
    kind: 'path' as const,
    description: entry.isDirectory ? 'Directory' : 'File',
    replaceStart: context.partialStart,
    replaceEnd: context.cursor,
    appendSpace: !entry.isDirectory,
  }));
}

/**
 * Argument of `example <command path>`: the whole text after the first
 * token is the query, matched by substring or fuzzy subsequence.
 */
function examplePathSuggestions(catalog: Catalog, line: string, context: CompletionContext): Suggestion[] {
  const first = context.completed[0];
  if (!first) {
    return [];
  }

  const rest = line.slice(first.end, context.cursor);
  const argumentStart = first.end + (rest.length - rest.trimStart().length);
  const query = rest.trim().toLowerCase();

  const suggestion = (text: string, description: string, kind: Suggestion['kind']): Suggestion => ({
    text,
    kind,
    description,
    replaceStart: argumentStart,
    replaceEnd: context.cursor,
    appendSpace: true,
  });

  const paths = catalog
    .commandsWithExamples()
    .filter((commandPath) => !query || commandPath.toLowerCase().includes(query) || fuzzyMatch(query, commandPath) !== null)
    .map((commandPath) => suggestion(commandPath, `[${commandPath.split(' ')[0] ?? commandPath}]`, 'command'));

  if (EXAMPLE_SEARCH_ENTRY.startsWith(query)) {
    paths.unshift(suggestion(EXAMPLE_SEARCH_ENTRY, 'Search all examples', 'search'));
  }
  return paths;
}

function completeUnsafe(catalog: Catalog, line: string, cursor: number, lang: string, options: CompleteOptions): Suggestion[] {
  const { command, context } = resolveCommand(catalog, line, cursor);

  const first = context.completed[0];
  if (!command && first && EXAMPLE_COMMANDS.has(first.value)) {
    return examplePathSuggestions(catalog, line, context);
  }

  if (!command) {
    if (context.completed.length === 0) {
      return subcommandSuggestions(catalog.roots, context, lang, 'command', true);
    }
    // Arguments of a command the catalog does not describe
    return (options.pathCompletionForUnknownCommands ?? true) ? pathSuggestions(context, options) : [];
  }

  const subcommands = subcommandSuggestions(command.subcommands, context, lang, 'subcommand', true);
  if (subcommands.length > 0) {
    return subcommands;
  }

  const flags: Suggestion[] = flagCandidates(command, context.partial, lang).map((candidate) => ({
    ...candidate,
    text: quoteCandidate(candidate.text, context, candidate.appendSpace),
    replaceStart: context.partialStart,
    replaceEnd: context.cursor,
  }));
  if (flags.length > 0) {
    return flags;
  }

  const examples = exampleSuggestions(command, line, context, lang);
  if (examples.length > 0) {
    return examples;
  }

  if (command.pathCompletion) {
    return pathSuggestions(context, options);
  }

  // Nothing matched the partial token: offer every subcommand instead
  return subcommandSuggestions(command.subcommands, context, lang, 'subcommand', false);
}

/**
 * Complete `line` at `cursor` against `catalog`. Never throws; returns an
 * empty list when nothing applies.
 */
export function complete(
  catalog: Catalog,
  line: string,
  cursor: number,
  lang: string,
  options: CompleteOptions = {}
): Suggestion[] {
  try {
    return completeUnsafe(catalog, line, cursor, lang, options);
  } catch (error) {
    logger.error('Completion failed', { line, cursor, error: getErrorMessage(error) });
    return [];
  }
}

/**
 * Terminal formatting for CLI output
 */

import chalk from 'chalk';
import { resolveText } from '../i18n/index.js';
import { longForm, shortForm } from '../completion/flags.js';
import type { CommandSpec, SearchResult, Suggestion } from '../catalog/types.js';
import type { LoadDiagnostic } from '../catalog/loader.js';
import type { SelectionAction } from '../search/result-selector.js';

export function formatSuggestion(suggestion: Suggestion): string {
  const description = suggestion.description ? `  ${chalk.dim(suggestion.description)}` : '';
  return `${suggestion.text}${description}`;
}

/**
 * Numbered result list; numbers are what the selector accepts.
 */
export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return chalk.yellow('No matching commands.');
  }

  const width = String(results.length).length;
  return results
    .map((result, i) => {
      const number = String(i + 1).padStart(width, ' ');
      return `${chalk.cyan(`${number}.`)} ${result.display} ${chalk.dim(`[${result.fieldKind}]`)}`;
    })
    .join('\n');
}

export function formatAction(action: SelectionAction): string {
  switch (action.type) {
    case 'execute':
      return `${chalk.green('run')} ${action.result.invocation}`;
    case 'edit':
      return `${chalk.blue('edit')} ${action.result.invocation}`;
    case 'cancel':
      return chalk.dim('cancelled');
    case 'requery':
      return `${chalk.dim('search')} ${action.query}`;
  }
}

function flagLabel(command: CommandSpec, index: number): string {
  const flag = command.flags[index];
  if (!flag) return '';
  const forms = [shortForm(flag), longForm(flag)].filter((form): form is string => form !== undefined);
  return forms.join(', ') + (flag.takesValue ? ' <value>' : '');
}

/**
 * Indented command tree with descriptions and flags.
 */
export function formatCommandTree(command: CommandSpec, lang: string, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  const description = resolveText(command.description, lang);
  const lines = [`${indent}${chalk.bold(command.name)}${description ? `  ${chalk.dim(description)}` : ''}`];

  command.flags.forEach((flag, i) => {
    const text = resolveText(flag.description, lang);
    lines.push(`${indent}  ${chalk.cyan(flagLabel(command, i))}${text ? `  ${chalk.dim(text)}` : ''}`);
  });

  for (const sub of command.subcommands) {
    lines.push(...formatCommandTree(sub, lang, depth + 1));
  }
  return lines;
}

export function formatDiagnostic(diagnostic: LoadDiagnostic): string {
  if (diagnostic.kind === 'shadowed') {
    return `${chalk.yellow('shadowed')} ${diagnostic.command} in ${diagnostic.source} (using ${diagnostic.winner})`;
  }
  return `${chalk.red('error')} ${diagnostic.error.message}`;
}

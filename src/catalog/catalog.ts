/**
 * Command Catalog
 *
 * Immutable snapshot of the command forest for one session. Construction
 * validates the tree invariants and deep-freezes every node; a new set of
 * definitions means building a new Catalog, never patching this one.
 */

import { CatalogValidationError } from '../errors/definition-error.js';
import { resolveText } from '../i18n/index.js';
import type { CommandSpec, FlagSpec } from './types.js';

export interface ResolvedExample {
  cmd: string;
  scenario: string;
}

/**
 * Collect invariant violations for a list of sibling commands.
 * Paths in messages are space-joined command paths.
 */
export function validateCommands(commands: readonly CommandSpec[], parentPath: string[] = []): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const command of commands) {
    const path = [...parentPath, command.name];
    const label = path.join(' ');

    if (!command.name.trim()) {
      issues.push(`empty command name under "${parentPath.join(' ') || '<root>'}"`);
    } else if (/\s/.test(command.name)) {
      issues.push(`command name "${label}" contains whitespace`);
    }

    if (seen.has(command.name)) {
      issues.push(`duplicate command "${label}"`);
    }
    seen.add(command.name);

    command.flags.forEach((flag, index) => {
      issues.push(...validateFlag(flag, `${label} flag #${index + 1}`));
    });

    issues.push(...validateCommands(command.subcommands, path));
  }

  return issues;
}

function validateFlag(flag: FlagSpec, label: string): string[] {
  const issues: string[] = [];

  if (flag.long === undefined && flag.short === undefined) {
    issues.push(`${label} has neither a long nor a short name`);
  }
  if (flag.long !== undefined && flag.long.length < 2) {
    issues.push(`${label} long name "${flag.long}" must have at least two characters`);
  }
  if (flag.short !== undefined && ([...flag.short].length !== 1 || flag.short === '-')) {
    issues.push(`${label} short name "${flag.short}" must be a single character`);
  }

  return issues;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class Catalog {
  readonly roots: readonly CommandSpec[];
  private readonly byName: ReadonlyMap<string, CommandSpec>;

  /**
   * @throws CatalogValidationError when sibling names collide or a flag is malformed
   */
  constructor(roots: readonly CommandSpec[]) {
    const issues = validateCommands(roots);
    if (issues.length > 0) {
      throw new CatalogValidationError(issues);
    }

    this.roots = deepFreeze([...roots]);
    this.byName = new Map(this.roots.map((root) => [root.name, root]));
    Object.freeze(this);
  }

  static empty(): Catalog {
    return new Catalog([]);
  }

  get size(): number {
    return this.roots.length;
  }

  get(name: string): CommandSpec | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  commandNames(): string[] {
    return this.roots.map((root) => root.name);
  }

  /**
   * Resolve a full command path such as ['git', 'remote', 'add'].
   * Returns undefined unless every segment matches exactly.
   */
  resolve(path: readonly string[]): CommandSpec | undefined {
    const [rootName, ...rest] = path;
    if (rootName === undefined) {
      return undefined;
    }

    let current = this.byName.get(rootName);
    for (const segment of rest) {
      current = current?.subcommands.find((sub) => sub.name === segment);
    }
    return current;
  }

  /**
   * Space-joined paths of every command that carries examples, sorted.
   */
  commandsWithExamples(): string[] {
    const result: string[] = [];

    const visit = (command: CommandSpec, path: string): void => {
      if (command.examples.length > 0) {
        result.push(path);
      }
      for (const sub of command.subcommands) {
        visit(sub, `${path} ${sub.name}`);
      }
    };

    for (const root of this.roots) {
      visit(root, root.name);
    }
    return result.sort();
  }

  /**
   * Examples of the command at a space-separated path, scenarios resolved for `lang`.
   */
  examplesFor(commandPath: string, lang: string): ResolvedExample[] {
    const command = this.resolve(commandPath.split(/\s+/).filter(Boolean));
    if (!command) {
      return [];
    }
    return command.examples.map((example) => ({
      cmd: example.cmd,
      scenario: resolveText(example.scenario, lang),
    }));
  }

  /**
   * Depth-first walk in catalog order, parents before children.
   */
  *walk(): Generator<{ command: CommandSpec; path: string[] }> {
    const stack: Array<{ command: CommandSpec; path: string[] }> = [];
    for (let i = this.roots.length - 1; i >= 0; i--) {
      const root = this.roots[i];
      if (root) {
        stack.push({ command: root, path: [root.name] });
      }
    }

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      yield entry;

      const { command, path } = entry;
      for (let i = command.subcommands.length - 1; i >= 0; i--) {
        const sub = command.subcommands[i];
        if (sub) {
          stack.push({ command: sub, path: [...path, sub.name] });
        }
      }
    }
  }
}

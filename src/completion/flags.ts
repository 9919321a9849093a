/**
 * Flag candidates for a resolution context.
 *
 * Long and short forms are filtered by prefix. A partial token such as
 * `-ab` is a short-flag chain: when every character is a declared short
 * flag and none of them takes a value, the chain can be extended, first by
 * the command's declared combos and then by each unused short flag.
 */

import { resolveText } from '../i18n/index.js';
import type { CommandSpec, FlagSpec } from '../catalog/types.js';

export interface FlagCandidate {
  text: string;
  kind: 'flag' | 'combo';
  description: string;
  appendSpace: boolean;
}

export function longForm(flag: FlagSpec): string | undefined {
  return flag.long !== undefined ? `--${flag.long}` : undefined;
}

export function shortForm(flag: FlagSpec): string | undefined {
  return flag.short !== undefined ? `-${flag.short}` : undefined;
}

function findShort(command: CommandSpec, char: string): FlagSpec | undefined {
  return command.flags.find((flag) => flag.short === char);
}

/**
 * Characters of a short-flag chain (`-am` -> ['a', 'm']), or undefined when
 * the token is not a chain.
 */
export function parseShortChain(partial: string): string[] | undefined {
  if (!partial.startsWith('-') || partial.startsWith('--') || partial.length < 2) {
    return undefined;
  }
  return [...partial.slice(1)];
}

/**
 * Whether a chain may be extended: every character is a declared short
 * flag and none takes a value.
 */
export function canExtendChain(command: CommandSpec, chain: readonly string[]): boolean {
  return chain.every((char) => {
    const flag = findShort(command, char);
    return flag !== undefined && !flag.takesValue;
  });
}

function combinationCandidates(command: CommandSpec, partial: string, chain: string[], lang: string): FlagCandidate[] {
  if (!canExtendChain(command, chain)) {
    return [];
  }

  const candidates: FlagCandidate[] = [];
  const chainText = chain.join('');

  for (const combo of command.flagCombos) {
    if (combo.combo === chainText || !combo.combo.startsWith(chainText)) {
      continue;
    }
    const chars = [...combo.combo];
    // Only the last flag of a combo may take a value
    const valid = chars.every((char, index) => {
      const flag = findShort(command, char);
      return flag !== undefined && (!flag.takesValue || index === chars.length - 1);
    });
    if (valid) {
      const last = findShort(command, chars[chars.length - 1] ?? '');
      candidates.push({
        text: `-${combo.combo}`,
        kind: 'combo',
        description: resolveText(combo.description, lang),
        appendSpace: !(last?.takesValue ?? false),
      });
    }
  }

  const used = new Set(chain);
  for (const flag of command.flags) {
    if (flag.short === undefined || used.has(flag.short)) {
      continue;
    }
    candidates.push({
      text: `${partial}${flag.short}`,
      kind: 'combo',
      description: `(+${flag.short}) ${resolveText(flag.description, lang)}`,
      appendSpace: !flag.takesValue,
    });
  }

  return candidates;
}

/**
 * Flag candidates in display order: long forms, short forms, combinations.
 */
export function flagCandidates(command: CommandSpec, partial: string, lang: string): FlagCandidate[] {
  const lowerPartial = partial.toLowerCase();
  const longs: FlagCandidate[] = [];
  const shorts: FlagCandidate[] = [];

  for (const flag of command.flags) {
    const description = resolveText(flag.description, lang);
    const long = longForm(flag);
    if (long !== undefined && long.toLowerCase().startsWith(lowerPartial)) {
      longs.push({ text: long, kind: 'flag', description, appendSpace: !flag.takesValue });
    }
    const short = shortForm(flag);
    if (short !== undefined && short.startsWith(partial)) {
      shorts.push({ text: short, kind: 'flag', description, appendSpace: !flag.takesValue });
    }
  }

  const chain = parseShortChain(partial);
  const combos = chain ? combinationCandidates(command, partial, chain, lang) : [];

  const seen = new Set<string>();
  return [...longs, ...shorts, ...combos].filter((candidate) => {
    if (seen.has(candidate.text)) {
      return false;
    }
    seen.add(candidate.text);
    return true;
  });
}

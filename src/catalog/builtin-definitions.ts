/**
 * Built-in command definitions, loaded at the lowest precedence so any
 * definition file with the same root name replaces them.
 */

import { localized } from '../i18n/index.js';
import type { CommandSpec } from './types.js';

function command(name: string, description: Record<string, string>, extra: Partial<CommandSpec> = {}): CommandSpec {
  return {
    name,
    description: localized(description),
    subcommands: [],
    flags: [],
    examples: [],
    flagCombos: [],
    pathCompletion: false,
    ...extra,
  };
}

export function builtinDefinitions(): CommandSpec[] {
  return [
    command(
      'ls',
      { en: 'List directory contents', zh: '列出目录内容' },
      {
        flags: [
          {
            long: 'all',
            short: 'a',
            description: localized({ en: 'Include entries starting with .', zh: '包含以 . 开头的条目' }),
            takesValue: false,
          },
        ],
        pathCompletion: true,
      }
    ),
    command(
      'cd',
      { en: 'Change the shell working directory', zh: '切换工作目录' },
      { pathCompletion: true }
    ),
    command(
      'config',
      { en: 'Shell configuration', zh: '系统配置' },
      {
        subcommands: [
          command(
            'set-lang',
            { en: 'Set display language', zh: '设置显示语言' },
            {
              subcommands: [
                command('en', { en: 'English', zh: '英文' }),
                command('zh', { en: 'Chinese', zh: '中文' }),
              ],
            }
          ),
        ],
      }
    ),
  ];
}

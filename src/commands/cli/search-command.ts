/**
 * CLI `smart-command search` command
 *
 * Fuzzy-searches the whole catalog. With --select, prompts for a follow-up
 * selection and prints the resulting action.
 */

import * as readline from 'readline';
import type { Command } from 'commander';
import { bootstrap, type GlobalOptions } from '../../cli/config-loader.js';
import { formatAction, formatSearchResults } from '../../cli/format.js';
import type { SearchResultSelector, SelectionAction } from '../../search/result-selector.js';

const SELECT_PROMPT = 'Select [N run, eN edit, Enter cancel, text to search again]: ';

/**
 * One question at a time over a line-oriented stream.
 */
export interface LinePrompt {
  /** Resolves with the next line, or '' once the input has ended */
  ask(prompt: string): Promise<string>;
  close(): void;
}

export function createLinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LinePrompt {
  const rl = readline.createInterface({ input, output });
  const pending = new Set<(answer: string) => void>();
  let closed = false;

  rl.on('close', () => {
    closed = true;
    for (const resolve of pending) {
      resolve('');
    }
    pending.clear();
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) {
        return Promise.resolve('');
      }
      return new Promise((resolve) => {
        pending.add(resolve);
        rl.question(prompt, (answer) => {
          pending.delete(resolve);
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Show results for `query` and keep asking until the input picks a result
 * or cancels. Re-queries show the new results and ask again.
 */
export async function runSelection(
  selector: SearchResultSelector,
  query: string,
  prompt: LinePrompt
): Promise<SelectionAction> {
  let results = selector.show(query);
  let action: SelectionAction;

  do {
    console.log(formatSearchResults(results));
    action = selector.handle(await prompt.ask(SELECT_PROMPT));
    if (action.type === 'requery' && selector.state.kind === 'showing') {
      results = selector.state.results;
    }
  } while (action.type === 'requery');

  return action;
}

export function registerSearchCommand(program: Command, createPrompt: () => LinePrompt = () => createLinePrompt()): void {
  program
    .command('search')
    .description('Fuzzy-search command names, descriptions and examples')
    .argument('<query...>', 'Search text')
    .option('-n, --limit <count>', 'Maximum number of results')
    .option('--json', 'Output results as JSON')
    .option('-s, --select', 'Prompt to run or edit one of the results')
    .action(async (queryParts: string[], opts: { limit?: string; json?: boolean; select?: boolean }) => {
      const { session, config } = await bootstrap(program.opts<GlobalOptions>());

      const limit = opts.limit !== undefined ? Number.parseInt(opts.limit, 10) : config.searchLimit;
      if (Number.isNaN(limit)) {
        program.error(`Invalid limit: ${opts.limit}`);
      }

      const query = queryParts.join(' ');

      if (!opts.select) {
        const results = session.search(query, limit);
        console.log(opts.json ? JSON.stringify(results, null, 2) : formatSearchResults(results));
        return;
      }

      const prompt = createPrompt();
      try {
        const action = await runSelection(session.createSelector(limit), query, prompt);
        console.log(opts.json ? JSON.stringify(action, null, 2) : formatAction(action));
      } finally {
        prompt.close();
      }
    });
}

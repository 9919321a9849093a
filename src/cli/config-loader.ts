/**
 * Session bootstrap for the CLI
 *
 * Loads configuration, applies the log level, loads the catalog and wraps
 * it in a CompletionSession.
 */

import { loadAppConfig, type AppConfig, type AppConfigOverrides } from '../config/app-config.js';
import { loadCatalog, type LoadResult, type LoaderOptions } from '../catalog/loader.js';
import { CompletionSession } from '../session/completion-session.js';
import { logger } from '../utils/logger.js';

export interface GlobalOptions {
  lang?: string;
  definitions?: string;
  builtins?: boolean;
  verbose?: boolean;
}

export interface Bootstrap {
  config: AppConfig;
  load: LoadResult;
  session: CompletionSession;
}

export function toOverrides(options: GlobalOptions): AppConfigOverrides {
  const overrides: AppConfigOverrides = {};
  if (options.lang) overrides.lang = options.lang;
  if (options.definitions) overrides.definitionsDir = options.definitions;
  if (options.verbose) overrides.logLevel = 'debug';
  return overrides;
}

export async function bootstrap(options: GlobalOptions = {}, loaderOptions: LoaderOptions = {}): Promise<Bootstrap> {
  const config = await loadAppConfig({ overrides: toOverrides(options) });
  logger.setLevel(config.logLevel);

  const load = await loadCatalog({
    ...loaderOptions,
    definitionsDir: config.definitionsDir,
    includeBuiltins: options.builtins ?? loaderOptions.includeBuiltins,
  });

  const session = new CompletionSession(load.catalog, {
    language: config.lang,
    searchPrefix: config.searchPrefix,
    searchLimit: config.searchLimit,
    completion: { maxPathEntries: config.maxPathEntries },
  });

  return { config, load, session };
}

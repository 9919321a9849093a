import { SmartCommandError } from './base-error.js';

/**
 * A definition source could not be read or parsed.
 */
export class DefinitionParseError extends SmartCommandError {
  constructor(source: string, message: string, options: { cause?: Error } = {}) {
    super('DEFINITION_PARSE_ERROR', `Failed to parse ${source}: ${message}`, { ...options, source });
    this.name = 'DefinitionParseError';
  }
}

/**
 * A definition parsed but breaks a catalog invariant
 * (duplicate sibling names, a flag with neither long nor short form, ...).
 */
export class CatalogValidationError extends SmartCommandError {
  public readonly issues: string[];

  constructor(issues: string[], options: { source?: string } = {}) {
    const where = options.source ? ` in ${options.source}` : '';
    super('CATALOG_VALIDATION_ERROR', `Invalid command definition${where}: ${issues.join('; ')}`, options);
    this.name = 'CatalogValidationError';
    this.issues = issues;
  }
}

/**
 * Configuration file or environment value is invalid.
 */
export class ConfigError extends SmartCommandError {
  constructor(message: string, options: { cause?: Error; source?: string } = {}) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Get a printable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

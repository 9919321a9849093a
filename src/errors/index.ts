/**
 * Error classes
 */

export { SmartCommandError, type SmartCommandErrorOptions } from './base-error.js';
export {
  DefinitionParseError,
  CatalogValidationError,
  ConfigError,
  getErrorMessage,
} from './definition-error.js';

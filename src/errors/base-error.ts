/**
 * Errors raised while building a catalog or loading configuration.
 * `source` names the definition file (or "builtin") an error came from.
 */

export interface SmartCommandErrorOptions {
  cause?: Error;
  source?: string;
}

export class SmartCommandError extends Error {
  public readonly code: string;
  public readonly source?: string;

  constructor(code: string, message: string, options: SmartCommandErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'SmartCommandError';
    this.code = code;
    this.source = options.source;
  }

  /** Shape written by `validate --json` */
  toJSON(): { name: string; code: string; message: string; source?: string } {
    return { name: this.name, code: this.code, message: this.message, source: this.source };
  }
}

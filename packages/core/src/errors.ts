/**
 * Error kinds raised by the core. Everything else that can go wrong while
 * reading inputs is a recoverable condition reported through stats.
 */

/**
 * Malformed or unsupported CSV input. Fatal for a generation run.
 */
export class FormatError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'FormatError';
  }
}

/**
 * No exportable `Entry` table was found in a generated source file.
 */
export class TableFormatError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'TableFormatError';
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: ConfigIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

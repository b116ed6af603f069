/**
 * Raised when the limits document is missing, unreadable or structurally invalid.
 * Always surfaced before any sample row is processed.
 */
export class ConfigError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.source = source;
  }
}

/**
 * Raised for request payloads that are not a sample table or carry invalid options
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

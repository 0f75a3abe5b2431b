/**
 * Error types surfaced outside the matching core
 */

/** Invalid configuration, raised once at startup */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Search query that fails caller-level validation */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

/** Render an unknown thrown value for logs and judgment errors */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Free text that could not be turned into a recipe */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

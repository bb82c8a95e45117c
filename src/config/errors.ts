import { CONFIG_FILE_NAME } from './types.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigNotFoundError extends Error {
  constructor() {
    super(
      `Configuration file not found (${CONFIG_FILE_NAME}). Run "flexrun init" to create a new one.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public issues: unknown[]) {
    super(ConfigValidationError.describe(issues));
    this.name = 'ConfigValidationError';
  }

  private static describe(issues: unknown[]): string {
    const details = issues
      .map((issue) => {
        if (typeof issue === 'object' && issue !== null && 'message' in issue) {
          const path = 'path' in issue && Array.isArray(issue.path) ? issue.path.join('.') : '';
          return path ? `${path}: ${String(issue.message)}` : String(issue.message);
        }
        return String(issue);
      })
      .filter((line) => line.length > 0);

    if (details.length === 0) {
      return 'Configuration validation failed';
    }
    return `Configuration validation failed:\n  ${details.join('\n  ')}`;
  }
}

/**
 * Errors raised by the registration pipeline
 */

/**
 * Error thrown when the manifest cannot be read
 */
export class ManifestReadError extends Error {
  constructor(public projectPath: string, cause: unknown) {
    super(`Cannot read ${projectPath}: ${describeCause(cause)}`, { cause });
    this.name = 'ManifestReadError';
  }
}

/**
 * Error thrown when the manifest cannot be written back
 */
export class ManifestWriteError extends Error {
  constructor(public projectPath: string, cause: unknown) {
    super(`Cannot write ${projectPath}: ${describeCause(cause)}`, { cause });
    this.name = 'ManifestWriteError';
  }
}

/**
 * Error thrown for invalid configuration or input paths
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

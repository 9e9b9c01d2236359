/**
 * Thrown while resolving configuration or preparing the work directory.
 * Only ever raised during startup; the process should not come up.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

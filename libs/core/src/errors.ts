/** Invalid or incomplete configuration. Raised at startup only; the process must not run with it. */
export class ConfigurationError extends Error {
  readonly kind = 'CONFIGURATION';

  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(key ? `${key}: ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

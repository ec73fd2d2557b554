/**
 * Error thrown when a security policy cannot be constructed.
 *
 * @remarks
 * Causes include a pinned certificate that does not parse, and a pinning mode without pins.
 * The underlying error, if any, is available as `.cause`.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

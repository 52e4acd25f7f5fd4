/**
 * Fatal pre-flight error: bad weights, inverted bounds, unknown preset, missing key.
 * Raised before any symbol is fetched.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public details: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// pattern: Functional Core

/**
 * Raised for bad or missing configuration, always before any network call is made.
 */
export class ConfigError extends Error {
  constructor(message: string = "") {
    super(message);
    this.name = "ConfigError";
  }
}

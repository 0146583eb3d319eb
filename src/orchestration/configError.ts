/**
 * Invalid configuration (environment variable or file)
 */
export class ConfigError extends Error {
  public readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/**
 * Failures raised by explicit configuration calls.
 * Automatic reloads never throw these; see RuleStore.lastReloadError.
 */

export class LoggingConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoggingConfigError";
  }
}

export class ConfigFileNotFoundError extends LoggingConfigError {
  constructor(readonly path: string) {
    super(`Logger configuration file not found: ${path}`);
    this.name = "ConfigFileNotFoundError";
  }
}

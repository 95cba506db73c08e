/**
 * Base error for all veilprint failures.
 */
export class VeilprintError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VeilprintError";
  }
}

/**
 * Thrown by setup-time helpers (`assertValidConfig`, `new ConfigResolver`)
 * when a configuration fails validation. Runtime updates report the same
 * messages through a `ValidationResult` instead of throwing.
 */
export class ConfigValidationError extends VeilprintError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid fingerprint configuration: ${errors.join("; ")}`);
    this.name = "ConfigValidationError";
    this.errors = errors;
  }
}

/**
 * Thrown when process environment variables carry values that cannot be
 * parsed into engine options.
 */
export class EnvironmentConfigError extends VeilprintError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid environment configuration: ${errors.join("; ")}`);
    this.name = "EnvironmentConfigError";
    this.errors = errors;
  }
}

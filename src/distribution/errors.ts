/**
 * Error types raised by the load distribution pipeline and the model parser.
 */

export class LoadshareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Inputs are structurally insufficient or inconsistent for a distribution. */
export class ConfigurationError extends LoadshareError {}

/** A model document has a missing or malformed field. */
export class InputError extends LoadshareError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.path = path;
  }
}

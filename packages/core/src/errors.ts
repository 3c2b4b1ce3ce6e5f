export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Thrown when a member is requested as a field in a way the registration
 * table does not allow, e.g. a method that was never registered as computed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class CyclicDependencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CyclicDependencyError";
  }
}

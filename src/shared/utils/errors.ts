/**
 * Custom error classes
 */

export class ToolShimError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolShimError';
  }
}

export class ConfigurationError extends ToolShimError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when an --execute payload is not a JSON object.
 * Only syntactic problems land here; semantic ones fall back to defaults.
 */
export class MalformedArgumentsError extends ToolShimError {
  constructor(
    message: string,
    public readonly payload: string
  ) {
    super(message);
    this.name = 'MalformedArgumentsError';
  }
}

export class ToolDiscoveryError extends ToolShimError {
  constructor(
    message: string,
    public readonly command: string
  ) {
    super(message);
    this.name = 'ToolDiscoveryError';
  }
}

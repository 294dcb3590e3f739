/**
 * @fileoverview Errors raised by the global environment.
 *
 * Unknown interfaces and removals of ids that are not live are not errors
 * and have no class here.
 */

/**
 * Error thrown when a mandatory single global was never advertised.
 */
export class MissingGlobalError extends Error {
  constructor(readonly interfaceName: string) {
    super(`A missing global was required: ${interfaceName}`);
    this.name = 'MissingGlobalError';
  }
}

/**
 * Error thrown when exclusive access to the shared state overlaps another
 * access window. This is a programming error, not a data condition.
 */
export class AccessViolationError extends Error {
  constructor(message: string) {
    super(`Shared state access violation: ${message}`);
    this.name = 'AccessViolationError';
  }
}

/**
 * Error thrown when a synchronization round fails while the environment is
 * being built. No environment exists when this is thrown.
 */
export class InitializationError extends Error {
  constructor(
    readonly round: 1 | 2,
    override readonly cause: unknown
  ) {
    super(
      `Initial roundtrip ${round} failed: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'InitializationError';
  }
}

/**
 * Error thrown by a transport when the connection fails.
 */
export class TransportError extends Error {
  constructor(message: string) {
    super(`Transport error: ${message}`);
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when a bind request cannot be honoured.
 */
export class BindError extends Error {
  constructor(message: string) {
    super(`Cannot bind global: ${message}`);
    this.name = 'BindError';
  }
}

/**
 * Error thrown when an environment declaration is inconsistent.
 */
export class DeclarationError extends Error {
  constructor(message: string) {
    super(`Invalid environment declaration: ${message}`);
    this.name = 'DeclarationError';
  }
}

/**
 * Error thrown when the client configuration fails validation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid client configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

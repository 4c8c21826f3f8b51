/**
 * Thrown when a proposed event type cannot replace the registered one.
 *
 * `reasons` lists each offending rule or change; `message` is the
 * rendered summary returned to clients.
 */
export class InvalidEventTypeError extends Error {
  readonly reasons: readonly string[];

  constructor(message: string, reasons: readonly string[] = [message]) {
    super(message);
    this.name = 'InvalidEventTypeError';
    this.reasons = reasons;
    Object.setPrototypeOf(this, InvalidEventTypeError.prototype);
  }
}

/**
 * Thrown when a stored version string is not `major.minor.patch`.
 */
export class InvalidVersionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVersionError';
    Object.setPrototypeOf(this, InvalidVersionError.prototype);
  }
}

/** Compile-time exhaustiveness guard for closed unions. */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

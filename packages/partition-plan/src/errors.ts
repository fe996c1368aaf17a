/** Malformed input, rejected before any I/O happens. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** Persisted metadata that does not describe a valid partition plan. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
    Object.setPrototypeOf(this, SchemaError.prototype);
  }
}

/** Failure of the storage collaborator while creating, reading or writing. */
export class IOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IOError";
    Object.setPrototypeOf(this, IOError.prototype);
  }
}

/** A read outside the leading axis of a logical array. */
export class IndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexError";
    Object.setPrototypeOf(this, IndexError.prototype);
  }
}

/** Render an unknown thrown value as a message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

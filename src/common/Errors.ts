/**
 * Custom error types for the sketch library.
 *
 * Configuration and index errors are programming errors: they surface
 * immediately and are never retried.
 */

export class SketchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SketchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends SketchError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class IndexError extends SketchError {
  constructor(index: number, length: number) {
    super(`Index ${index} out of range [0, ${length})`);
    this.name = 'IndexError';
  }
}

export class UnknownSketchError extends SketchError {
  constructor(kind: string, name: string) {
    super(`Unknown ${kind}: ${name}`);
    this.name = 'UnknownSketchError';
  }
}

export class DuplicateSketchError extends SketchError {
  constructor(kind: string, name: string) {
    super(`${kind} already exists: ${name}`);
    this.name = 'DuplicateSketchError';
  }
}

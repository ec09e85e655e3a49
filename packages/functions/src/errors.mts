/**
 * Error classes raised by the adapter factories and the predicate registry
 */

import type { ZodIssue } from "zod";

/**
 * Base class for every error this package throws
 */
export class FunctionAdapterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FunctionAdapterError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A required factory argument was missing or unusable.
 * Thrown when the function object is built, never when it is applied.
 */
export class InvalidArgumentError extends FunctionAdapterError {
  constructor(
    public readonly argumentName: string,
    reason = "must not be null or undefined",
  ) {
    super(`Argument '${argumentName}' ${reason}`, "INVALID_ARGUMENT", {
      argumentName,
    });
    this.name = "InvalidArgumentError";
  }
}

/**
 * `toStringFunction()` was applied to null or undefined
 */
export class NullReferenceError extends FunctionAdapterError {
  constructor(public readonly received: null | undefined) {
    super(
      `Cannot convert ${String(received)} to a string`,
      "NULL_REFERENCE",
      { received: String(received) },
    );
    this.name = "NullReferenceError";
  }
}

export class NotDurableError extends FunctionAdapterError {
  constructor() {
    super(
      "Predicate function wraps a predicate without a durable representation",
      "NOT_DURABLE",
    );
    this.name = "NotDurableError";
  }
}

export class UnknownPredicateKindError extends FunctionAdapterError {
  constructor(public readonly kind: string) {
    super(
      `No predicate factory registered for kind '${kind}'`,
      "UNKNOWN_PREDICATE_KIND",
      { kind },
    );
    this.name = "UnknownPredicateKindError";
  }
}

export class DuplicatePredicateKindError extends FunctionAdapterError {
  constructor(public readonly kind: string) {
    super(
      `Predicate kind '${kind}' is already registered`,
      "DUPLICATE_PREDICATE_KIND",
      { kind },
    );
    this.name = "DuplicatePredicateKindError";
  }
}

/**
 * Persisted input did not match the expected shape
 */
export class MalformedDescriptorError extends FunctionAdapterError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
    options?: ErrorOptions,
  ) {
    super(message, "MALFORMED_DESCRIPTOR", { issues }, options);
    this.name = "MalformedDescriptorError";
  }
}

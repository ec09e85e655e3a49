/**
 * @adapterkit/functions - Immutable function objects and their factories
 */

export * from "./callable.mjs";
export * from "./descriptor.mjs";
export * from "./durable.mjs";
export * from "./errors.mjs";
export * from "./functions.mjs";
export * from "./preconditions.mjs";
export * from "./predicate-function.mjs";
export * from "./types.mjs";

/**
 * Schemas for the persisted form of a predicate, and the check deciding
 * whether a predicate has one
 */

import { z } from "zod";

import type {
  DurablePredicate,
  JsonValue,
  Predicate,
  PredicateDescriptor,
} from "./types.mjs";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const predicateDescriptorSchema = z.object({
  kind: z.string().min(1),
  params: jsonValueSchema.optional(),
});

/**
 * Returns a fresh copy of the predicate's descriptor, or `undefined` when it
 * has no `toJSON` or its `toJSON` does not produce `{ kind, params? }`.
 */
export const readDescriptor = <T,>(
  predicate: Predicate<T>,
): PredicateDescriptor | undefined => {
  if (!("toJSON" in predicate) || typeof predicate.toJSON !== "function") {
    return undefined;
  }
  const parsed = predicateDescriptorSchema.safeParse(predicate.toJSON());
  return parsed.success ? parsed.data : undefined;
};

/**
 * Type guard for predicates whose `toJSON` yields a valid descriptor.
 *
 * @category Guards
 * @example
 * isDurable(definePredicate("even", null, (n: number) => n % 2 === 0));
 * // => true
 * isDurable({ test: (n: number) => n > 0 }); // => false
 * const named = { test: () => true, toJSON: () => "even" };
 * isDurable(named); // => false
 */
export const isDurable = <T,>(
  predicate: Predicate<T>,
): predicate is DurablePredicate<T> => readDescriptor(predicate) !== undefined;

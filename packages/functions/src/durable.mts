/**
 * @module durable
 * @description Durable representation for predicate-backed function objects.
 *
 * A closure cannot be written to disk, so a durable predicate carries a
 * descriptor instead: a `kind` naming the factory that rebuilds it and
 * optional JSON `params`. `forPredicate` over such a predicate serializes with
 * `JSON.stringify`, and a `PredicateRegistry` that knows the kind turns the
 * JSON back into an equivalent function object.
 *
 * @example
 * ```typescript
 * const multipleOf = (n: number) =>
 *   definePredicate('multiple-of', n, (x: number) => x % n === 0);
 *
 * const registry = new PredicateRegistry<number>().register(
 *   'multiple-of',
 *   (params) => multipleOf(Number(params)),
 * );
 *
 * const stored = JSON.stringify(forPredicate(multipleOf(3)));
 * // => '{"type":"predicate-function",
 * //     "predicate":{"kind":"multiple-of","params":3}}'
 * registry.parse(stored).apply(9); // => true
 * ```
 *
 * @since 2025-07-03
 */

import { loggerFactory } from "@adapterkit/logger";
import { z } from "zod";

import { predicateDescriptorSchema } from "./descriptor.mjs";
import {
  DuplicatePredicateKindError,
  InvalidArgumentError,
  MalformedDescriptorError,
  UnknownPredicateKindError,
} from "./errors.mjs";
import { forPredicate } from "./functions.mjs";
import { PREDICATE_FUNCTION_TYPE } from "./predicate-function.mjs";
import { checkPresent } from "./preconditions.mjs";

import type { BaseLogger } from "@adapterkit/logger";
import type { PredicateFunction } from "./predicate-function.mjs";
import type {
  DurablePredicate,
  JsonValue,
  Predicate,
  PredicateDescriptor,
} from "./types.mjs";

export const serializedPredicateFunctionSchema = z.object({
  type: z.literal(PREDICATE_FUNCTION_TYPE),
  predicate: predicateDescriptorSchema,
});

/**
 * Builds a predicate that serializes to `{ kind, params }`.
 * `params` is copied when the predicate is built, and `toJSON` returns a
 * fresh copy on every call.
 *
 * @throws {InvalidArgumentError} when `kind` is empty or `test` is missing
 * @example
 * const isEven = definePredicate('even', undefined, (n: number) =>
 *   n % 2 === 0,
 * );
 * JSON.stringify(isEven); // => '{"kind":"even"}'
 */
export const definePredicate = <T,>(
  kind: string,
  params: JsonValue | undefined,
  test: (input: T) => boolean,
): DurablePredicate<T> => {
  if (checkPresent(kind, "kind").length === 0) {
    throw new InvalidArgumentError("kind", "must not be empty");
  }
  const check = checkPresent(test, "test");
  const descriptor: PredicateDescriptor =
    params === undefined ? { kind } : { kind, params: structuredClone(params) };

  return Object.freeze({
    test: (input: T) => check(input),
    toJSON: () => structuredClone(descriptor),
  });
};

/**
 * Rebuilds a predicate from the `params` it was saved with.
 */
export type PredicateFactory<T> = (
  params: JsonValue | undefined,
) => Predicate<T>;

export interface PredicateRegistryOptions {
  /**
   * Receives registration and revival records at debug level,
   * and a warning when a kind is replaced.
   * @default loggerFactory({ name: "predicate-registry" }).logger
   */
  logger?: BaseLogger;
  /**
   * Let `register` replace an existing kind instead of throwing.
   * @default false
   */
  allowOverwrite?: boolean;
}

/**
 * Maps predicate kinds to factories and revives persisted predicate
 * functions.
 * Every predicate in one registry accepts the same input type `T`.
 */
export class PredicateRegistry<T = unknown> {
  private readonly factories = new Map<string, PredicateFactory<T>>();
  private readonly logger: BaseLogger;
  private readonly allowOverwrite: boolean;

  constructor(options: PredicateRegistryOptions = {}) {
    this.logger =
      options.logger ?? loggerFactory({ name: "predicate-registry" }).logger;
    this.allowOverwrite = options.allowOverwrite ?? false;
  }

  register(kind: string, factory: PredicateFactory<T>): this {
    if (checkPresent(kind, "kind").length === 0) {
      throw new InvalidArgumentError("kind", "must not be empty");
    }
    checkPresent(factory, "factory");

    if (this.factories.has(kind)) {
      if (!this.allowOverwrite) {
        throw new DuplicatePredicateKindError(kind);
      }
      this.logger.warn("Replacing predicate factory", { kind });
    }

    this.factories.set(kind, factory);
    this.logger.debug("Registered predicate factory", { kind });
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Rebuilds a predicate from its descriptor.
   *
   * @throws {MalformedDescriptorError} when `descriptor` is not
   * `{ kind, params? }`
   * @throws {UnknownPredicateKindError} when no factory is registered for
   * the kind
   */
  revivePredicate(descriptor: unknown): Predicate<T> {
    const parsed = predicateDescriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      throw new MalformedDescriptorError(
        "Malformed predicate descriptor",
        parsed.error.issues,
      );
    }
    return this.build(parsed.data);
  }

  /**
   * Rebuilds a predicate function from the object `JSON.stringify` produced.
   */
  revive(serialized: unknown): PredicateFunction<T> {
    const parsed = serializedPredicateFunctionSchema.safeParse(serialized);
    if (!parsed.success) {
      throw new MalformedDescriptorError(
        "Malformed predicate function",
        parsed.error.issues,
      );
    }
    const fn = forPredicate(this.build(parsed.data.predicate));
    this.logger.debug("Revived predicate function", {
      kind: parsed.data.predicate.kind,
    });
    return fn;
  }

  /**
   * `revive` for a JSON string.
   *
   * @throws {MalformedDescriptorError} when `json` is not valid JSON, with the
   * parser's error as `cause`
   */
  parse(json: string): PredicateFunction<T> {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (error) {
      throw new MalformedDescriptorError(
        "Predicate function is not valid JSON",
        [],
        { cause: error },
      );
    }
    return this.revive(value);
  }

  private build(descriptor: PredicateDescriptor): Predicate<T> {
    const factory = this.factories.get(descriptor.kind);
    if (!factory) {
      throw new UnknownPredicateKindError(descriptor.kind);
    }
    return factory(descriptor.params);
  }
}

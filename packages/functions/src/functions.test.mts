/**
 * @module functions.test
 * Tests for the function object factories
 */

import { describe, expect, it, vi } from "vitest";

import { fromCallable } from "./callable.mjs";
import {
  FunctionAdapterError,
  InvalidArgumentError,
  NullReferenceError,
} from "./errors.mjs";
import {
  Functions,
  compose,
  constant,
  forMap,
  forPredicate,
  identity,
  narrow,
  toStringFunction,
} from "./functions.mjs";
import { PredicateFunction } from "./predicate-function.mjs";

import type { Fn, Mapping, Predicate } from "./types.mjs";

// calls a factory the way untyped JavaScript would, bypassing parameter types
const callUnchecked = (
  factory: (...args: never[]) => unknown,
  ...args: unknown[]
): unknown => Reflect.apply(factory, undefined, args);

const invalidArgumentOf = (run: () => unknown): InvalidArgumentError => {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidArgumentError) return error;
    throw error;
  }
  throw new Error("expected InvalidArgumentError");
};

describe("identity", () => {
  it("should return its input unchanged", () => {
    expect(identity<number>().apply(42)).toBe(42);
    expect(identity<string>().apply("")).toBe("");
    expect(identity<null>().apply(null)).toBe(null);
    expect(identity<number>().apply(NaN)).toBe(NaN);
  });

  it("should preserve object identity", () => {
    const user = { name: "Alice" };
    expect(identity<typeof user>().apply(user)).toBe(user);
  });

  it("should share one instance across type arguments", () => {
    expect(identity<number>()).toBe(identity<string>());
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(identity())).toBe(true);
  });
});

describe("toStringFunction", () => {
  const toText = toStringFunction();

  it("should produce the textual form of its input", () => {
    expect(toText.apply(42)).toBe("42");
    expect(toText.apply(true)).toBe("true");
    expect(toText.apply("already text")).toBe("already text");
    expect(toText.apply([1, 2, 3])).toBe("1,2,3");
  });

  it("should use a custom toString", () => {
    const point = { x: 1, y: 2, toString: () => "(1, 2)" };
    expect(toText.apply(point)).toBe("(1, 2)");
  });

  it("should throw NullReferenceError for null", () => {
    expect(() => toText.apply(null)).toThrow(NullReferenceError);
    expect(() => toText.apply(null)).toThrow("Cannot convert null to a string");
  });

  it("should throw NullReferenceError for undefined", () => {
    expect(() => toText.apply(undefined)).toThrow(
      "Cannot convert undefined to a string",
    );
  });

  it("should expose the error code on the thrown error", () => {
    try {
      toText.apply(null);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FunctionAdapterError);
      expect(error).toMatchObject({
        name: "NullReferenceError",
        code: "NULL_REFERENCE",
        received: null,
      });
    }
  });

  it("should call toString instead of Symbol.toPrimitive", () => {
    const tagged = {
      toString: () => "via toString",
      [Symbol.toPrimitive]: () => "via primitive",
    };
    expect(toText.apply(tagged)).toBe("via toString");
  });

  it("should return the same frozen instance on every call", () => {
    expect(toStringFunction()).toBe(toStringFunction());
    expect(Object.isFrozen(toStringFunction())).toBe(true);
  });
});

describe("forMap", () => {
  describe("without a default", () => {
    const scores = new Map([
      ["a", 1],
      ["b", 2],
    ]);

    it("should return the mapped value", () => {
      expect(forMap(scores).apply("a")).toBe(1);
      expect(forMap(scores).apply("b")).toBe(2);
    });

    it("should return undefined for a missing key", () => {
      expect(forMap(scores).apply("z")).toBeUndefined();
    });

    it("should only call get on the mapping", () => {
      const mapping: Mapping<string, number> = {
        has: vi.fn(() => true),
        get: vi.fn(() => 7),
      };

      expect(forMap(mapping).apply("k")).toBe(7);
      expect(mapping.get).toHaveBeenCalledWith("k");
      expect(mapping.has).not.toHaveBeenCalled();
    });
  });

  describe("with a default", () => {
    it("should return the mapped value for a present key", () => {
      expect(forMap(new Map([["a", 1]]), 99).apply("a")).toBe(1);
    });

    it("should return the default for a missing key", () => {
      expect(forMap(new Map([["a", 1]]), 99).apply("z")).toBe(99);
    });

    it("should return a stored undefined instead of the default", () => {
      const sparse = new Map<string, number | undefined>([["a", undefined]]);
      const lookup = forMap(sparse, 99);

      expect(lookup.apply("a")).toBeUndefined();
      expect(lookup.apply("b")).toBe(99);
    });

    it("should return a stored null instead of the default", () => {
      const sparse = new Map<string, number | null>([["a", null]]);
      expect(forMap(sparse, 99).apply("a")).toBeNull();
    });

    it("should accept an absent default", () => {
      const lookup = forMap(new Map([["a", 1]]), null);
      expect(lookup.apply("a")).toBe(1);
      expect(lookup.apply("z")).toBeNull();
    });

    it("should decide by membership, not by the looked-up value", () => {
      const mapping: Mapping<string, string> = {
        has: vi.fn(() => true),
        get: vi.fn(() => undefined),
      };

      expect(forMap(mapping, "fallback").apply("k")).toBeUndefined();
      expect(mapping.has).toHaveBeenCalledWith("k");
    });
  });

  it("should be frozen with or without a default", () => {
    const table = new Map([["a", 1]]);
    expect(Object.isFrozen(forMap(table))).toBe(true);
    expect(Object.isFrozen(forMap(table, 0))).toBe(true);
  });

  it("should see entries added after construction", () => {
    const table = new Map<string, number>();
    const lookup = forMap(table);
    const withDefault = forMap(table, 0);

    table.set("late", 5);

    expect(lookup.apply("late")).toBe(5);
    expect(withDefault.apply("late")).toBe(5);
  });

  it("should see entries removed after construction", () => {
    const table = new Map([["gone", 1]]);
    const withDefault = forMap(table, -1);

    table.delete("gone");

    expect(withDefault.apply("gone")).toBe(-1);
  });

  it("should reject an absent mapping when built", () => {
    expect(() => callUnchecked(forMap, null)).toThrow(InvalidArgumentError);
    expect(() => callUnchecked(forMap, undefined, 5)).toThrow(
      "Argument 'mapping' must not be null or undefined",
    );
    expect(
      invalidArgumentOf(() => callUnchecked(forMap, null, 5)),
    ).toMatchObject({ argumentName: "mapping", code: "INVALID_ARGUMENT" });
  });
});

describe("compose", () => {
  const addOne = fromCallable((x: number) => x + 1);
  const double = fromCallable((x: number) => x * 2);

  it("should apply f first and g second", () => {
    expect(compose(double, addOne).apply(3)).toBe(8);
  });

  it("should depend on argument order", () => {
    expect(compose(addOne, double).apply(3)).toBe(7);
  });

  it("should change types across the composition", () => {
    const codes = new Map([
      ["ok", 200],
      ["missing", 404],
    ]);
    const codeText = compose(toStringFunction(), forMap(codes, 500));

    expect(codeText.apply("ok")).toBe("200");
    expect(codeText.apply("teapot")).toBe("500");
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(compose(double, addOne))).toBe(true);
  });

  it("should evaluate f before g", () => {
    const calls: string[] = [];
    const f: Fn<number, number> = {
      apply: (x) => {
        calls.push("f");
        return x;
      },
    };
    const g: Fn<number, number> = {
      apply: (x) => {
        calls.push("g");
        return x;
      },
    };

    compose(g, f).apply(1);

    expect(calls).toEqual(["f", "g"]);
  });

  it("should not call g when f throws", () => {
    const g = { apply: vi.fn((x: number) => x) };
    const f: Fn<number, number> = {
      apply: () => {
        throw new Error("f failed");
      },
    };

    expect(() => compose(g, f).apply(1)).toThrow("f failed");
    expect(g.apply).not.toHaveBeenCalled();
  });

  it("should propagate an error from g after f ran", () => {
    const f = { apply: vi.fn((x: number) => x + 1) };
    const g: Fn<number, number> = {
      apply: () => {
        throw new Error("g failed");
      },
    };

    expect(() => compose(g, f).apply(1)).toThrow("g failed");
    expect(f.apply).toHaveBeenCalledWith(1);
  });

  it("should reject an absent g or f when built", () => {
    expect(
      invalidArgumentOf(() => callUnchecked(compose, null, addOne)),
    ).toMatchObject({ argumentName: "g" });
    expect(
      invalidArgumentOf(() => callUnchecked(compose, double, null)),
    ).toMatchObject({ argumentName: "f" });
    expect(
      invalidArgumentOf(() => callUnchecked(compose, undefined, undefined)),
    ).toMatchObject({ argumentName: "g" });
  });
});

describe("forPredicate", () => {
  const isEven: Predicate<number> = { test: (n) => n % 2 === 0 };

  it("should agree with the predicate", () => {
    expect(forPredicate(isEven).apply(4)).toBe(true);
    expect(forPredicate(isEven).apply(3)).toBe(false);
  });

  it("should accept a predicate over a wider type", () => {
    const isPresent: Predicate<unknown> = {
      test: (value) => value !== null && value !== undefined,
    };
    const presentNumber: Fn<number | null, boolean> = forPredicate(isPresent);

    expect(presentNumber.apply(0)).toBe(true);
    expect(presentNumber.apply(null)).toBe(false);
  });

  it("should return a frozen PredicateFunction", () => {
    const fn = forPredicate(isEven);
    expect(fn).toBeInstanceOf(PredicateFunction);
    expect(Object.isFrozen(fn)).toBe(true);
  });

  it("should reject an absent predicate when built", () => {
    expect(
      invalidArgumentOf(() => callUnchecked(forPredicate, null)),
    ).toMatchObject({ argumentName: "predicate" });
  });
});

describe("constant", () => {
  it("should ignore its input", () => {
    const answer = constant(42);
    expect(answer.apply("anything")).toBe(42);
    expect(answer.apply(0)).toBe(42);
    expect(answer.apply({})).toBe(42);
    expect(answer.apply(null)).toBe(42);
    expect(answer.apply(undefined)).toBe(42);
  });

  it("should allow an absent value", () => {
    expect(constant(null).apply("x")).toBeNull();
    expect(constant(undefined).apply("x")).toBeUndefined();
  });

  it("should return the captured reference", () => {
    const config = { retries: 3 };
    expect(constant(config).apply(1)).toBe(config);
  });

  it("should be usable where a narrower input type is expected", () => {
    const zero: Fn<string, number> = constant(0);
    expect(zero.apply("ignored")).toBe(0);
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(constant("x"))).toBe(true);
  });
});

describe("narrow", () => {
  it("should return the same reference", () => {
    const text = toStringFunction();
    const idText = narrow<number, string>(text);

    expect(idText).toBe(text);
    expect(idText.apply(7)).toBe("7");
  });

  it("should pass absent input through", () => {
    expect(narrow(null)).toBeNull();
    expect(narrow(undefined)).toBeUndefined();
  });

  it("should accept a function over a wider input and narrower output", () => {
    const exact = constant("x" as const);
    const narrowed = narrow<number, string>(exact);

    expect(narrowed.apply(1)).toBe("x");
  });
});

describe("Functions", () => {
  it("should expose every factory", () => {
    expect(Functions.identity).toBe(identity);
    expect(Functions.toStringFunction).toBe(toStringFunction);
    expect(Functions.forMap).toBe(forMap);
    expect(Functions.compose).toBe(compose);
    expect(Functions.forPredicate).toBe(forPredicate);
    expect(Functions.constant).toBe(constant);
    expect(Functions.narrow).toBe(narrow);
  });
});

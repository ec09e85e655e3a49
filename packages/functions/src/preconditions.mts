import { InvalidArgumentError } from "./errors.mjs";

/**
 * Narrows away null and undefined, or throws `InvalidArgumentError` naming
 * the argument.
 *
 * @example
 * const mapping = checkPresent(input, "mapping");
 */
export const checkPresent = <T,>(
  value: T | null | undefined,
  argumentName: string,
): T => {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(argumentName);
  }
  return value;
};

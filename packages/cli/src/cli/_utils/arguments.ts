// pattern: Functional Core

import { InvalidArgumentError } from "@commander-js/extra-typings";

/**
 * Adapt a setting parser for Commander: its errors become
 * InvalidArgumentError so Commander reports them as usage errors
 */
export function asArgumentParser<T>(
  parse: (value: string) => T
): (value: string) => T {
  return (value: string): T => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(
        error instanceof Error ? error.message : String(error)
      );
    }
  };
}

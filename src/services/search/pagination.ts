import { Effect } from "effect";
import { InvalidParamsError } from "./types";

/** Deepest hit the backend will page to. */
export const MAX_OFFSET = 10000;

/** Largest page a single request may ask for. */
export const MAX_SIZE = 250;

/**
 * Reject pagination windows the backend would refuse or that would force
 * it to collect too many hits.
 */
export function checkParams(
  offset: number,
  size: number
): Effect.Effect<void, InvalidParamsError> {
  if (
    !Number.isInteger(offset) ||
    !Number.isInteger(size) ||
    offset < 0 ||
    size < 0 ||
    size > MAX_SIZE ||
    offset > MAX_OFFSET ||
    offset + size > MAX_OFFSET
  ) {
    return Effect.fail(
      new InvalidParamsError(
        `disallowed size/offset parameters (offset=${offset}, size=${size})`
      )
    );
  }
  return Effect.void;
}

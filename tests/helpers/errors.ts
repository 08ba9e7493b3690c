import { expect } from "vitest";
import { isArenaError, type ArenaErrorCode } from "../../src/arena/errors.js";

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}

/** Assert that `fn` throws an ArenaError with `code` */
export function expectArenaError(fn: () => unknown, code: ArenaErrorCode): void {
  const err = catchError(fn);
  expect(isArenaError(err) ? err.code : err).toBe(code);
}

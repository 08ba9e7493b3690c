/**
 * Active Position Index Tests
 */

import { describe, it, expect } from "vitest";
import { expectArenaError } from "./helpers/errors.js";
import {
  addPosition,
  createPositionIndex,
  idsIn,
  movePosition,
  partitionOf,
  removePosition,
  resetGames,
} from "../src/arena/position-index.js";

function indexWith(...ids: number[]) {
  const index = createPositionIndex();
  for (const id of ids) addPosition(index, id);
  return index;
}

describe("Position index", () => {
  it("should add new positions to the zero-votes partition", () => {
    const index = indexWith(1, 2, 3);
    expect(idsIn(index, "zeroVotes")).toEqual([1, 2, 3]);
    expect(index.inGame).toBe(0);
    expect(index.nonZero).toBe(0);
  });

  it("should move positions between partitions keeping them contiguous", () => {
    const index = indexWith(1, 2, 3);

    movePosition(index, 2, "eligible");
    expect(idsIn(index, "eligible")).toEqual([2]);
    expect(idsIn(index, "zeroVotes")).toEqual([1, 3]);

    movePosition(index, 3, "eligible");
    movePosition(index, 3, "inGame");
    expect(idsIn(index, "inGame")).toEqual([3]);
    expect(idsIn(index, "eligible")).toEqual([2]);
    expect(idsIn(index, "zeroVotes")).toEqual([1]);
    expect(index.nonZero).toBe(2);
  });

  it("should move a position across two partitions in one call", () => {
    const index = indexWith(1, 2);
    movePosition(index, 2, "inGame");
    expect(partitionOf(index, 2)).toBe("inGame");
    expect(index.inGame).toBe(1);
    expect(index.nonZero).toBe(1);

    movePosition(index, 2, "zeroVotes");
    expect(index.inGame).toBe(0);
    expect(index.nonZero).toBe(0);
  });

  it("should remove a position and keep the slot map consistent", () => {
    const index = indexWith(1, 2, 3);
    movePosition(index, 2, "eligible");
    movePosition(index, 3, "eligible");
    movePosition(index, 3, "inGame");

    removePosition(index, 2);

    expect(index.ids).toEqual([3, 1]);
    expect(index.slots.get(3)).toBe(0);
    expect(index.slots.get(1)).toBe(1);
    expect(index.slots.has(2)).toBe(false);
    expect(idsIn(index, "inGame")).toEqual([3]);
    expect(idsIn(index, "eligible")).toEqual([]);
  });

  it("should return paired positions to eligible on reset", () => {
    const index = indexWith(1, 2);
    movePosition(index, 1, "inGame");
    resetGames(index);
    expect(idsIn(index, "inGame")).toEqual([]);
    expect(idsIn(index, "eligible")).toEqual([1]);
    expect(idsIn(index, "zeroVotes")).toEqual([2]);
  });

  it("should reject unknown and duplicate ids", () => {
    const index = indexWith(1);
    expectArenaError(() => partitionOf(index, 9), "NotFound");
    expectArenaError(() => addPosition(index, 1), "InvariantViolation");
  });
});

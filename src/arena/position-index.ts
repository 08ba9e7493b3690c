/**
 * Active Staker Position Index
 *
 * Dense array of active staker position ids split into three partitions:
 *   [0, inGame)          paired in the running epoch
 *   [inGame, nonZero)    non-zero votes, not yet paired
 *   [nonZero, ids.length) zero votes
 *
 * All mutations go through addPosition, removePosition and movePosition.
 */

import { ArenaError, invariant } from "./errors.js";

export type Partition = "inGame" | "eligible" | "zeroVotes";

const ORDER: Record<Partition, number> = { inGame: 0, eligible: 1, zeroVotes: 2 };

export interface PositionIndex {
  ids: number[];
  slots: Map<number, number>;
  inGame: number;
  nonZero: number;
}

export function createPositionIndex(): PositionIndex {
  return { ids: [], slots: new Map(), inGame: 0, nonZero: 0 };
}

function slotOf(index: PositionIndex, id: number): number {
  const slot = index.slots.get(id);
  if (slot === undefined) {
    throw new ArenaError("NotFound", `Position ${id} is not in the active index`, { id });
  }
  return slot;
}

function swap(index: PositionIndex, a: number, b: number): void {
  if (a === b) return;
  const idA = index.ids[a];
  const idB = index.ids[b];
  index.ids[a] = idB;
  index.ids[b] = idA;
  index.slots.set(idB, a);
  index.slots.set(idA, b);
}

export function contains(index: PositionIndex, id: number): boolean {
  return index.slots.has(id);
}

export function partitionOf(index: PositionIndex, id: number): Partition {
  const slot = slotOf(index, id);
  if (slot < index.inGame) return "inGame";
  if (slot < index.nonZero) return "eligible";
  return "zeroVotes";
}

/**
 * Shift a position one partition up (towards inGame) or down
 */
function step(index: PositionIndex, id: number, from: Partition, up: boolean): void {
  const slot = slotOf(index, id);
  if (up && from === "zeroVotes") {
    swap(index, slot, index.nonZero);
    index.nonZero++;
  } else if (up && from === "eligible") {
    swap(index, slot, index.inGame);
    index.inGame++;
  } else if (!up && from === "inGame") {
    swap(index, slot, index.inGame - 1);
    index.inGame--;
  } else if (!up && from === "eligible") {
    swap(index, slot, index.nonZero - 1);
    index.nonZero--;
  }
}

export function movePosition(index: PositionIndex, id: number, target: Partition): void {
  let current = partitionOf(index, id);
  while (current !== target) {
    const up = ORDER[target] < ORDER[current];
    step(index, id, current, up);
    current = partitionOf(index, id);
  }
}

/** New positions start with zero votes */
export function addPosition(index: PositionIndex, id: number): void {
  invariant(!index.slots.has(id), `Position ${id} is already indexed`, { id });
  index.slots.set(id, index.ids.length);
  index.ids.push(id);
}

export function removePosition(index: PositionIndex, id: number): void {
  movePosition(index, id, "zeroVotes");
  swap(index, slotOf(index, id), index.ids.length - 1);
  index.ids.pop();
  index.slots.delete(id);
}

/** Ids in one partition, in index order */
export function idsIn(index: PositionIndex, partition: Partition): number[] {
  if (partition === "inGame") return index.ids.slice(0, index.inGame);
  if (partition === "eligible") return index.ids.slice(index.inGame, index.nonZero);
  return index.ids.slice(index.nonZero);
}

/** Start a new epoch: nobody is paired yet */
export function resetGames(index: PositionIndex): void {
  index.inGame = 0;
}

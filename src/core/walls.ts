import { assertWithinGrid, WORLD_HEIGHT, WORLD_WIDTH, type Direction } from "./types";

/** Each cell stores only its own top and left edge. */
export type StoredEdge = "up" | "left";

export type WallEdge = {
  x: number;
  y: number;
  edge: StoredEdge;
};

export type WallBit = {
  index: number;
  mask: number;
};

export const WALL_BLOCK_SIZE = (WORLD_WIDTH * WORLD_HEIGHT) / 4;

// Indexed by x & 3; four cells share one byte.
export const TOP_WALL_MASK = [0b00000001, 0b00000100, 0b00010000, 0b01000000] as const;
export const LEFT_WALL_MASK = [0b00000010, 0b00001000, 0b00100000, 0b10000000] as const;

/**
 * Resolves a wall on any side of a cell to the cell and edge that owns it.
 * Down and right walls belong to the neighbouring cell, wrapping around the
 * grid edges.
 */
export const resolveWallEdge = (x: number, y: number, direction: Direction): WallEdge => {
  assertWithinGrid(x, y);

  switch (direction) {
    case "up":
      return { x, y, edge: "up" };
    case "down":
      return { x, y: (y + 1) % WORLD_HEIGHT, edge: "up" };
    case "left":
      return { x, y, edge: "left" };
    case "right":
      return { x: (x + 1) % WORLD_WIDTH, y, edge: "left" };
  }
};

export const wallBitFor = ({ x, y, edge }: WallEdge): WallBit => {
  const masks = edge === "up" ? TOP_WALL_MASK : LEFT_WALL_MASK;
  return {
    index: (y * WORLD_WIDTH + x) >> 2,
    mask: masks[x & 0x03],
  };
};

/** Byte offset (within the wall block) and bit mask of a wall. */
export const wallIndexAndMask = (x: number, y: number, direction: Direction): WallBit =>
  wallBitFor(resolveWallEdge(x, y, direction));

export const readWall = (wallBlock: Uint8Array, x: number, y: number, direction: Direction): boolean => {
  const { index, mask } = wallIndexAndMask(x, y, direction);
  return (wallBlock[index] & mask) === mask;
};

export const writeWall = (
  wallBlock: Uint8Array,
  x: number,
  y: number,
  direction: Direction,
  present: boolean,
): void => {
  const { index, mask } = wallIndexAndMask(x, y, direction);
  wallBlock[index] = present ? wallBlock[index] | mask : wallBlock[index] & ~mask;
};

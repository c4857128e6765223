export interface GridCoord {
  x: number;
  y: number;
}

export const WORLD_WIDTH = 12;
export const WORLD_HEIGHT = 9;
export const WORLD_CELL_COUNT = WORLD_WIDTH * WORLD_HEIGHT;

export const SIM_TICK_RATE_HZ = 60;
export const SIM_TICK_CADENCE_MS = 1000 / SIM_TICK_RATE_HZ;

export type Direction = "up" | "down" | "left" | "right";

export const DIRECTION_SEQUENCE = ["up", "right", "down", "left"] as const satisfies readonly Direction[];

export const OPPOSITE_DIRECTION: Readonly<Record<Direction, Direction>> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export const rotateDirection = (direction: Direction, steps = 1): Direction => {
  const directionIndex: Record<Direction, number> = {
    up: 0,
    right: 1,
    down: 2,
    left: 3,
  };

  const normalizedSteps = ((steps % 4) + 4) % 4;
  const index = (directionIndex[direction] + normalizedSteps) % 4;
  return DIRECTION_SEQUENCE[index];
};

export const turnRight = (direction: Direction): Direction => rotateDirection(direction, 1);

export const turnLeft = (direction: Direction): Direction => rotateDirection(direction, -1);

export const turnAround = (direction: Direction): Direction => OPPOSITE_DIRECTION[direction];

export const isDirection = (value: unknown): value is Direction =>
  value === "up" || value === "down" || value === "left" || value === "right";

export type ArrowTile = Direction | "up-half" | "down-half" | "left-half" | "right-half";

export type TileType = "empty" | "rocket" | "hole" | ArrowTile;

const HALF_ARROW: Readonly<Record<Direction, ArrowTile>> = {
  up: "up-half",
  down: "down-half",
  left: "left-half",
  right: "right-half",
};

const ARROW_DIRECTION: Readonly<Record<ArrowTile, Direction>> = {
  up: "up",
  "up-half": "up",
  down: "down",
  "down-half": "down",
  left: "left",
  "left-half": "left",
  right: "right",
  "right-half": "right",
};

export const isArrowTile = (tile: TileType): tile is ArrowTile =>
  tile !== "empty" && tile !== "rocket" && tile !== "hole";

/**
 * Shrinks an arrow by one step: full arrows become half arrows, half arrows
 * disappear. Every other tile is returned unchanged.
 */
export const diminishTile = (tile: TileType): TileType => {
  if (isDirection(tile)) {
    return HALF_ARROW[tile];
  }

  if (isArrowTile(tile)) {
    return "empty";
  }

  return tile;
};

export const tileDirection = (tile: TileType): Direction | null =>
  isArrowTile(tile) ? ARROW_DIRECTION[tile] : null;

export type WalkerKind = "mouse" | "cat";

export type WalkerState = "alive" | "dead" | "rescued";

export type WalkResult = "none" | "new-square";

export type WorldStateChange = "win" | "lose" | "no-change";

export const isWithinGrid = (x: number, y: number): boolean =>
  Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < WORLD_WIDTH && y < WORLD_HEIGHT;

export const assertWithinGrid = (x: number, y: number): void => {
  if (!isWithinGrid(x, y)) {
    throw new RangeError(`Cell ${x},${y} is outside the ${WORLD_WIDTH}x${WORLD_HEIGHT} grid`);
  }
};

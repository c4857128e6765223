import { FixedPoint } from "./fixed-point";
import type { AppState, AppStateKind, StateMachine } from "./state-machine";
import {
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type Direction,
  type GridCoord,
  type TileType,
  type WalkerKind,
} from "./types";
import type { StoredEdge } from "./walls";
import type { World } from "./world";

export type SnapshotGrid = {
  readonly width: number;
  readonly height: number;
  readonly tileSize: number;
};

export type SnapshotTransition = {
  readonly target: AppStateKind;
  readonly framesLeft: number;
};

export type SnapshotTile = GridCoord & {
  readonly tile: Exclude<TileType, "empty">;
};

export type SnapshotWall = GridCoord & {
  readonly side: StoredEdge;
};

export type SnapshotWalker = {
  readonly kind: WalkerKind;
  readonly direction: Direction;
  readonly cell: GridCoord;
  /** Top-left corner of the walker in pixels. */
  readonly px: GridCoord;
};

export type SnapshotWorld = {
  readonly name: string;
  readonly author: string;
  readonly tiles: ReadonlyArray<SnapshotTile>;
  readonly walls: ReadonlyArray<SnapshotWall>;
  readonly walkers: ReadonlyArray<SnapshotWalker>;
};

export type Snapshot = Readonly<{
  grid: SnapshotGrid;
  state: Readonly<AppState>;
  transition: SnapshotTransition | null;
  world: SnapshotWorld;
}>;

type CreateSnapshotOptions = {
  tileSize?: number;
};

const DEFAULT_TILE_SIZE = 32;

const GRID_ORIGIN = FixedPoint.ZERO;
const GRID_WIDTH = new FixedPoint(WORLD_WIDTH, 0);
const GRID_HEIGHT = new FixedPoint(WORLD_HEIGHT, 0);

const copyState = (state: Readonly<AppState>): AppState => {
  switch (state.kind) {
    case "intro":
    case "menu":
      return { ...state };
    case "game":
      return {
        ...state,
        cursor: { ...state.cursor },
        stock: { ...state.stock },
        placements: state.placements.map((placement) => ({ ...placement })),
      };
  }
};

const collectTiles = (world: World): SnapshotTile[] => {
  const tiles: SnapshotTile[] = [];
  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const tile = world.getTile(x, y);
      if (tile !== "empty") {
        tiles.push({ x, y, tile });
      }
    }
  }
  return tiles;
};

const collectWalls = (world: World): SnapshotWall[] => {
  const walls: SnapshotWall[] = [];
  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      if (world.getWall(x, y, "up")) {
        walls.push({ x, y, side: "up" });
      }
      if (world.getWall(x, y, "left")) {
        walls.push({ x, y, side: "left" });
      }
    }
  }
  return walls;
};

const collectWalkers = (world: World, tileSize: number): SnapshotWalker[] => {
  return [...world.mice, ...world.cats].map((walker) => ({
    kind: walker.getType(),
    direction: walker.getDirection(),
    cell: walker.getCell(),
    px: {
      x: walker.getX().mapToLinearRange(GRID_ORIGIN, GRID_WIDTH, 0, WORLD_WIDTH * tileSize),
      y: walker.getY().mapToLinearRange(GRID_ORIGIN, GRID_HEIGHT, 0, WORLD_HEIGHT * tileSize),
    },
  }));
};

/** Read-only copy of everything a renderer needs for one frame. */
export const createSnapshot = (
  machine: StateMachine,
  { tileSize = DEFAULT_TILE_SIZE }: CreateSnapshotOptions = {},
): Snapshot => {
  if (!Number.isInteger(tileSize) || tileSize <= 0) {
    throw new RangeError(`tileSize must be a positive integer, got ${tileSize}`);
  }

  const world = machine.getWorld();
  const target = machine.getTargetState();

  return {
    grid: { width: WORLD_WIDTH, height: WORLD_HEIGHT, tileSize },
    state: copyState(machine.getState()),
    transition: target === null ? null : { target: target.kind, framesLeft: machine.getTransitionTimer() },
    world: {
      name: world.name,
      author: world.author,
      tiles: collectTiles(world),
      walls: collectWalls(world),
      walkers: collectWalkers(world, tileSize),
    },
  };
};

import { Walker } from "../entities/walker";
import {
  assertMapSize,
  cellIndex,
  decodeEntityByte,
  ENTITY_TYPE_MASK,
  encodeEntityByte,
  MAP_SIZE,
  readMapAuthor,
  readMapName,
  tileBlockOf,
  wallBlockOf,
} from "./map-format";
import { readWall, writeWall } from "./walls";
import {
  assertWithinGrid,
  diminishTile,
  tileDirection,
  turnAround,
  turnLeft,
  turnRight,
  WORLD_CELL_COUNT,
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type ArrowTile,
  type Direction,
  type TileType,
  type WalkerKind,
  type WorldStateChange,
} from "./types";

/** Every cell could hold a walker, so neither registry ever needs more room than this. */
export const MAX_WALKERS = WORLD_CELL_COUNT;

export type WorldLoadOptions = {
  /** Place the map's solution arrows on the grid. */
  solution?: boolean;
};

export type SolutionArrow = {
  x: number;
  y: number;
  direction: Direction;
};

type LoadedSource = {
  buffer: Uint8Array;
  options: WorldLoadOptions;
};

/**
 * The 12x9 puzzle grid: packed walls, the tile grid and the mouse and cat
 * registries. Walls wrap around the grid edges; the outer boundary is always
 * walled, so the wrap only matters for addressing.
 */
export class World {
  private readonly data = new Uint8Array(MAP_SIZE);
  private readonly walls = wallBlockOf(this.data);
  private readonly entities = tileBlockOf(this.data);
  private readonly tiles: TileType[] = new Array<TileType>(WORLD_CELL_COUNT).fill("empty");
  private readonly mouseRegistry: Walker[] = [];
  private readonly catRegistry: Walker[] = [];
  private solution: SolutionArrow[] = [];
  private source: LoadedSource | null = null;

  constructor() {
    this.closeBoundary();
  }

  static load(buffer: Uint8Array, options: WorldLoadOptions = {}): World {
    assertMapSize(buffer);
    const world = new World();
    world.source = { buffer: buffer.slice(), options: { ...options } };
    world.applySource(world.source);
    return world;
  }

  /** Restores the walls, tiles and walkers the world was loaded with. */
  reset(): void {
    this.data.fill(0);
    this.tiles.fill("empty");
    this.mouseRegistry.length = 0;
    this.catRegistry.length = 0;
    this.solution = [];

    if (this.source === null) {
      this.closeBoundary();
      return;
    }

    this.applySource(this.source);
  }

  get name(): string {
    return readMapName(this.data);
  }

  get author(): string {
    return readMapAuthor(this.data);
  }

  get mice(): ReadonlyArray<Walker> {
    return this.mouseRegistry;
  }

  get cats(): ReadonlyArray<Walker> {
    return this.catRegistry;
  }

  get solutionArrows(): ReadonlyArray<SolutionArrow> {
    return this.solution;
  }

  toBuffer(): Uint8Array {
    return this.data.slice();
  }

  getWall(x: number, y: number, direction: Direction): boolean {
    return readWall(this.walls, x, y, direction);
  }

  setWall(x: number, y: number, direction: Direction, present: boolean): void {
    writeWall(this.walls, x, y, direction, present);
  }

  getTile(x: number, y: number): TileType {
    assertWithinGrid(x, y);
    return this.tiles[cellIndex(x, y)];
  }

  setTile(x: number, y: number, tile: TileType): void {
    assertWithinGrid(x, y);
    this.tiles[cellIndex(x, y)] = tile;
  }

  getArrow(x: number, y: number): TileType {
    return this.getTile(x, y);
  }

  /** Places or clears an arrow. Rockets and holes cannot be covered. */
  setArrow(x: number, y: number, arrow: ArrowTile | "empty"): boolean {
    const current = this.getTile(x, y);
    if (current === "rocket" || current === "hole") {
      return false;
    }

    this.setTile(x, y, arrow);
    return true;
  }

  /**
   * Adds a walker at a cell. Returns false when the cell's entity slot is
   * already taken by a walker, rocket or hole.
   */
  createWalker(x: number, y: number, direction: Direction, kind: WalkerKind): boolean {
    assertWithinGrid(x, y);

    const index = cellIndex(x, y);
    const byte = this.entities[index];
    if ((byte & ENTITY_TYPE_MASK) !== 0) {
      return false;
    }

    const registry = kind === "mouse" ? this.mouseRegistry : this.catRegistry;
    if (registry.length >= MAX_WALKERS) {
      throw new RangeError(`Cannot register more than ${MAX_WALKERS} ${kind} walkers`);
    }

    registry.push(new Walker(x, y, direction, kind));

    const existing = decodeEntityByte(byte);
    this.entities[index] = encodeEntityByte({ entity: { kind, direction }, arrow: existing.arrow });
    return true;
  }

  /**
   * Advances the simulation by one frame.
   *
   * Walkers that enter a new cell resolve, in order: holes and rockets,
   * arrows, then walls. The outcome is computed before walkers that died or
   * were rescued are removed.
   */
  tick(): WorldStateChange {
    for (const walker of [...this.mouseRegistry, ...this.catRegistry]) {
      if (walker.walk() !== "new-square") {
        continue;
      }

      this.checkRocketsAndHoles(walker);
      this.checkArrows(walker);
      this.checkWalls(walker);
    }

    let change: WorldStateChange = "no-change";
    if (
      this.mouseRegistry.some((walker) => walker.getState() === "dead") ||
      this.catRegistry.some((walker) => walker.getState() === "rescued")
    ) {
      change = "lose";
    } else if (
      this.mouseRegistry.length > 0 &&
      this.mouseRegistry.every((walker) => walker.getState() === "rescued")
    ) {
      change = "win";
    }

    prune(this.mouseRegistry);
    prune(this.catRegistry);

    return change;
  }

  /** Picks the first open side out of: straight on, right, left, back. */
  checkWalls(walker: Walker): void {
    const { x, y } = walker.getCell();
    const direction = walker.getDirection();
    const candidates = [direction, turnRight(direction), turnLeft(direction), turnAround(direction)];

    for (const candidate of candidates) {
      if (!this.getWall(x, y, candidate)) {
        walker.setDirection(candidate);
        return;
      }
    }
  }

  private checkArrows(walker: Walker): void {
    const { x, y } = walker.getCell();
    const tile = this.getTile(x, y);
    const direction = tileDirection(tile);
    if (direction === null) {
      return;
    }

    if (walker.getType() === "cat" && turnAround(walker.getDirection()) === direction) {
      this.setTile(x, y, diminishTile(tile));
    }
    walker.setDirection(direction);
  }

  private checkRocketsAndHoles(walker: Walker): void {
    const { x, y } = walker.getCell();
    const tile = this.getTile(x, y);

    if (tile === "hole") {
      walker.kill();
    } else if (tile === "rocket") {
      walker.rescue();
    }
  }

  private applySource({ buffer, options }: LoadedSource): void {
    this.data.set(buffer);
    this.closeBoundary();

    for (let y = 0; y < WORLD_HEIGHT; y += 1) {
      for (let x = 0; x < WORLD_WIDTH; x += 1) {
        const index = cellIndex(x, y);
        const { entity, arrow } = decodeEntityByte(this.entities[index]);

        if (entity.kind === "mouse" || entity.kind === "cat") {
          // Free the slot so createWalker can claim it again.
          this.entities[index] = encodeEntityByte({ entity: { kind: "empty" }, arrow });
          this.createWalker(x, y, entity.direction, entity.kind);
        } else if (entity.kind === "rocket" || entity.kind === "hole") {
          this.tiles[index] = entity.kind;
        }

        if (arrow !== null) {
          this.solution.push({ x, y, direction: arrow });
          if (options.solution === true && this.tiles[index] === "empty") {
            this.tiles[index] = arrow;
          }
        }
      }
    }
  }

  private closeBoundary(): void {
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      this.setWall(x, 0, "up", true);
    }
    for (let y = 0; y < WORLD_HEIGHT; y += 1) {
      this.setWall(0, y, "left", true);
    }
  }
}

const prune = (registry: Walker[]): void => {
  let kept = 0;
  for (const walker of registry) {
    if (walker.isAlive()) {
      registry[kept] = walker;
      kept += 1;
    }
  }
  registry.length = kept;
};

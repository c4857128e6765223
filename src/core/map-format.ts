import { readWall, WALL_BLOCK_SIZE, writeWall } from "./walls";
import {
  WORLD_CELL_COUNT,
  WORLD_HEIGHT,
  WORLD_WIDTH,
  type Direction,
  type WalkerKind,
} from "./types";

// Layout of the 199 byte packed map:
//   0   name    (32 bytes, zero padded)
//   32  author  (32 bytes, zero padded)
//   64  walls   (27 bytes, top + left bit per cell, four cells per byte)
//   91  tiles   (108 bytes, one entity/arrow byte per cell)
export const MAP_NAME_OFFSET = 0;
export const MAP_NAME_SIZE = 32;
export const MAP_AUTHOR_OFFSET = MAP_NAME_OFFSET + MAP_NAME_SIZE;
export const MAP_AUTHOR_SIZE = 32;
export const MAP_HEADER_SIZE = MAP_AUTHOR_OFFSET + MAP_AUTHOR_SIZE;
export const WALL_BLOCK_OFFSET = MAP_HEADER_SIZE;
export const TILE_BLOCK_OFFSET = WALL_BLOCK_OFFSET + WALL_BLOCK_SIZE;
export const TILE_BLOCK_SIZE = WORLD_CELL_COUNT;
export const MAP_SIZE = TILE_BLOCK_OFFSET + TILE_BLOCK_SIZE;

export const ENTITY_TYPE_MASK = 0b11100000;
export const ENTITY_DIRECTION_MASK = 0b00011000;
export const ARROW_PRESENT_MASK = 0b00000100;
export const ARROW_DIRECTION_MASK = 0b00000011;

export type MapEntityKind = "empty" | WalkerKind | "rocket" | "hole";

const ENTITY_CODES: Readonly<Record<MapEntityKind, number>> = {
  empty: 0b000,
  mouse: 0b001,
  cat: 0b010,
  rocket: 0b011,
  hole: 0b100,
};

const ENTITY_KINDS_BY_CODE: ReadonlyArray<MapEntityKind> = ["empty", "mouse", "cat", "rocket", "hole"];

const DIRECTION_CODES: Readonly<Record<Direction, number>> = {
  up: 0b00,
  down: 0b01,
  left: 0b10,
  right: 0b11,
};

const DIRECTIONS_BY_CODE: ReadonlyArray<Direction> = ["up", "down", "left", "right"];

export type MapEntity =
  | { kind: "empty" }
  | { kind: WalkerKind; direction: Direction }
  | { kind: "rocket" }
  | { kind: "hole" };

export type MapCell = {
  entity: MapEntity;
  arrow: Direction | null;
};

export type MapWalls = {
  up: boolean;
  left: boolean;
};

/** Unpacked form of a map buffer. `walls` and `cells` are indexed `y * WORLD_WIDTH + x`. */
export type MapDescription = {
  name: string;
  author: string;
  walls: MapWalls[];
  cells: MapCell[];
};

export const cellIndex = (x: number, y: number): number => y * WORLD_WIDTH + x;

export const encodeEntityByte = ({ entity, arrow }: MapCell): number => {
  let byte = ENTITY_CODES[entity.kind] << 5;
  if (entity.kind === "mouse" || entity.kind === "cat") {
    byte |= DIRECTION_CODES[entity.direction] << 3;
  }
  if (arrow !== null) {
    byte |= ARROW_PRESENT_MASK | DIRECTION_CODES[arrow];
  }
  return byte;
};

export const decodeEntityByte = (byte: number): MapCell => {
  const entityCode = (byte & ENTITY_TYPE_MASK) >> 5;
  const kind: MapEntityKind | undefined = ENTITY_KINDS_BY_CODE[entityCode];
  if (kind === undefined) {
    throw new RangeError(`Unknown entity code ${entityCode} in tile byte 0x${byte.toString(16)}`);
  }

  const arrow = (byte & ARROW_PRESENT_MASK) !== 0 ? DIRECTIONS_BY_CODE[byte & ARROW_DIRECTION_MASK] : null;
  const entityDirection = DIRECTIONS_BY_CODE[(byte & ENTITY_DIRECTION_MASK) >> 3];

  switch (kind) {
    case "mouse":
    case "cat":
      return { entity: { kind, direction: entityDirection }, arrow };
    case "empty":
    case "rocket":
    case "hole":
      return { entity: { kind }, arrow };
  }
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export const encodedLength = (text: string): number => textEncoder.encode(text).length;

const writeText = (target: Uint8Array, offset: number, size: number, text: string, field: string): void => {
  const bytes = textEncoder.encode(text);
  if (bytes.length > size) {
    throw new RangeError(`Map ${field} "${text}" is ${bytes.length} bytes; the limit is ${size}`);
  }
  for (let index = 0; index < bytes.length; index += 1) {
    target[offset + index] = bytes[index];
  }
};

const readText = (source: Uint8Array, offset: number, size: number): string => {
  let end = offset;
  while (end < offset + size && source[end] !== 0) {
    end += 1;
  }
  return textDecoder.decode(source.slice(offset, end));
};

export const assertMapSize = (buffer: Uint8Array): void => {
  if (buffer.length !== MAP_SIZE) {
    throw new RangeError(`Packed map must be ${MAP_SIZE} bytes, got ${buffer.length}`);
  }
};

export const readMapName = (buffer: Uint8Array): string => readText(buffer, MAP_NAME_OFFSET, MAP_NAME_SIZE);

export const readMapAuthor = (buffer: Uint8Array): string => readText(buffer, MAP_AUTHOR_OFFSET, MAP_AUTHOR_SIZE);

export const wallBlockOf = (buffer: Uint8Array): Uint8Array =>
  buffer.subarray(WALL_BLOCK_OFFSET, WALL_BLOCK_OFFSET + WALL_BLOCK_SIZE);

export const tileBlockOf = (buffer: Uint8Array): Uint8Array =>
  buffer.subarray(TILE_BLOCK_OFFSET, TILE_BLOCK_OFFSET + TILE_BLOCK_SIZE);

export const createEmptyMapDescription = (name = "", author = ""): MapDescription => ({
  name,
  author,
  walls: Array.from({ length: WORLD_CELL_COUNT }, () => ({ up: false, left: false })),
  cells: Array.from({ length: WORLD_CELL_COUNT }, () => ({ entity: { kind: "empty" }, arrow: null })),
});

export const encodeMap = (description: MapDescription): Uint8Array => {
  if (description.walls.length !== WORLD_CELL_COUNT || description.cells.length !== WORLD_CELL_COUNT) {
    throw new RangeError(`Map description must cover ${WORLD_CELL_COUNT} cells`);
  }

  const buffer = new Uint8Array(MAP_SIZE);
  writeText(buffer, MAP_NAME_OFFSET, MAP_NAME_SIZE, description.name, "name");
  writeText(buffer, MAP_AUTHOR_OFFSET, MAP_AUTHOR_SIZE, description.author, "author");

  const walls = wallBlockOf(buffer);
  const tiles = tileBlockOf(buffer);
  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const index = cellIndex(x, y);
      writeWall(walls, x, y, "up", description.walls[index].up);
      writeWall(walls, x, y, "left", description.walls[index].left);
      tiles[index] = encodeEntityByte(description.cells[index]);
    }
  }

  return buffer;
};

export const decodeMap = (buffer: Uint8Array): MapDescription => {
  assertMapSize(buffer);

  const description = createEmptyMapDescription(readMapName(buffer), readMapAuthor(buffer));
  const walls = wallBlockOf(buffer);
  const tiles = tileBlockOf(buffer);

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const index = cellIndex(x, y);
      description.walls[index] = {
        up: readWall(walls, x, y, "up"),
        left: readWall(walls, x, y, "left"),
      };
      description.cells[index] = decodeEntityByte(tiles[index]);
    }
  }

  return description;
};

import {
  cellIndex,
  createEmptyMapDescription,
  encodedLength,
  encodeMap,
  MAP_AUTHOR_SIZE,
  MAP_NAME_SIZE,
  type MapDescription,
  type MapEntity,
} from "../core/map-format";
import { WORLD_HEIGHT, WORLD_WIDTH, type Direction } from "../core/types";

// A puzzle is drawn with box drawing characters, five columns per cell:
//
//   ┌────┬────┐   even rows: top walls, '─' at x*5+1..4
//   │M>  │  A^│   odd rows:  left wall at x*5, entity at x*5+1..2, arrow at x*5+3..4
//   └────┴────┘
//
// Only top and left walls are read. The last row mirrors the first and is
// there for looks.
export const PUZZLE_ROW_COUNT = WORLD_HEIGHT * 2 + 1;
export const PUZZLE_ROW_LENGTH = WORLD_WIDTH * 5 + 1;
const CELL_STRIDE = 5;

const TOP_WALL_GLYPH = "─";
const LEFT_WALL_GLYPH = "│";

export type PuzzleErrorReason =
  | "missing-header"
  | "empty-name"
  | "name-too-long"
  | "empty-author"
  | "author-too-long"
  | "row-count"
  | "row-length"
  | "top-bottom-mismatch"
  | "top-wall-mismatch"
  | "left-right-mismatch"
  | "top-wall-glyph"
  | "left-wall-glyph"
  | "arrow-glyph"
  | "entity-glyph";

export type PuzzleResult =
  | { ok: true; map: Uint8Array; description: MapDescription }
  | { ok: false; reason: PuzzleErrorReason; row: number | null; message: string };

export type PuzzleFailure = Extract<PuzzleResult, { ok: false }>;

const fail = (reason: PuzzleErrorReason, row: number | null, message: string): PuzzleFailure => ({
  ok: false,
  reason,
  row,
  message,
});

const GLYPH_DIRECTIONS: Readonly<Record<string, Direction>> = {
  "^": "up",
  v: "down",
  "<": "left",
  ">": "right",
};

const glyphDirection = (glyph: string): Direction | null => GLYPH_DIRECTIONS[glyph] ?? null;

const checkLabel = (
  value: string,
  limit: number,
  field: "name" | "author",
): PuzzleFailure | null => {
  if (value.length === 0) {
    return fail(field === "name" ? "empty-name" : "empty-author", null, `Map ${field} cannot be empty`);
  }
  const length = encodedLength(value);
  if (length > limit) {
    return fail(
      field === "name" ? "name-too-long" : "author-too-long",
      null,
      `Map ${field} is ${length} bytes; the limit is ${limit}`,
    );
  }
  return null;
};

const parseTopWall = (glyph: string, row: number): boolean | PuzzleFailure => {
  if (glyph === TOP_WALL_GLYPH) {
    return true;
  }
  if (glyph === " ") {
    return false;
  }
  if (glyph === "-") {
    return fail("top-wall-glyph", row, `Top wall must be ' ' or '${TOP_WALL_GLYPH}', found an ASCII '-'`);
  }
  return fail("top-wall-glyph", row, `Top wall must be ' ' or '${TOP_WALL_GLYPH}', found '${glyph}'`);
};

const parseLeftWall = (glyph: string, row: number): boolean | PuzzleFailure => {
  if (glyph === LEFT_WALL_GLYPH) {
    return true;
  }
  if (glyph === " ") {
    return false;
  }
  if (glyph === "|") {
    return fail("left-wall-glyph", row, `Left wall must be ' ' or '${LEFT_WALL_GLYPH}', found an ASCII '|'`);
  }
  return fail("left-wall-glyph", row, `Left wall must be ' ' or '${LEFT_WALL_GLYPH}', found '${glyph}'`);
};

const parseArrow = (marker: string, glyph: string, row: number): Direction | null | PuzzleFailure => {
  if (marker === " " && glyph === " ") {
    return null;
  }
  if (marker !== "A") {
    return fail("arrow-glyph", row, `Unexpected characters '${marker}${glyph}' in arrow slot`);
  }
  return glyphDirection(glyph) ?? fail("arrow-glyph", row, "An arrow 'A' must be followed by one of <>^v");
};

const parseEntity = (marker: string, glyph: string, row: number): MapEntity | PuzzleFailure => {
  switch (marker) {
    case " ":
      return glyph === " "
        ? { kind: "empty" }
        : fail("entity-glyph", row, `Unexpected characters '${marker}${glyph}' in entity slot`);
    case "M":
    case "C": {
      const direction = glyphDirection(glyph);
      if (direction === null) {
        return fail("entity-glyph", row, "A mouse or cat must be followed by one of <>^v");
      }
      return { kind: marker === "M" ? "mouse" : "cat", direction };
    }
    case "R":
    case "H":
      if (glyph !== " ") {
        return fail("entity-glyph", row, "A rocket or hole must be followed by a blank space");
      }
      return { kind: marker === "R" ? "rocket" : "hole" };
    default:
      return fail("entity-glyph", row, `Unexpected characters '${marker}${glyph}' in entity slot`);
  }
};

const isFailure = (value: unknown): value is PuzzleFailure =>
  typeof value === "object" && value !== null && "ok" in value && value.ok === false;

/**
 * Validates a drawn puzzle and packs it into a map buffer. Expected authoring
 * mistakes come back as `{ ok: false }` with the offending row, if any.
 */
export const parsePuzzle = (name: string, author: string, rows: ReadonlyArray<string>): PuzzleResult => {
  const labelFailure = checkLabel(name, MAP_NAME_SIZE, "name") ?? checkLabel(author, MAP_AUTHOR_SIZE, "author");
  if (labelFailure !== null) {
    return labelFailure;
  }

  if (rows.length !== PUZZLE_ROW_COUNT) {
    return fail("row-count", null, `Puzzle must have ${PUZZLE_ROW_COUNT} rows, got ${rows.length}`);
  }

  // Split into code points so box drawing glyphs count as one column each.
  const grid = rows.map((row) => Array.from(row));
  for (const [row, glyphs] of grid.entries()) {
    if (glyphs.length !== PUZZLE_ROW_LENGTH) {
      return fail(
        "row-length",
        row,
        `Row ${row} must be ${PUZZLE_ROW_LENGTH} characters long, got ${glyphs.length}`,
      );
    }
  }

  const first = grid[0];
  const last = grid[PUZZLE_ROW_COUNT - 1];
  for (let x = 0; x < WORLD_WIDTH; x += 1) {
    if (first[x * CELL_STRIDE + 1] !== last[x * CELL_STRIDE + 1]) {
      return fail("top-bottom-mismatch", PUZZLE_ROW_COUNT - 1, "Top and bottom walls must match");
    }
  }

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2;
    const glyphs = grid[row];
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const start = x * CELL_STRIDE + 1;
      for (let offset = 1; offset < CELL_STRIDE - 1; offset += 1) {
        if (glyphs[start + offset] !== glyphs[start]) {
          return fail("top-wall-mismatch", row, `All top wall glyphs of cell ${x} must match`);
        }
      }
    }
  }

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2 + 1;
    const glyphs = grid[row];
    if (glyphs[0] !== glyphs[PUZZLE_ROW_LENGTH - 1]) {
      return fail("left-right-mismatch", row, "Left and right walls must match");
    }
  }

  const description = createEmptyMapDescription(name, author);

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2;
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const wall = parseTopWall(grid[row][x * CELL_STRIDE + 1], row);
      if (isFailure(wall)) {
        return wall;
      }
      description.walls[cellIndex(x, y)].up = wall;
    }
  }

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2 + 1;
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const wall = parseLeftWall(grid[row][x * CELL_STRIDE], row);
      if (isFailure(wall)) {
        return wall;
      }
      description.walls[cellIndex(x, y)].left = wall;
    }
  }

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2 + 1;
    const glyphs = grid[row];
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const arrow = parseArrow(glyphs[x * CELL_STRIDE + 3], glyphs[x * CELL_STRIDE + 4], row);
      if (isFailure(arrow)) {
        return arrow;
      }
      description.cells[cellIndex(x, y)].arrow = arrow;
    }
  }

  for (let y = 0; y < WORLD_HEIGHT; y += 1) {
    const row = y * 2 + 1;
    const glyphs = grid[row];
    for (let x = 0; x < WORLD_WIDTH; x += 1) {
      const entity = parseEntity(glyphs[x * CELL_STRIDE + 1], glyphs[x * CELL_STRIDE + 2], row);
      if (isFailure(entity)) {
        return entity;
      }
      description.cells[cellIndex(x, y)].entity = entity;
    }
  }

  return { ok: true, map: encodeMap(description), description };
};

/** Like `parsePuzzle`, but throws on a malformed puzzle. */
export const puzzle = (name: string, author: string, rows: ReadonlyArray<string>): Uint8Array => {
  const result = parsePuzzle(name, author, rows);
  if (!result.ok) {
    const location = result.row === null ? "" : ` (row ${result.row})`;
    throw new Error(`Invalid puzzle "${name}"${location}: ${result.message}`);
  }
  return result.map;
};

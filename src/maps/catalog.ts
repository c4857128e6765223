import { readdirSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { parsePuzzle, type PuzzleResult } from "./puzzle";

export type BundledMap = {
  /** File name without the `.txt` extension. */
  slug: string;
  name: string;
  author: string;
  map: Uint8Array;
};

const MAP_FILE_EXTENSION = ".txt";
const DEFAULT_MAP_DIRECTORY = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "maps");

const readHeader = (line: string | undefined, key: "name" | "author"): string | null => {
  const prefix = `${key}:`;
  if (line === undefined || !line.startsWith(prefix)) {
    return null;
  }
  return line.slice(prefix.length).trim();
};

/**
 * Parses one map file: a `name:` line, an `author:` line, then the drawn
 * puzzle rows. Trailing blank lines are ignored.
 */
export const parseMapSource = (text: string): PuzzleResult => {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }

  const name = readHeader(lines[0], "name");
  if (name === null) {
    return { ok: false, reason: "missing-header", row: null, message: "Map file must start with a 'name:' line" };
  }

  const author = readHeader(lines[1], "author");
  if (author === null) {
    return {
      ok: false,
      reason: "missing-header",
      row: null,
      message: "Map file must have an 'author:' line after the name",
    };
  }

  return parsePuzzle(name, author, lines.slice(2));
};

/** Loads every `*.txt` map in a directory, in file name order. */
export const loadBundledMaps = (directory: string = DEFAULT_MAP_DIRECTORY): BundledMap[] => {
  const files = readdirSync(directory)
    .filter((file) => file.endsWith(MAP_FILE_EXTENSION))
    .sort();

  return files.map((file) => {
    const result = parseMapSource(readFileSync(join(directory, file), "utf8"));
    if (!result.ok) {
      const location = result.row === null ? "" : ` at puzzle row ${result.row}`;
      throw new Error(`Map file ${file} is invalid${location}: ${result.message}`);
    }

    return {
      slug: file.slice(0, -MAP_FILE_EXTENSION.length),
      name: result.description.name,
      author: result.description.author,
      map: result.map,
    };
  });
};

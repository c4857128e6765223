import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { loadBundledMaps } from "../src/maps/catalog";

const OUTPUT_DIRECTORY = join("dist", "maps");

const main = (): void => {
  const maps = loadBundledMaps();
  mkdirSync(OUTPUT_DIRECTORY, { recursive: true });

  for (const { slug, name, author, map } of maps) {
    const file = join(OUTPUT_DIRECTORY, `${slug}.bin`);
    writeFileSync(file, map);
    console.log(`packed "${name}" by ${author} -> ${file} (${map.length} bytes)`);
  }

  console.log(`${maps.length} map(s) written to ${OUTPUT_DIRECTORY}`);
};

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

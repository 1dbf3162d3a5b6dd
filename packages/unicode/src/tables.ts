import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const MappingTableSchema = z.record(z.string(), z.string());

/** Code point (as a string) to its replacement */
export type MappingTable = ReadonlyMap<string, string>;

function getDataDir(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // src/ -> packages/unicode/data/
  return resolve(currentDir, "..", "data");
}

function loadMappingTable(fileName: string): MappingTable {
  const content: unknown = JSON.parse(readFileSync(resolve(getDataDir(), fileName), "utf-8"));
  return new Map(Object.entries(MappingTableSchema.parse(content)));
}

function lazy(fileName: string): () => MappingTable {
  let table: MappingTable | undefined;
  return () => {
    table ??= loadMappingTable(fileName);
    return table;
  };
}

/**
 * CJK compatibility ideographs to their standardized variation sequences
 * (StandardizedVariants.txt), e.g. U+F900 to U+8C48 U+FE00.
 */
export const cjkCompatVariants = lazy("cjk-compat-variants.json");

/** Full case folding, statuses C and F of CaseFolding.txt */
export const caseFolding = lazy("case-folding.json");

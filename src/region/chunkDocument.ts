// src/region/chunkDocument.ts
import { docField, docInteger, docPath, type DocValue } from "./document.js";
import { CorruptFormatError } from "./errors.js";

export const SECTION_COUNT = 10;
export const SECTION_HEIGHT = 32;
export const CHUNK_WIDTH = 32;
export const WORLD_HEIGHT = SECTION_COUNT * SECTION_HEIGHT;

export type BlockComponent = Readonly<{
  version?: number;
  data: Uint8Array;
}>;

export type FluidComponent = Readonly<{
  data: Uint8Array;
}>;

/** Per-chunk heightmap / tint blob. */
export type BlockChunkComponent = Readonly<{
  version?: number;
  data: Uint8Array;
}>;

export type SectionDocument = Readonly<{
  index: number;
  block?: BlockComponent;
  fluid?: FluidComponent;
}>;

export type ChunkDocument = Readonly<{
  sections: ReadonlyArray<SectionDocument>;
  blockChunk?: BlockChunkComponent;
  root: DocValue;
}>;

function fail(path: string, msg: string): never {
  throw new CorruptFormatError(`chunk document: ${path}: ${msg}`);
}

function requireMap(value: DocValue | undefined, path: string): DocValue {
  if (value === undefined) fail(path, "missing");
  if (value.kind !== "map") fail(path, `expected map, got ${value.kind}`);
  return value;
}

function requireBinary(value: DocValue | undefined, path: string): Uint8Array {
  if (value === undefined) fail(path, "missing");
  if (value.kind !== "binary") fail(path, `expected binary, got ${value.kind}`);
  return value.value;
}

function optionalVersion(value: DocValue | undefined, path: string): number | undefined {
  if (value === undefined) return undefined;
  const n = docInteger(value);
  if (n === undefined) fail(path, `expected integer, got ${value.kind}`);
  return n;
}

function readVersioned(
  value: DocValue | undefined,
  path: string,
): { version?: number; data: Uint8Array } | undefined {
  if (value === undefined || value.kind === "null") return undefined;
  const map = requireMap(value, path);
  const data = requireBinary(docField(map, "Data"), `${path}.Data`);
  const version = optionalVersion(docField(map, "Version"), `${path}.Version`);
  return version === undefined ? { data } : { version, data };
}

function readSection(value: DocValue, index: number): SectionDocument {
  const path = `Components.ChunkColumn.Sections[${index}]`;
  const components = requireMap(docField(requireMap(value, path), "Components"), `${path}.Components`);

  const block = readVersioned(docField(components, "Block"), `${path}.Components.Block`);

  let fluid: FluidComponent | undefined;
  const fluidValue = docField(components, "Fluid");
  if (fluidValue !== undefined && fluidValue.kind !== "null") {
    const fluidMap = requireMap(fluidValue, `${path}.Components.Fluid`);
    fluid = { data: requireBinary(docField(fluidMap, "Data"), `${path}.Components.Fluid.Data`) };
  }

  return {
    index,
    ...(block !== undefined ? { block } : {}),
    ...(fluid !== undefined ? { fluid } : {}),
  };
}

/**
 * Validates the chunk schema: `Components.ChunkColumn.Sections` must be a
 * sequence of exactly SECTION_COUNT section maps, bottom to top.
 */
export function readChunkDocument(root: DocValue): ChunkDocument {
  requireMap(root, "<root>");
  const sectionsValue = docPath(root, ["Components", "ChunkColumn", "Sections"]);
  if (sectionsValue === undefined) fail("Components.ChunkColumn.Sections", "missing");
  if (sectionsValue.kind !== "seq") {
    fail("Components.ChunkColumn.Sections", `expected sequence, got ${sectionsValue.kind}`);
  }
  if (sectionsValue.items.length !== SECTION_COUNT) {
    fail(
      "Components.ChunkColumn.Sections",
      `expected ${SECTION_COUNT} sections, got ${sectionsValue.items.length}`,
    );
  }

  const sections = sectionsValue.items.map((s, i) => readSection(s, i));
  const blockChunk = readVersioned(
    docPath(root, ["Components", "BlockChunk"]),
    "Components.BlockChunk",
  );

  return blockChunk === undefined ? { sections, root } : { sections, blockChunk, root };
}

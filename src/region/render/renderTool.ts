// src/region/render/renderTool.ts
import path from "node:path";
import { mkdir, stat, writeFile } from "node:fs/promises";

import type { ChunkDocument } from "../chunkDocument.js";
import { loadBlockProperties, type BlockPropertiesTable } from "../blockProperties.js";
import { NotFoundError, type WarnFn } from "../errors.js";
import { WorldReader } from "../world.js";
import { ChunkRenderer } from "./chunkRenderer.js";
import { Compositor } from "./compositor.js";
import { renderMap, type ChunkRange } from "./mapRenderer.js";
import { writePngRgb } from "./png.js";

export type RenderToolOptions = Readonly<{
  world: string;
  properties: string;
  scale: number;
  out?: string;
  overwrite?: boolean;
  dryRun?: boolean;
}>;

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

export function defaultChunkOutFile(chunkX: number, chunkZ: number): string {
  return `chunk_${chunkX}_${chunkZ}.png`;
}

export function defaultMapOutFile(range: ChunkRange): string {
  return `map_${range.startX}_${range.startZ}_to_${range.endX}_${range.endZ}.png`;
}

/** A missing table is not fatal: every block then takes the fallback colours. */
export async function loadPropertiesOrEmpty(file: string, warn: WarnFn): Promise<BlockPropertiesTable> {
  if (!(await existsPath(file))) {
    warn(`Block properties not found at ${file}; using fallback colours`);
    return new Map();
  }
  return loadBlockProperties(file, warn);
}

async function makeRenderer(opts: RenderToolOptions, warn: WarnFn): Promise<ChunkRenderer> {
  const properties = await loadPropertiesOrEmpty(opts.properties, warn);
  return new ChunkRenderer(new Compositor(properties, warn));
}

/** Returns false when the output exists (and --overwrite is off) or on dry run. */
async function shouldWrite(label: string, outPath: string, opts: RenderToolOptions): Promise<boolean> {
  if (opts.overwrite !== true && (await existsPath(outPath))) {
    console.warn(`Skip (exists): ${outPath}`);
    return false;
  }
  if (opts.dryRun === true) {
    console.log(`[dry-run] ${label} -> ${outPath}`);
    return false;
  }
  return true;
}

export async function runRenderChunkTool(chunkX: number, chunkZ: number, opts: RenderToolOptions): Promise<void> {
  const warn: WarnFn = (m) => console.warn(m);
  const outPath = opts.out ?? defaultChunkOutFile(chunkX, chunkZ);
  const label = `chunk (${chunkX}, ${chunkZ})`;
  if (!(await shouldWrite(label, outPath, opts))) return;

  const renderer = await makeRenderer(opts, warn);
  const world = new WorldReader(opts.world, warn);

  let doc: ChunkDocument;
  try {
    doc = await world.readChunk(chunkX, chunkZ);
  } catch (e: unknown) {
    if (e instanceof NotFoundError) {
      console.warn(`Chunk (${chunkX}, ${chunkZ}) not present: ${e.message}`);
      return;
    }
    throw e;
  }

  const img = renderer.renderChunk(doc, { pixelsPerBlock: opts.scale });
  await ensureParentDir(outPath);
  await writeFile(outPath, writePngRgb(img));
  console.log(`${label} -> ${outPath} (${img.width}x${img.height})`);
}

export async function runRenderMapTool(range: ChunkRange, opts: RenderToolOptions): Promise<void> {
  const warn: WarnFn = (m) => console.warn(m);
  const outPath = opts.out ?? defaultMapOutFile(range);
  const w = range.endX - range.startX + 1;
  const h = range.endZ - range.startZ + 1;
  const label = `${w}x${h} chunks from (${range.startX}, ${range.startZ})`;
  if (!(await shouldWrite(label, outPath, opts))) return;

  const renderer = await makeRenderer(opts, warn);
  const world = new WorldReader(opts.world, warn);

  const result = await renderMap(world, range, renderer, { pixelsPerBlock: opts.scale }, warn);
  await ensureParentDir(outPath);
  await writeFile(outPath, writePngRgb(result.image));
  console.log(
    `${label} -> ${outPath} (${result.image.width}x${result.image.height}, rendered=${result.rendered} skipped=${result.skipped})`,
  );
}

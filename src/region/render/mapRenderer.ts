// src/region/render/mapRenderer.ts
import { errorMessage, isRegionError, type WarnFn } from "../errors.js";
import type { WorldReader } from "../world.js";
import { assertPixelsPerBlock, CHUNK_PIXELS, type ChunkRenderer, type ChunkRenderOptions } from "./chunkRenderer.js";
import { blit, createImage, type RgbImage } from "./rgbImage.js";

/** Inclusive chunk range. */
export type ChunkRange = Readonly<{
  startX: number;
  startZ: number;
  endX: number;
  endZ: number;
}>;

export type MapRenderResult = Readonly<{
  image: RgbImage;
  rendered: number;
  skipped: number;
}>;

export function parseChunkRange(startX: number, startZ: number, endX: number, endZ: number): ChunkRange {
  for (const v of [startX, startZ, endX, endZ]) {
    if (!Number.isInteger(v)) throw new Error(`Invalid chunk coordinate: ${v}`);
  }
  if (endX < startX || endZ < startZ) {
    throw new Error(`Invalid chunk range: (${startX},${startZ}) to (${endX},${endZ})`);
  }
  return { startX, startZ, endX, endZ };
}

/**
 * Tiles every chunk of the range into one image, in chunk-grid order.
 * Absent or undecodable chunks are reported and left black.
 */
export async function renderMap(
  world: WorldReader,
  range: ChunkRange,
  renderer: ChunkRenderer,
  opts: ChunkRenderOptions = {},
  warn?: WarnFn,
): Promise<MapRenderResult> {
  const p = opts.pixelsPerBlock ?? 1;
  assertPixelsPerBlock(p);

  const chunkSize = CHUNK_PIXELS * p;
  const image = createImage(
    (range.endX - range.startX + 1) * chunkSize,
    (range.endZ - range.startZ + 1) * chunkSize,
  );

  let rendered = 0;
  let skipped = 0;

  for (let cz = range.startZ; cz <= range.endZ; cz++) {
    for (let cx = range.startX; cx <= range.endX; cx++) {
      try {
        const doc = await world.readChunk(cx, cz);
        // Rendered off to the side so a chunk that fails halfway writes nothing.
        const tile = renderer.renderChunk(doc, opts);
        blit(image, tile, (cx - range.startX) * chunkSize, (cz - range.startZ) * chunkSize);
        rendered++;
      } catch (e: unknown) {
        if (!isRegionError(e)) throw e;
        skipped++;
        warn?.(`Chunk (${cx}, ${cz}) skipped: ${errorMessage(e)}`);
      }
    }
  }

  return { image, rendered, skipped };
}

// src/region/render/chunkRenderer.ts
import { decodeBlockChunkData, tintGrid, columnIndex } from "../bitfield.js";
import type { ChunkDocument } from "../chunkDocument.js";
import { EMPTY_NAME } from "../palette.js";
import { ChunkSections, extractColumnSurfaces } from "../surface.js";
import type { Rgb } from "./color.js";
import type { Compositor } from "./compositor.js";
import { createImage, setPixel, type RgbImage } from "./rgbImage.js";
import { neighborHeights, shade } from "./shading.js";

export const CHUNK_PIXELS = 32;
export const MAX_PIXELS_PER_BLOCK = 16;

export type ChunkRenderOptions = Readonly<{
  pixelsPerBlock?: number;
}>;

export function assertPixelsPerBlock(p: number): void {
  if (!Number.isInteger(p) || p < 1 || p > MAX_PIXELS_PER_BLOCK) {
    throw new Error(`Invalid pixelsPerBlock: ${p} (expected integer 1..${MAX_PIXELS_PER_BLOCK})`);
  }
}

/** Biome tints for the chunk's columns, if it carries a BlockChunk blob. */
export function chunkBiomeTints(doc: ChunkDocument): ReadonlyArray<Rgb> | undefined {
  if (doc.blockChunk === undefined) return undefined;
  return tintGrid(decodeBlockChunkData(doc.blockChunk.data));
}

function shadeColor(c: Rgb, s: number): Rgb {
  return [
    Math.floor(Math.min(255, c[0] * s)),
    Math.floor(Math.min(255, c[1] * s)),
    Math.floor(Math.min(255, c[2] * s)),
  ];
}

export class ChunkRenderer {
  public constructor(private readonly compositor: Compositor) {}

  /** Draws into `out` with the chunk's top-left pixel at (ox, oy). */
  public drawChunk(doc: ChunkDocument, out: RgbImage, ox: number, oy: number, opts: ChunkRenderOptions = {}): void {
    const p = opts.pixelsPerBlock ?? 1;
    assertPixelsPerBlock(p);

    const surfaces = extractColumnSurfaces(new ChunkSections(doc));
    const tints = chunkBiomeTints(doc);

    for (let z = 0; z < 32; z++) {
      for (let x = 0; x < 32; x++) {
        const i = columnIndex(x, z);
        const height = surfaces.heights[i] ?? 0;
        const blockName = surfaces.blockNames[i] ?? EMPTY_NAME;
        const fluidType = surfaces.fluidTypes[i];
        const fluidDepth = surfaces.fluidDepths[i] ?? 0;

        if (blockName === EMPTY_NAME && fluidType === undefined) continue;

        const base: Rgb =
          blockName === EMPTY_NAME ? [0, 0, 0] : this.compositor.columnColor(blockName, tints?.[i]);
        const nb = neighborHeights(surfaces.heights, x, z);

        for (let j = 0; j < p; j++) {
          for (let k = 0; k < p; k++) {
            const s = shade(height, nb, (k + 0.5) / p, (j + 0.5) / p);
            const c = this.compositor.blendFluid(shadeColor(base, s), fluidType, fluidDepth);
            setPixel(out, ox + x * p + k, oy + z * p + j, c);
          }
        }
      }
    }
  }

  public renderChunk(doc: ChunkDocument, opts: ChunkRenderOptions = {}): RgbImage {
    const p = opts.pixelsPerBlock ?? 1;
    assertPixelsPerBlock(p);
    const out = createImage(CHUNK_PIXELS * p, CHUNK_PIXELS * p);
    this.drawChunk(doc, out, 0, 0, opts);
    return out;
  }
}

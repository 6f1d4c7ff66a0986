// src/region/inspectTool.ts
import { decodeBlockChunkData, heightGrid } from "./bitfield.js";
import type { ChunkDocument } from "./chunkDocument.js";
import { decodeChunkBlob } from "./payload.js";
import { decodeBlockSection, decodeFluidSection, type Palette, type PaletteEncoding } from "./palette.js";
import type { RegionHeader } from "./regionFile.js";
import { blockAt, ChunkSections, fluidAt } from "./surface.js";
import { blockToChunk, chunkAddress, WorldReader } from "./world.js";

export type PaletteEntryJson = { id: number; name: string; count: number };

export type SectionSummaryJson = {
  index: number;
  block?: {
    version?: number;
    packingFactor: number;
    encoding: PaletteEncoding;
    readable: boolean;
    unknownLeading: number;
    unknownTrailing: number;
    palette: PaletteEntryJson[];
  };
  fluid?: {
    encoding: PaletteEncoding;
    readable: boolean;
    palette: PaletteEntryJson[];
  };
};

export type ChunkSummaryJson = {
  chunk: { x: number; z: number };
  region: { x: number; z: number; header: RegionHeader };
  segmentIndex: number;
  uncompressedSize: number;
  compressedSize: number;
  sections: SectionSummaryJson[];
  blockChunk?: {
    version?: number;
    needsPhysics: boolean;
    heightPaletteSize: number;
    tintPaletteSize: number;
    minHeight: number;
    maxHeight: number;
  };
};

function paletteJson(palette: Palette): PaletteEntryJson[] {
  return [...palette].map(([id, e]) => ({ id, name: e.name, count: e.count }));
}

export function summarizeSections(doc: ChunkDocument): SectionSummaryJson[] {
  return doc.sections.map((s) => {
    const out: SectionSummaryJson = { index: s.index };
    if (s.block) {
      const b = decodeBlockSection(s.block.data);
      out.block = {
        ...(s.block.version !== undefined ? { version: s.block.version } : {}),
        packingFactor: b.packingFactor,
        encoding: b.encoding,
        readable: b.readable,
        unknownLeading: b.unknownLeading,
        unknownTrailing: b.unknownTrailing,
        palette: paletteJson(b.palette),
      };
    }
    if (s.fluid) {
      const f = decodeFluidSection(s.fluid.data);
      out.fluid = {
        encoding: f.encoding,
        readable: f.typeArray !== undefined,
        palette: paletteJson(f.palette),
      };
    }
    return out;
  });
}

export async function inspectChunk(world: WorldReader, chunkX: number, chunkZ: number): Promise<ChunkSummaryJson> {
  const addr = chunkAddress(chunkX, chunkZ);
  const region = await world.openRegion(addr.regionX, addr.regionZ);
  const segmentIndex = region.locateChunk(addr.relativeX, addr.relativeZ);
  const blob = region.readChunkBlob(segmentIndex);
  const doc = decodeChunkBlob(blob);

  const out: ChunkSummaryJson = {
    chunk: { x: chunkX, z: chunkZ },
    region: { x: addr.regionX, z: addr.regionZ, header: region.header },
    segmentIndex,
    uncompressedSize: blob.uncompressedSize,
    compressedSize: blob.compressedBytes.length,
    sections: summarizeSections(doc),
  };

  if (doc.blockChunk) {
    const bc = decodeBlockChunkData(doc.blockChunk.data);
    const heights = heightGrid(bc);
    out.blockChunk = {
      ...(doc.blockChunk.version !== undefined ? { version: doc.blockChunk.version } : {}),
      needsPhysics: bc.needsPhysics,
      heightPaletteSize: bc.heightPalette.length,
      tintPaletteSize: bc.tintPalette.length,
      minHeight: Math.min(...heights),
      maxHeight: Math.max(...heights),
    };
  }
  return out;
}

export type BlockQueryResult = {
  x: number;
  y: number;
  z: number;
  block: string;
  fluid: { type: string; level: number } | null;
};

export async function queryBlock(world: WorldReader, x: number, y: number, z: number): Promise<BlockQueryResult> {
  const { chunkX, chunkZ, localX, localZ } = blockToChunk(x, z);
  const sections = new ChunkSections(await world.readChunk(chunkX, chunkZ));
  const fluid = fluidAt(sections, localX, y, localZ);
  return {
    x,
    y,
    z,
    block: blockAt(sections, localX, y, localZ),
    fluid: fluid.type === undefined ? null : { type: fluid.type, level: fluid.level },
  };
}

export async function runInspectTool(chunkX: number, chunkZ: number, opts: Readonly<{ world: string }>): Promise<void> {
  const world = new WorldReader(opts.world, (m) => console.warn(m));
  const summary = await inspectChunk(world, chunkX, chunkZ);
  process.stdout.write(JSON.stringify(summary, null, 2) + "\n");
}

export async function runBlockTool(x: number, y: number, z: number, opts: Readonly<{ world: string }>): Promise<void> {
  const world = new WorldReader(opts.world, (m) => console.warn(m));
  const r = await queryBlock(world, x, y, z);
  const fluid = r.fluid ? ` fluid=${r.fluid.type} level=${r.fluid.level}` : "";
  console.log(`(${x}, ${y}, ${z}) block=${r.block}${fluid}`);
}

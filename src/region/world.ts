// src/region/world.ts
//
// World addressing: chunk (cx, cz) lives in region file
// "<floor(cx/32)>.<floor(cz/32)>.region.bin" at relative (cx mod 32, cz mod 32).

import path from "node:path";
import { readFile } from "node:fs/promises";

import type { ChunkDocument } from "./chunkDocument.js";
import { isRegionError, NotFoundError, type RegionError, type WarnFn } from "./errors.js";
import { decodeChunkBlob } from "./payload.js";
import { REGION_WIDTH_CHUNKS, RegionFile } from "./regionFile.js";

export type ChunkAddress = Readonly<{
  regionX: number;
  regionZ: number;
  relativeX: number;
  relativeZ: number;
}>;

function mod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

export function chunkAddress(chunkX: number, chunkZ: number): ChunkAddress {
  if (!Number.isInteger(chunkX) || !Number.isInteger(chunkZ)) {
    throw new Error(`Invalid chunk coordinate: (${chunkX}, ${chunkZ})`);
  }
  return {
    regionX: Math.floor(chunkX / REGION_WIDTH_CHUNKS),
    regionZ: Math.floor(chunkZ / REGION_WIDTH_CHUNKS),
    relativeX: mod(chunkX, REGION_WIDTH_CHUNKS),
    relativeZ: mod(chunkZ, REGION_WIDTH_CHUNKS),
  };
}

export function regionFileName(regionX: number, regionZ: number): string {
  return `${regionX}.${regionZ}.region.bin`;
}

/** World block coordinate to chunk coordinate plus local column. */
export function blockToChunk(x: number, z: number): { chunkX: number; chunkZ: number; localX: number; localZ: number } {
  return {
    chunkX: Math.floor(x / 32),
    chunkZ: Math.floor(z / 32),
    localX: mod(x, 32),
    localZ: mod(z, 32),
  };
}

function isNoEntry(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export const DEFAULT_CACHED_REGIONS = 4;

/**
 * Reads chunks out of a directory of region files. Region bytes are kept for
 * the most recently used `maxCachedRegions` regions; a region that failed to
 * open is remembered the same way and its error rethrown.
 */
export class WorldReader {
  private readonly regions = new Map<string, RegionFile | RegionError>();

  public constructor(
    public readonly chunksDir: string,
    private readonly warn?: WarnFn,
    private readonly maxCachedRegions = DEFAULT_CACHED_REGIONS,
  ) {
    if (!Number.isInteger(maxCachedRegions) || maxCachedRegions < 1) {
      throw new Error(`Invalid maxCachedRegions: ${maxCachedRegions} (expected integer >= 1)`);
    }
  }

  public get cachedRegionCount(): number {
    return this.regions.size;
  }

  public async openRegion(regionX: number, regionZ: number): Promise<RegionFile> {
    const name = regionFileName(regionX, regionZ);
    const cached = this.regions.get(name);
    if (cached !== undefined) {
      this.regions.delete(name);
      this.regions.set(name, cached);
      if (isRegionError(cached)) throw cached;
      return cached;
    }

    let entry: RegionFile | RegionError;
    try {
      entry = RegionFile.open(await this.readRegionBytes(name), name);
    } catch (e: unknown) {
      if (!isRegionError(e)) throw e;
      entry = e;
    }

    this.remember(name, entry);
    if (isRegionError(entry)) throw entry;
    return entry;
  }

  public async readChunk(chunkX: number, chunkZ: number): Promise<ChunkDocument> {
    const addr = chunkAddress(chunkX, chunkZ);
    const region = await this.openRegion(addr.regionX, addr.regionZ);
    const segment = region.locateChunk(addr.relativeX, addr.relativeZ);
    return decodeChunkBlob(region.readChunkBlob(segment), this.warn);
  }

  private async readRegionBytes(name: string): Promise<Buffer> {
    const file = path.join(this.chunksDir, name);
    try {
      return await readFile(file);
    } catch (e: unknown) {
      if (isNoEntry(e)) throw new NotFoundError(`Region file not found: ${file}`);
      throw e;
    }
  }

  private remember(name: string, entry: RegionFile | RegionError): void {
    this.regions.set(name, entry);
    for (const oldest of this.regions.keys()) {
      if (this.regions.size <= this.maxCachedRegions) break;
      this.regions.delete(oldest);
    }
  }
}

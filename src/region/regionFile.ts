// src/region/regionFile.ts
//
// Region container: 32-byte big-endian header, a 32x32 table of segment
// indices, then segment-aligned chunk blobs.
//
//   0x00  20  magic
//   0x14   4  version       u32 BE
//   0x18   4  blob count    u32 BE
//   0x1C   4  segment size  u32 BE
//   0x20 4096 location table, 1024 x u32 BE, index = x + z*32, 0 = absent
//
// Blob at segment n starts at n*segmentSize + 32:
//   u32 BE uncompressed size, u32 BE compressed size, compressed bytes.

import { ByteCursor } from "./binary.js";
import { CorruptFormatError, NotFoundError } from "./errors.js";

export const REGION_MAGIC = "HytaleIndexedStorage";
export const REGION_HEADER_LENGTH = 32;
export const REGION_WIDTH_CHUNKS = 32;
export const REGION_TABLE_ENTRIES = REGION_WIDTH_CHUNKS * REGION_WIDTH_CHUNKS;

export type RegionHeader = Readonly<{
  magic: string;
  version: number;
  blobCount: number;
  segmentSize: number;
}>;

export type ChunkBlob = Readonly<{
  segmentIndex: number;
  uncompressedSize: number;
  compressedBytes: Uint8Array;
}>;

function assertRelativeCoord(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 0 || v >= REGION_WIDTH_CHUNKS) {
    throw new Error(`Invalid relative chunk ${name}: ${v} (expected 0..${REGION_WIDTH_CHUNKS - 1})`);
  }
}

export class RegionFile {
  private constructor(
    private readonly bytes: Uint8Array,
    public readonly header: RegionHeader,
    private readonly table: Uint32Array,
    public readonly label: string,
  ) {}

  public static open(bytes: Uint8Array, label = "region"): RegionFile {
    const r = new ByteCursor(bytes, label);

    const magic = Buffer.from(r.readBytes(20)).toString("latin1");
    if (magic !== REGION_MAGIC) {
      throw new CorruptFormatError(
        `${label}: bad magic ${JSON.stringify(magic)} (expected ${JSON.stringify(REGION_MAGIC)})`,
        { offset: 0 },
      );
    }

    const version = r.readU32BE();
    const blobCount = r.readU32BE();
    const segmentSize = r.readU32BE();
    if (segmentSize === 0) {
      throw new CorruptFormatError(`${label}: segment size is 0`, { offset: 0x1c });
    }

    const table = new Uint32Array(REGION_TABLE_ENTRIES);
    for (let i = 0; i < REGION_TABLE_ENTRIES; i++) table[i] = r.readU32BE();

    return new RegionFile(bytes, { magic, version, blobCount, segmentSize }, table, label);
  }

  /** Segment index for a chunk position relative to this region. */
  public locateChunk(relativeX: number, relativeZ: number): number {
    assertRelativeCoord("x", relativeX);
    assertRelativeCoord("z", relativeZ);

    const segment = this.table[relativeX + relativeZ * REGION_WIDTH_CHUNKS] ?? 0;
    if (segment === 0) {
      throw new NotFoundError(`${this.label}: chunk (${relativeX},${relativeZ}) not present`);
    }
    return segment;
  }

  public readChunkBlob(segmentIndex: number): ChunkBlob {
    const location = segmentIndex * this.header.segmentSize + REGION_HEADER_LENGTH;
    if (location > this.bytes.length) {
      throw new CorruptFormatError(
        `${this.label}: segment ${segmentIndex} at offset ${location} is past end of file (${this.bytes.length} bytes)`,
        { offset: location },
      );
    }

    const r = new ByteCursor(this.bytes, `${this.label} segment ${segmentIndex}`);
    r.seek(location);
    const uncompressedSize = r.readU32BE();
    const compressedSize = r.readU32BE();
    const compressedBytes = r.readBytes(compressedSize);

    return { segmentIndex, uncompressedSize, compressedBytes };
  }

  /** Relative positions of every present chunk, in table order. */
  public presentChunks(): Array<{ x: number; z: number; segmentIndex: number }> {
    const out: Array<{ x: number; z: number; segmentIndex: number }> = [];
    for (let i = 0; i < REGION_TABLE_ENTRIES; i++) {
      const segmentIndex = this.table[i] ?? 0;
      if (segmentIndex === 0) continue;
      out.push({ x: i % REGION_WIDTH_CHUNKS, z: Math.floor(i / REGION_WIDTH_CHUNKS), segmentIndex });
    }
    return out;
  }
}

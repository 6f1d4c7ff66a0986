// test/support/fixtures.ts
//
// Builders for synthetic region files, chunk documents and section blobs.

import { Binary, serialize } from "bson";

export class ByteWriter {
  private readonly chunks: Buffer[] = [];

  public writeU8(v: number): this {
    const b = Buffer.alloc(1);
    b.writeUInt8(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeI8(v: number): this {
    const b = Buffer.alloc(1);
    b.writeInt8(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeU16BE(v: number): this {
    const b = Buffer.alloc(2);
    b.writeUInt16BE(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeU16LE(v: number): this {
    const b = Buffer.alloc(2);
    b.writeUInt16LE(v, 0);
    this.chunks.push(b);
    return this;
  }

  public writeU32BE(v: number): this {
    const b = Buffer.alloc(4);
    b.writeUInt32BE(v >>> 0, 0);
    this.chunks.push(b);
    return this;
  }

  public writeU32LE(v: number): this {
    const b = Buffer.alloc(4);
    b.writeUInt32LE(v >>> 0, 0);
    this.chunks.push(b);
    return this;
  }

  public writeBytes(bytes: Uint8Array): this {
    this.chunks.push(Buffer.from(bytes));
    return this;
  }

  public writeUtf8(text: string): this {
    this.chunks.push(Buffer.from(text, "utf8"));
    return this;
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export type CellFn = (x: number, y: number, z: number) => number;

const CELLS = 32 * 32 * 32;

function cellIndex(x: number, y: number, z: number): number {
  return (y << 10) | (z << 5) | x;
}

/** Packing factor: 0 Empty, 1 HalfByte, 2 Byte, 3 Short. */
export function packIndexArray(packing: number, cell: CellFn): Uint8Array {
  if (packing === 0) return new Uint8Array(0);
  const bytesPer = packing === 1 ? 0.5 : packing === 2 ? 1 : 2;
  const out = new Uint8Array(CELLS * bytesPer);

  for (let y = 0; y < 32; y++) {
    for (let z = 0; z < 32; z++) {
      for (let x = 0; x < 32; x++) {
        const i = cellIndex(x, y, z);
        const v = cell(x, y, z);
        if (packing === 1) {
          const cur = out[i >> 1] ?? 0;
          out[i >> 1] = (i & 1) === 0 ? (cur & 0xf0) | (v & 0x0f) : (cur & 0x0f) | ((v & 0x0f) << 4);
        } else if (packing === 2) {
          out[i] = v & 0xff;
        } else {
          out[i * 2] = (v >> 8) & 0xff;
          out[i * 2 + 1] = v & 0xff;
        }
      }
    }
  }
  return out;
}

export type BlockSectionSpec = {
  packing: number;
  palette: string[];
  cell: CellFn;
  leading?: number;
  trailing?: number;
};

export function buildBlockSection(spec: BlockSectionSpec): Buffer {
  const w = new ByteWriter()
    .writeU32BE(spec.leading ?? 0x0a)
    .writeU8(spec.packing)
    .writeU16BE(spec.palette.length)
    .writeI8(spec.trailing ?? 0);

  for (const name of spec.palette) {
    const nameBytes = Buffer.from(name, "utf8");
    w.writeU16BE(nameBytes.length).writeBytes(nameBytes).writeU16BE(1).writeI8(0);
  }
  w.writeBytes(packIndexArray(spec.packing, spec.cell));
  return w.toBuffer();
}

export type FluidSectionSpec = {
  packing: number;
  palette: Array<{ id: number; name: string }>;
  type: CellFn;
  level: CellFn;
};

export function buildFluidSection(spec: FluidSectionSpec): Buffer {
  const w = new ByteWriter().writeU8(spec.packing).writeU16BE(spec.palette.length);
  for (const { id, name } of spec.palette) {
    if (spec.packing === 3) w.writeU16BE(id);
    else w.writeU8(id);
    const nameBytes = Buffer.from(name, "utf8");
    w.writeU16BE(nameBytes.length).writeBytes(nameBytes).writeU16BE(1);
  }
  w.writeBytes(packIndexArray(spec.packing, spec.type));
  w.writeBytes(packIndexArray(1, spec.level));
  return w.toBuffer();
}

/** 10-bit little-endian bit packing, the inverse of unpackTenBitIndices. */
export function packTenBit(values: ReadonlyArray<number>): Uint8Array {
  const out = new Uint8Array(Math.ceil((values.length * 10) / 8));
  values.forEach((v, i) => {
    for (let b = 0; b < 10; b++) {
      if (((v >> b) & 1) === 0) continue;
      const bit = i * 10 + b;
      out[bit >> 3] = (out[bit >> 3] ?? 0) | (1 << (bit & 7));
    }
  });
  return out;
}

export type BlockChunkSpec = {
  needsPhysics?: boolean;
  heightPalette: number[];
  heightIndices: number[];
  tintPalette: number[]; // 0xRRGGBB
  tintIndices: number[];
};

export function buildBlockChunkBlob(spec: BlockChunkSpec): Buffer {
  const w = new ByteWriter().writeU8(spec.needsPhysics === true ? 1 : 0);
  w.writeU16LE(spec.heightPalette.length);
  for (const h of spec.heightPalette) w.writeU16LE(h);
  const heights = packTenBit(spec.heightIndices);
  w.writeU32LE(heights.length).writeBytes(heights);
  w.writeU16LE(spec.tintPalette.length);
  for (const t of spec.tintPalette) w.writeU32LE(t);
  const tints = packTenBit(spec.tintIndices);
  w.writeU32LE(tints.length).writeBytes(tints);
  return w.toBuffer();
}

export type SectionSpec = {
  block?: Uint8Array;
  blockVersion?: number;
  fluid?: Uint8Array;
};

export type ChunkSpec = {
  sections: SectionSpec[]; // index 0 = bottom; padded to 10
  blockChunk?: Uint8Array;
  sectionCount?: number;
};

export function buildChunkBson(spec: ChunkSpec): Buffer {
  const count = spec.sectionCount ?? 10;
  const sections: Array<Record<string, unknown>> = [];
  for (let i = 0; i < count; i++) {
    const s = spec.sections[i] ?? {};
    const components: Record<string, unknown> = {};
    if (s.block) components.Block = { Version: s.blockVersion ?? 6, Data: new Binary(s.block) };
    if (s.fluid) components.Fluid = { Data: new Binary(s.fluid) };
    sections.push({ Components: components });
  }

  const components: Record<string, unknown> = { ChunkColumn: { Sections: sections } };
  if (spec.blockChunk) components.BlockChunk = { Version: 3, Data: new Binary(spec.blockChunk) };
  return Buffer.from(serialize({ Components: components }));
}

const MAX_RAW_BLOCK = 128 * 1024;

/** Zstandard frame made only of raw (stored) blocks. */
export function zstdRawFrame(data: Uint8Array): Buffer {
  const w = new ByteWriter()
    .writeU32LE(0xfd2fb528)
    .writeU8(0xa0) // 4-byte content size, single segment
    .writeU32LE(data.length);

  let offset = 0;
  do {
    const size = Math.min(MAX_RAW_BLOCK, data.length - offset);
    const last = offset + size >= data.length ? 1 : 0;
    const header = (size << 3) | last; // block type 0 = raw
    w.writeU8(header & 0xff).writeU8((header >> 8) & 0xff).writeU8((header >> 16) & 0xff);
    w.writeBytes(data.subarray(offset, offset + size));
    offset += size;
  } while (offset < data.length);

  return w.toBuffer();
}

export function buildChunkPayload(spec: ChunkSpec): Buffer {
  return zstdRawFrame(buildChunkBson(spec));
}

export type RegionChunkSpec = {
  x: number;
  z: number;
  payload: Uint8Array;
  uncompressedSize?: number;
};

export type RegionSpec = {
  chunks: RegionChunkSpec[];
  segmentSize?: number;
  magic?: string;
  version?: number;
};

export function buildRegionFile(spec: RegionSpec): Buffer {
  const segmentSize = spec.segmentSize ?? 4096;
  const table = new Uint32Array(1024);
  const blobs: Array<{ segment: number; bytes: Buffer }> = [];

  let nextSegment = Math.ceil(4096 / segmentSize);
  for (const c of spec.chunks) {
    const blob = new ByteWriter()
      .writeU32BE(c.uncompressedSize ?? 0)
      .writeU32BE(c.payload.length)
      .writeBytes(c.payload)
      .toBuffer();
    table[c.x + c.z * 32] = nextSegment;
    blobs.push({ segment: nextSegment, bytes: blob });
    nextSegment += Math.ceil(blob.length / segmentSize);
  }

  const out = Buffer.alloc(32 + nextSegment * segmentSize);
  Buffer.from((spec.magic ?? "HytaleIndexedStorage").padEnd(20, "\0"), "latin1").copy(out, 0, 0, 20);
  out.writeUInt32BE(spec.version ?? 1, 20);
  out.writeUInt32BE(spec.chunks.length, 24);
  out.writeUInt32BE(segmentSize, 28);
  for (let i = 0; i < 1024; i++) out.writeUInt32BE(table[i] ?? 0, 32 + i * 4);
  for (const b of blobs) b.bytes.copy(out, b.segment * segmentSize + 32);
  return out;
}

// src/region/bitfield.ts
//
// Per-chunk heightmap/tint blob. Little-endian throughout:
//
//   u8   needs physics
//   u16  height palette count, then count x u16 heights
//   u32  height packed length, then packed bytes
//   u16  tint palette count, then count x u32 (0xRRGGBB)
//   u32  tint packed length, then packed bytes
//
// Both packed arrays hold 1024 ten-bit palette indices (1280 bytes). The two
// arrays walk columns in different orders; see heightColumn / tintColumn.

import { ByteCursor } from "./binary.js";
import type { Rgb } from "./render/color.js";

export const COLUMN_COUNT = 32 * 32;
export const TEN_BIT_PACKED_BYTES = (COLUMN_COUNT * 10) / 8;

const WHITE: Rgb = [255, 255, 255];

export type BlockChunkData = Readonly<{
  needsPhysics: boolean;
  heightPalette: ReadonlyArray<number>;
  heightIndices: ReadonlyArray<number>;
  tintPalette: ReadonlyArray<Rgb>;
  tintIndices: ReadonlyArray<number>;
}>;

/** Row-major column index used by every 32x32 grid in this package. */
export function columnIndex(x: number, z: number): number {
  return (z & 31) * 32 + (x & 31);
}

export function unpackTenBitIndices(bytes: Uint8Array, count = COLUMN_COUNT): number[] {
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    const bitOffset = i * 10;
    const byteOffset = bitOffset >> 3;
    const bitInByte = bitOffset & 7;
    const b1 = bytes[byteOffset] ?? 0;
    const b2 = bytes[byteOffset + 1] ?? 0;
    out[i] = ((b1 >> bitInByte) | (b2 << (8 - bitInByte))) & 0x3ff;
  }
  return out;
}

/** Heightmap array: linear i is (x = i % 32, z = i / 32). */
export function heightColumn(i: number): { x: number; z: number } {
  return { x: i % 32, z: Math.floor(i / 32) };
}

/** Tint array: linear i is (z = i % 32, x = i / 32). Not the same as heights. */
export function tintColumn(i: number): { x: number; z: number } {
  return { x: Math.floor(i / 32), z: i % 32 };
}

function rgbFromPacked(v: number): Rgb {
  return [(v >>> 16) & 0xff, (v >>> 8) & 0xff, v & 0xff];
}

export function decodeBlockChunkData(bytes: Uint8Array): BlockChunkData {
  const r = new ByteCursor(bytes, "block chunk data");

  const needsPhysics = r.readU8() !== 0;

  const heightPaletteCount = r.readU16LE();
  const heightPalette: number[] = [];
  for (let i = 0; i < heightPaletteCount; i++) heightPalette.push(r.readU16LE());
  const heightPacked = r.readBytes(r.readU32LE());

  const tintPaletteCount = r.readU16LE();
  const tintPalette: Rgb[] = [];
  for (let i = 0; i < tintPaletteCount; i++) tintPalette.push(rgbFromPacked(r.readU32LE()));
  const tintPacked = r.readBytes(r.readU32LE());

  return {
    needsPhysics,
    heightPalette,
    heightIndices: unpackTenBitIndices(heightPacked),
    tintPalette,
    tintIndices: unpackTenBitIndices(tintPacked),
  };
}

/** 32x32 heights indexed by columnIndex(x, z). Out-of-palette indices give 0. */
export function heightGrid(data: BlockChunkData): number[] {
  const out = new Array<number>(COLUMN_COUNT).fill(0);
  data.heightIndices.forEach((paletteIndex, i) => {
    const { x, z } = heightColumn(i);
    out[columnIndex(x, z)] = data.heightPalette[paletteIndex] ?? 0;
  });
  return out;
}

/** 32x32 biome tints indexed by columnIndex(x, z). Out-of-palette indices give white. */
export function tintGrid(data: BlockChunkData): Rgb[] {
  const out = new Array<Rgb>(COLUMN_COUNT).fill(WHITE);
  data.tintIndices.forEach((paletteIndex, i) => {
    const { x, z } = tintColumn(i);
    out[columnIndex(x, z)] = data.tintPalette[paletteIndex] ?? WHITE;
  });
  return out;
}

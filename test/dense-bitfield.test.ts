import { describe, expect, it } from "vitest";

import {
  columnIndex,
  decodeBlockChunkData,
  heightColumn,
  heightGrid,
  tintColumn,
  tintGrid,
  unpackTenBitIndices,
} from "../src/region/bitfield.js";
import { CorruptFormatError } from "../src/region/errors.js";
import { buildBlockChunkBlob, packTenBit } from "./support/fixtures.js";

const ALL = Array.from({ length: 1024 }, (_, i) => i);

describe("unpackTenBitIndices", () => {
  it("recovers every 10-bit value packed into 1280 bytes", () => {
    const packed = packTenBit(ALL);
    expect(packed.length).toBe(1280);
    expect(unpackTenBitIndices(packed)).toEqual(ALL);
  });

  it("reads low bits first across byte pairs", () => {
    expect(unpackTenBitIndices(Uint8Array.from([0xff, 0x03]), 1)).toEqual([0x3ff]);
    expect(unpackTenBitIndices(Uint8Array.from([0x00, 0xfc, 0x0f]), 2)).toEqual([0, 0x3ff]);
  });

  it("treats a missing second byte as zero", () => {
    expect(unpackTenBitIndices(Uint8Array.from([0xff]), 1)).toEqual([0xff]);
  });
});

describe("column conventions", () => {
  it("heights walk x fastest, tints walk z fastest", () => {
    expect(heightColumn(5)).toEqual({ x: 5, z: 0 });
    expect(tintColumn(5)).toEqual({ x: 0, z: 5 });
    expect(heightColumn(70)).toEqual({ x: 6, z: 2 });
    expect(tintColumn(70)).toEqual({ x: 2, z: 6 });
  });

  it("both conventions cover every column exactly once", () => {
    const heights = new Set(ALL.map((i) => {
      const c = heightColumn(i);
      return columnIndex(c.x, c.z);
    }));
    const tints = new Set(ALL.map((i) => {
      const c = tintColumn(i);
      return columnIndex(c.x, c.z);
    }));
    expect(heights.size).toBe(1024);
    expect(tints.size).toBe(1024);
  });
});

describe("decodeBlockChunkData", () => {
  const blob = buildBlockChunkBlob({
    needsPhysics: true,
    heightPalette: [0, 64, 100],
    heightIndices: ALL.map((i) => (i === 5 ? 2 : i === 7 ? 900 : 1)),
    tintPalette: [0x112233, 0xaabbcc],
    tintIndices: ALL.map((i) => (i === 5 ? 1 : i === 7 ? 900 : 0)),
  });

  it("reads the palettes and both packed arrays", () => {
    const d = decodeBlockChunkData(blob);
    expect(d.needsPhysics).toBe(true);
    expect(d.heightPalette).toEqual([0, 64, 100]);
    expect(d.tintPalette).toEqual([
      [0x11, 0x22, 0x33],
      [0xaa, 0xbb, 0xcc],
    ]);
    expect(d.heightIndices).toHaveLength(1024);
    expect(d.tintIndices[5]).toBe(1);
  });

  it("maps heights row-major", () => {
    const grid = heightGrid(decodeBlockChunkData(blob));
    expect(grid[columnIndex(5, 0)]).toBe(100);
    expect(grid[columnIndex(0, 5)]).toBe(64);
    expect(grid[columnIndex(7, 0)]).toBe(0); // index 900 is outside the palette
  });

  it("maps tints column-major", () => {
    const grid = tintGrid(decodeBlockChunkData(blob));
    expect(grid[columnIndex(0, 5)]).toEqual([0xaa, 0xbb, 0xcc]);
    expect(grid[columnIndex(5, 0)]).toEqual([0x11, 0x22, 0x33]);
    expect(grid[columnIndex(0, 7)]).toEqual([255, 255, 255]); // outside the palette
  });

  it("fails CorruptFormat when a declared length runs past the blob", () => {
    expect(() => decodeBlockChunkData(blob.subarray(0, blob.length - 10))).toThrow(CorruptFormatError);
  });
});

// src/region/palette.ts
//
// Palette-indexed section arrays. All multi-byte integers are big-endian.
//
// Block section:
//   u32  opaque leading value
//   u8   packing factor (0 Empty, 1 HalfByte, 2 Byte, 3 Short)
//   u16  palette length
//   i8   opaque trailing value
//   palette length x { u16 name length, name (UTF-8), u16 count, i8 opaque }
//   index array (size by encoding; absent for an unknown packing factor)
//
// Fluid section:
//   u8   packing factor
//   u16  palette length
//   palette length x { id (u8, u16 for Short), u16 name length, name, u16 count }
//   type array (size by encoding)
//   level array, 16384 bytes, always 4-bit

import { ByteCursor } from "./binary.js";
import { isRegionError } from "./errors.js";

export const SECTION_CELLS = 32 * 32 * 32;
export const LEVEL_ARRAY_BYTES = SECTION_CELLS / 2;
export const EMPTY_NAME = "Empty";

export type PaletteEncoding = "Empty" | "HalfByte" | "Byte" | "Short";

export type PaletteEntry = Readonly<{
  name: string;
  count: number;
}>;

export type Palette = ReadonlyMap<number, PaletteEntry>;

export type BlockSectionData = Readonly<{
  /** Leading u32 of the header; meaning unknown, passed through. */
  unknownLeading: number;
  packingFactor: number;
  /** false when the packing factor is unknown; the section then reads as Empty. */
  readable: boolean;
  encoding: PaletteEncoding;
  /** Trailing i8 of the header; meaning unknown, passed through. */
  unknownTrailing: number;
  palette: Palette;
  indexArray: Uint8Array;
}>;

export type FluidSectionData = Readonly<{
  encoding: PaletteEncoding;
  palette: Palette;
  /** undefined when the section could not be read; treat as "no fluid". */
  typeArray: Uint8Array | undefined;
  levelArray: Uint8Array | undefined;
}>;

export function encodingFromPackingFactor(factor: number): PaletteEncoding | undefined {
  switch (factor) {
    case 0:
      return "Empty";
    case 1:
      return "HalfByte";
    case 2:
      return "Byte";
    case 3:
      return "Short";
    default:
      return undefined;
  }
}

export function indexArrayBytes(encoding: PaletteEncoding): number {
  switch (encoding) {
    case "Empty":
      return 0;
    case "HalfByte":
      return SECTION_CELLS / 2;
    case "Byte":
      return SECTION_CELLS;
    case "Short":
      return SECTION_CELLS * 2;
  }
}

/** Y-major, then Z, then X. Shared by every packed section array. */
export function cellIndex(x: number, y: number, z: number): number {
  return ((y & 31) << 10) | ((z & 31) << 5) | (x & 31);
}

function nibbleAt(array: Uint8Array, flatIndex: number): number {
  const b = array[flatIndex >> 1] ?? 0;
  return (flatIndex & 1) === 0 ? b & 0x0f : (b >> 4) & 0x0f;
}

/** Palette id stored at a cell, or undefined for the Empty encoding. */
export function readPaletteId(
  array: Uint8Array,
  encoding: PaletteEncoding,
  flatIndex: number,
): number | undefined {
  switch (encoding) {
    case "Empty":
      return undefined;
    case "HalfByte":
      return nibbleAt(array, flatIndex);
    case "Byte":
      return array[flatIndex] ?? 0;
    case "Short": {
      const o = flatIndex * 2;
      return ((array[o] ?? 0) << 8) | (array[o + 1] ?? 0);
    }
  }
}

/** 4-bit fluid level at a cell; the level array is nibble-packed like HalfByte. */
export function readFluidLevel(levelArray: Uint8Array, flatIndex: number): number {
  return nibbleAt(levelArray, flatIndex);
}

export function decodeBlockSection(bytes: Uint8Array): BlockSectionData {
  const r = new ByteCursor(bytes, "block section");

  const unknownLeading = r.readU32BE();
  const packingFactor = r.readU8();
  const paletteLength = r.readU16BE();
  const unknownTrailing = r.readI8();

  const decoded = encodingFromPackingFactor(packingFactor);

  // Ids are positional; the stream carries none.
  const palette = new Map<number, PaletteEntry>();
  for (let i = 0; i < paletteLength; i++) {
    const nameLength = r.readU16BE();
    const name = r.readUtf8(nameLength);
    const count = r.readU16BE();
    r.readI8();
    palette.set(i, { name, count });
  }

  if (decoded === undefined) {
    return {
      unknownLeading,
      packingFactor,
      readable: false,
      encoding: "Empty",
      unknownTrailing,
      palette,
      indexArray: new Uint8Array(0),
    };
  }

  const indexArray = r.readBytes(indexArrayBytes(decoded));

  return { unknownLeading, packingFactor, readable: true, encoding: decoded, unknownTrailing, palette, indexArray };
}

/**
 * Fluid sections never throw: a malformed blob yields undefined arrays, which
 * callers read as "no fluid in this section".
 */
export function decodeFluidSection(bytes: Uint8Array): FluidSectionData {
  const r = new ByteCursor(bytes, "fluid section");
  const palette = new Map<number, PaletteEntry>();
  let encoding: PaletteEncoding = "Empty";

  try {
    const decoded = encodingFromPackingFactor(r.readU8());
    const paletteLength = r.readU16BE();
    if (decoded === undefined) {
      return { encoding, palette, typeArray: undefined, levelArray: undefined };
    }
    encoding = decoded;

    for (let i = 0; i < paletteLength; i++) {
      const id = encoding === "Short" ? r.readU16BE() : r.readU8();
      const nameLength = r.readU16BE();
      const name = r.readUtf8(nameLength);
      const count = r.readU16BE();
      palette.set(id, { name, count });
    }

    const typeArray = r.readBytes(indexArrayBytes(encoding));
    const levelArray = r.readBytes(LEVEL_ARRAY_BYTES);
    return { encoding, palette, typeArray, levelArray };
  } catch (e: unknown) {
    if (!isRegionError(e)) throw e;
    return { encoding, palette, typeArray: undefined, levelArray: undefined };
  }
}

export function paletteName(palette: Palette, id: number | undefined): string {
  if (id === undefined) return EMPTY_NAME;
  return palette.get(id)?.name ?? EMPTY_NAME;
}

// src/region/surface.ts
import { COLUMN_COUNT, columnIndex } from "./bitfield.js";
import {
  CHUNK_WIDTH,
  SECTION_COUNT,
  SECTION_HEIGHT,
  WORLD_HEIGHT,
  type ChunkDocument,
} from "./chunkDocument.js";
import {
  EMPTY_NAME,
  cellIndex,
  decodeBlockSection,
  decodeFluidSection,
  paletteName,
  readFluidLevel,
  readPaletteId,
  type BlockSectionData,
  type FluidSectionData,
} from "./palette.js";

export type SurfaceHit = Readonly<{
  worldY: number;
  blockName: string;
  sectionIndex: number;
}>;

export type SurfaceFluid = Readonly<{
  fluidType: string | undefined;
  fluidDepth: number;
}>;

export type FluidCell = Readonly<{
  type: string | undefined;
  level: number;
}>;

export type ColumnSurfaceData = Readonly<{
  heights: ReadonlyArray<number>;
  blockNames: ReadonlyArray<string>;
  fluidTypes: ReadonlyArray<string | undefined>;
  fluidDepths: ReadonlyArray<number>;
}>;

const NO_SURFACE: SurfaceHit = { worldY: 0, blockName: EMPTY_NAME, sectionIndex: 0 };
const NO_FLUID: SurfaceFluid = { fluidType: undefined, fluidDepth: 0 };
const DRY: FluidCell = { type: undefined, level: 0 };

/**
 * Lazily decoded sections of one chunk. Each section blob is decoded at most
 * once per view; block decode errors propagate, fluid errors never occur.
 */
export class ChunkSections {
  private readonly blocks = new Map<number, BlockSectionData | undefined>();
  private readonly fluids = new Map<number, FluidSectionData | undefined>();

  public constructor(public readonly doc: ChunkDocument) {}

  public block(sectionIndex: number): BlockSectionData | undefined {
    if (!this.blocks.has(sectionIndex)) {
      const data = this.doc.sections[sectionIndex]?.block?.data;
      this.blocks.set(sectionIndex, data === undefined ? undefined : decodeBlockSection(data));
    }
    return this.blocks.get(sectionIndex);
  }

  public fluid(sectionIndex: number): FluidSectionData | undefined {
    if (!this.fluids.has(sectionIndex)) {
      const data = this.doc.sections[sectionIndex]?.fluid?.data;
      this.fluids.set(sectionIndex, data === undefined ? undefined : decodeFluidSection(data));
    }
    return this.fluids.get(sectionIndex);
  }
}

function asSections(chunk: ChunkDocument | ChunkSections): ChunkSections {
  return chunk instanceof ChunkSections ? chunk : new ChunkSections(chunk);
}

function isSolid(name: string): boolean {
  return name !== EMPTY_NAME && !name.startsWith("*");
}

/** Block name at local column (x, z) and world y; "Empty" wherever there is no data. */
export function blockAt(chunk: ChunkDocument | ChunkSections, x: number, worldY: number, z: number): string {
  if (worldY < 0 || worldY >= WORLD_HEIGHT) return EMPTY_NAME;
  const section = asSections(chunk).block(Math.floor(worldY / SECTION_HEIGHT));
  if (section === undefined) return EMPTY_NAME;
  const id = readPaletteId(section.indexArray, section.encoding, cellIndex(x, worldY, z));
  return paletteName(section.palette, id);
}

export function fluidAt(chunk: ChunkDocument | ChunkSections, x: number, worldY: number, z: number): FluidCell {
  if (worldY < 0 || worldY >= WORLD_HEIGHT) return DRY;
  const section = asSections(chunk).fluid(Math.floor(worldY / SECTION_HEIGHT));
  if (section?.typeArray === undefined || section.levelArray === undefined) return DRY;

  const flat = cellIndex(x, worldY, z);
  const id = readPaletteId(section.typeArray, section.encoding, flat);
  const level = readFluidLevel(section.levelArray, flat);
  const name = paletteName(section.palette, id);
  if (level === 0 || name === EMPTY_NAME) return DRY;
  return { type: name, level };
}

export function findSurfaceHeight(chunk: ChunkDocument | ChunkSections, x: number, z: number): SurfaceHit {
  const sections = asSections(chunk);

  for (let sectionIndex = SECTION_COUNT - 1; sectionIndex >= 0; sectionIndex--) {
    const section = sections.block(sectionIndex);
    if (section === undefined || section.encoding === "Empty") continue;

    for (let localY = SECTION_HEIGHT - 1; localY >= 0; localY--) {
      const id = readPaletteId(section.indexArray, section.encoding, cellIndex(x, localY, z));
      const blockName = paletteName(section.palette, id);
      if (!isSolid(blockName)) continue;
      return { worldY: sectionIndex * SECTION_HEIGHT + localY, blockName, sectionIndex };
    }
  }

  return NO_SURFACE;
}

/**
 * Topmost contiguous fluid run above the solid surface. The scan stops when
 * the fluid type changes or a dry cell follows the run; depth is measured
 * from the top of the run down to the surface block.
 */
export function findSurfaceFluid(
  chunk: ChunkDocument | ChunkSections,
  x: number,
  z: number,
  surfaceY: number,
): SurfaceFluid {
  const sections = asSections(chunk);
  let topType: string | undefined;
  let topY = 0;

  for (let worldY = WORLD_HEIGHT - 1; worldY > surfaceY; worldY--) {
    const section = sections.fluid(Math.floor(worldY / SECTION_HEIGHT));
    if (section?.typeArray === undefined) continue;

    const cell = fluidAt(sections, x, worldY, z);
    if (cell.type === undefined) {
      if (topType !== undefined) break;
      continue;
    }

    if (topType === undefined) {
      topType = cell.type;
      topY = worldY;
    } else if (cell.type !== topType) {
      break;
    }
  }

  if (topType === undefined) return NO_FLUID;
  return { fluidType: topType, fluidDepth: topY - surfaceY };
}

export function extractColumnSurfaces(chunk: ChunkDocument | ChunkSections): ColumnSurfaceData {
  const sections = asSections(chunk);
  const heights = new Array<number>(COLUMN_COUNT).fill(0);
  const blockNames = new Array<string>(COLUMN_COUNT).fill(EMPTY_NAME);
  const fluidTypes = new Array<string | undefined>(COLUMN_COUNT).fill(undefined);
  const fluidDepths = new Array<number>(COLUMN_COUNT).fill(0);

  for (let z = 0; z < CHUNK_WIDTH; z++) {
    for (let x = 0; x < CHUNK_WIDTH; x++) {
      const i = columnIndex(x, z);
      const hit = findSurfaceHeight(sections, x, z);
      const fluid = findSurfaceFluid(sections, x, z, hit.worldY);
      heights[i] = hit.worldY;
      blockNames[i] = hit.blockName;
      fluidTypes[i] = fluid.fluidType;
      fluidDepths[i] = fluid.fluidDepth;
    }
  }

  return { heights, blockNames, fluidTypes, fluidDepths };
}

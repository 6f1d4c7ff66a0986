// src/region/render/compositor.ts
import type { BlockPropertiesTable, BlockDisplayProperties } from "../blockProperties.js";
import type { WarnFn } from "../errors.js";
import { clampChannel, type Rgb } from "./color.js";

export type BaseColorSource = "exact" | "prefix" | "keyword" | "default";

export type ResolvedBaseColor = Readonly<{
  rgb: Rgb;
  biomeTintPercent: number;
  /** Only set when it is still to be multiplied in; never when it became the base. */
  particleColor: Rgb | undefined;
  source: BaseColorSource;
}>;

export const WATER_COLOR: Rgb = [25, 131, 217];
export const LAVA_COLOR: Rgb = [249, 78, 17];
export const DEFAULT_COLOR: Rgb = [128, 128, 128];

// Checked in order; "Soil_Grass" is grass, not soil, and "Plant_Leaves" is a plant.
const KEYWORD_COLORS: ReadonlyArray<Readonly<{ keywords: ReadonlyArray<string>; rgb: Rgb }>> = [
  { keywords: ["Grass", "Plant"], rgb: [80, 180, 60] },
  { keywords: ["Leaves"], rgb: [34, 139, 34] },
  { keywords: ["Stone", "Rock"], rgb: [120, 120, 120] },
  { keywords: ["Wood", "Trunk"], rgb: [139, 90, 43] },
  { keywords: ["Dirt", "Soil"], rgb: [139, 90, 43] },
  { keywords: ["Sand"], rgb: [238, 214, 175] },
  { keywords: ["Water"], rgb: [63, 118, 228] },
];

export function applyBiomeTint(base: Rgb, biomeTint: Rgb, percent: number): Rgb {
  const p = percent / 100;
  return [
    base[0] * (1 - p) + biomeTint[0] * p,
    base[1] * (1 - p) + biomeTint[1] * p,
    base[2] * (1 - p) + biomeTint[2] * p,
  ];
}

export function applyParticleMultiply(color: Rgb, particleColor: Rgb): Rgb {
  return [
    (color[0] * particleColor[0]) / 255,
    (color[1] * particleColor[1]) / 255,
    (color[2] * particleColor[2]) / 255,
  ];
}

export function fluidColor(fluidType: string): Rgb | undefined {
  if (fluidType.includes("Water")) return WATER_COLOR;
  if (fluidType.includes("Lava")) return LAVA_COLOR;
  return undefined;
}

/**
 * Blend terrain towards the fluid colour. depthFactor = 1/depth, so a
 * one-block-deep fluid leaves the terrain as is and deep fluid approaches
 * the pure fluid colour.
 */
export function blendFluid(terrain: Rgb, fluidType: string | undefined, fluidDepth: number): Rgb {
  if (fluidType === undefined || fluidDepth === 0) return terrain;
  const fluid = fluidColor(fluidType);
  if (fluid === undefined) return terrain;

  const depthFactor = Math.min(1, 1 / Math.max(1, fluidDepth));
  const mix = (c: 0 | 1 | 2): number =>
    Math.trunc(clampChannel(fluid[c] + (terrain[c] - fluid[c]) * depthFactor));
  return [mix(0), mix(1), mix(2)];
}

function fromProperties(props: BlockDisplayProperties, source: BaseColorSource): ResolvedBaseColor | undefined {
  const tint = props.tintColors[0];
  if (tint !== undefined) {
    return {
      rgb: tint,
      biomeTintPercent: props.biomeTintPercent,
      particleColor: props.particleColor,
      source,
    };
  }
  if (props.particleColor !== undefined) {
    return { rgb: props.particleColor, biomeTintPercent: 0, particleColor: undefined, source };
  }
  return undefined;
}

/**
 * Resolves block display colours against a shared, read-only properties
 * table. Unknown names fall back to keyword colours and then grey; each is
 * reported once through `warn`.
 */
export class Compositor {
  private readonly reported = new Set<string>();

  public constructor(
    private readonly properties: BlockPropertiesTable,
    private readonly warn?: WarnFn,
  ) {}

  public resolveBaseColor(blockName: string): ResolvedBaseColor {
    const exact = this.properties.get(blockName);
    if (exact !== undefined) {
      const resolved = fromProperties(exact, "exact");
      if (resolved) return resolved;
    }

    for (const [key, props] of this.properties) {
      if (!blockName.startsWith(key)) continue;
      const resolved = fromProperties(props, "prefix");
      if (resolved) return resolved;
    }

    this.report(blockName);

    for (const { keywords, rgb } of KEYWORD_COLORS) {
      if (keywords.some((k) => blockName.includes(k))) {
        return { rgb, biomeTintPercent: 0, particleColor: undefined, source: "keyword" };
      }
    }

    return { rgb: DEFAULT_COLOR, biomeTintPercent: 0, particleColor: undefined, source: "default" };
  }

  /** Base colour with biome tint and particle modulation applied; unshaded, unrounded. */
  public columnColor(blockName: string, biomeTint: Rgb | undefined): Rgb {
    const base = this.resolveBaseColor(blockName);
    let color = base.rgb;

    const tinted = biomeTint !== undefined && base.biomeTintPercent > 0;
    if (tinted) color = applyBiomeTint(color, biomeTint, base.biomeTintPercent);

    if (base.particleColor !== undefined && !(tinted && base.biomeTintPercent >= 100)) {
      color = applyParticleMultiply(color, base.particleColor);
    }

    return color;
  }

  public blendFluid(terrain: Rgb, fluidType: string | undefined, fluidDepth: number): Rgb {
    if (fluidType !== undefined && fluidDepth > 0 && fluidColor(fluidType) === undefined) {
      this.report(`fluid ${fluidType}`);
    }
    return blendFluid(terrain, fluidType, fluidDepth);
  }

  private report(name: string): void {
    if (!this.warn || this.reported.has(name)) return;
    this.reported.add(name);
    this.warn(`No display properties for ${name}; using fallback colour`);
  }
}

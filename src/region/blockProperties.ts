// src/region/blockProperties.ts
//
// Block display properties table, as written by `extract-properties`:
//
//   { "<BlockName>": { "TintUp": ["#RRGGBB", ...], "BiomeTintUp": 0..100, "ParticleColor": "#RRGGBB" | null } }

import { readFile } from "node:fs/promises";

import type { WarnFn } from "./errors.js";
import { parseHexColor, type Rgb } from "./render/color.js";

export type BlockDisplayProperties = Readonly<{
  tintColors: ReadonlyArray<Rgb>;
  biomeTintPercent: number;
  particleColor: Rgb | undefined;
}>;

/** Insertion-ordered; prefix lookups depend on that order. */
export type BlockPropertiesTable = ReadonlyMap<string, BlockDisplayProperties>;

export type BlockPropertiesEntryJson = {
  TintUp: string[];
  BiomeTintUp: number;
  ParticleColor: string | null;
};

export type BlockPropertiesJson = Record<string, BlockPropertiesEntryJson>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseColorList(v: unknown, name: string, warn?: WarnFn): Rgb[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new Error(`Invalid ${name}.TintUp: expected array`);

  const out: Rgb[] = [];
  for (const [i, item] of v.entries()) {
    const rgb = typeof item === "string" ? parseHexColor(item) : undefined;
    if (rgb === undefined) {
      warn?.(`${name}.TintUp[${i}]: ignoring ${JSON.stringify(item)} (expected "#RRGGBB")`);
      continue;
    }
    out.push(rgb);
  }
  return out;
}

export function clampPercent(v: number): number {
  return Math.max(0, Math.min(100, v));
}

function parsePercent(v: unknown, name: string, tinted: boolean, warn?: WarnFn): number {
  if (v === undefined || v === null) return tinted ? 100 : 0;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new Error(`Invalid ${name}.BiomeTintUp: expected number in [0, 100]`);
  }
  const clamped = clampPercent(v);
  if (clamped !== v) warn?.(`${name}.BiomeTintUp: clamping ${v} to ${clamped}`);
  return clamped;
}

function parseParticle(v: unknown, name: string, warn?: WarnFn): Rgb | undefined {
  if (v === undefined || v === null) return undefined;
  const rgb = typeof v === "string" ? parseHexColor(v) : undefined;
  if (rgb === undefined) warn?.(`${name}.ParticleColor: ignoring ${JSON.stringify(v)}`);
  return rgb;
}

export function parseBlockPropertiesJson(input: unknown, warn?: WarnFn): BlockPropertiesTable {
  if (!isRecord(input)) throw new Error("Invalid block properties: expected object");

  const table = new Map<string, BlockDisplayProperties>();
  for (const [name, entry] of Object.entries(input)) {
    if (!isRecord(entry)) throw new Error(`Invalid ${name}: expected object`);
    const tintColors = parseColorList(entry.TintUp, name, warn);
    table.set(name, {
      tintColors,
      biomeTintPercent: parsePercent(entry.BiomeTintUp, name, tintColors.length > 0, warn),
      particleColor: parseParticle(entry.ParticleColor, name, warn),
    });
  }
  return table;
}

export async function loadBlockProperties(path: string, warn?: WarnFn): Promise<BlockPropertiesTable> {
  const text = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parseBlockPropertiesJson(parsed, warn);
}

export function stringifyBlockPropertiesJson(doc: BlockPropertiesJson): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

// src/region/extractTool.ts
//
// Builds the block display properties table from an unpacked assets tree:
// every Server/Item/Items/**/*.json that carries a BlockType object.

import path from "node:path";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";

import {
  clampPercent,
  stringifyBlockPropertiesJson,
  type BlockPropertiesEntryJson,
  type BlockPropertiesJson,
} from "./blockProperties.js";
import { errorMessage, type WarnFn } from "./errors.js";

export type ExtractToolOptions = Readonly<{
  out?: string;
}>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }
  out.sort();
  return out;
}

function stringList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

/** Display properties from one item definition, or undefined if it is not a block. */
export function blockEntryFromItem(item: unknown): BlockPropertiesEntryJson | undefined {
  if (!isRecord(item) || !isRecord(item.BlockType)) return undefined;
  const bt = item.BlockType;

  const tint = stringList(bt.Tint).length > 0 ? stringList(bt.Tint) : stringList(bt.TintUp);
  const biome =
    typeof bt.BiomeTintUp === "number" && Number.isFinite(bt.BiomeTintUp)
      ? clampPercent(bt.BiomeTintUp)
      : tint.length > 0
        ? 100
        : 0;
  const particle = typeof bt.ParticleColor === "string" ? bt.ParticleColor : null;

  return { TintUp: tint, BiomeTintUp: biome, ParticleColor: particle };
}

export async function extractBlockProperties(assetsDir: string, warn?: WarnFn): Promise<BlockPropertiesJson> {
  const itemsDir = path.join(assetsDir, "Server", "Item", "Items");
  const files = (await listFiles(itemsDir, true)).filter((f) => f.toLowerCase().endsWith(".json"));

  const out: BlockPropertiesJson = {};
  for (const f of files) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(f, "utf8"));
    } catch (e: unknown) {
      warn?.(`Skip (invalid JSON): ${f}: ${errorMessage(e)}`);
      continue;
    }

    const entry = blockEntryFromItem(parsed);
    if (entry) out[path.basename(f, path.extname(f))] = entry;
  }
  return out;
}

export async function runExtractTool(assetsDir: string, opts: ExtractToolOptions): Promise<void> {
  const outPath = opts.out ?? "block_properties.json";
  const table = await extractBlockProperties(assetsDir, (m) => console.warn(m));

  await mkdir(path.dirname(outPath), { recursive: true });
  await writeFile(outPath, stringifyBlockPropertiesJson(table), "utf8");
  console.log(`Found ${Object.keys(table).length} blocks with BlockType data -> ${outPath}`);
}

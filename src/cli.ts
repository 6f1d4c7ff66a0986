#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { runExtractTool } from "./region/extractTool.js";
import { runBlockTool, runInspectTool } from "./region/inspectTool.js";
import { parseChunkRange } from "./region/render/mapRenderer.js";
import { runRenderChunkTool, runRenderMapTool } from "./region/render/renderTool.js";

function parseIntArg(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new Error(`Invalid ${name}: '${value}' (expected integer)`);
  return n;
}

type RenderCliOptions = {
  world: string;
  properties: string;
  scale: string;
  out?: string;
  overwrite: boolean;
  dryRun: boolean;
};

function renderParams(opts: RenderCliOptions) {
  const params: {
    world: string;
    properties: string;
    scale: number;
    out?: string;
    overwrite: boolean;
    dryRun: boolean;
  } = {
    world: opts.world,
    properties: opts.properties,
    scale: parseIntArg("--scale", opts.scale),
    overwrite: opts.overwrite,
    dryRun: opts.dryRun,
  };
  if (opts.out !== undefined) params.out = opts.out;
  return params;
}

function withRenderOptions(cmd: Command): Command {
  return cmd
    .option("--world <dir>", "Directory containing <rx>.<rz>.region.bin files", ".")
    .option("--properties <path>", "Block display properties JSON", "block_properties.json")
    .option("--scale <n>", "Pixels per block (1..16)", "1")
    .option("-o, --out <path>", "Output PNG path")
    .option("--overwrite", "Overwrite an existing PNG", false)
    .option("--dry-run", "Print the planned output but do not write anything", false);
}

const program = new Command();

program
  .name("regionmap")
  .description("Region file decoder and top-down map renderer")
  .version("0.1.0");

withRenderOptions(
  program
    .command("render-chunk")
    .description("Render one chunk to a PNG")
    .argument("<chunkX>", "Chunk X coordinate (world x / 32)")
    .argument("<chunkZ>", "Chunk Z coordinate (world z / 32)"),
).action(async (chunkX: string, chunkZ: string, opts: RenderCliOptions) => {
  await runRenderChunkTool(parseIntArg("chunkX", chunkX), parseIntArg("chunkZ", chunkZ), renderParams(opts));
});

withRenderOptions(
  program
    .command("render-map")
    .description("Render an inclusive range of chunks into one PNG")
    .argument("<startX>", "First chunk X")
    .argument("<startZ>", "First chunk Z")
    .argument("<endX>", "Last chunk X (inclusive)")
    .argument("<endZ>", "Last chunk Z (inclusive)"),
).action(async (startX: string, startZ: string, endX: string, endZ: string, opts: RenderCliOptions) => {
  const range = parseChunkRange(
    parseIntArg("startX", startX),
    parseIntArg("startZ", startZ),
    parseIntArg("endX", endX),
    parseIntArg("endZ", endZ),
  );
  await runRenderMapTool(range, renderParams(opts));
});

program
  .command("inspect")
  .description("Print a JSON summary of a chunk's sections and palettes")
  .argument("<chunkX>", "Chunk X coordinate")
  .argument("<chunkZ>", "Chunk Z coordinate")
  .option("--world <dir>", "Directory containing region files", ".")
  .action(async (chunkX: string, chunkZ: string, opts: { world: string }) => {
    await runInspectTool(parseIntArg("chunkX", chunkX), parseIntArg("chunkZ", chunkZ), opts);
  });

program
  .command("block")
  .description("Print the block and fluid at a world coordinate")
  .argument("<x>", "World X")
  .argument("<y>", "World Y (0..319)")
  .argument("<z>", "World Z")
  .option("--world <dir>", "Directory containing region files", ".")
  .action(async (x: string, y: string, z: string, opts: { world: string }) => {
    await runBlockTool(parseIntArg("x", x), parseIntArg("y", y), parseIntArg("z", z), opts);
  });

program
  .command("extract-properties")
  .description("Build block_properties.json from an unpacked assets directory")
  .argument("<assetsDir>", "Assets directory (contains Server/Item/Items)")
  .option("-o, --out <path>", "Output JSON path", "block_properties.json")
  .action(async (assetsDir: string, opts: { out: string }) => {
    await runExtractTool(assetsDir, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});

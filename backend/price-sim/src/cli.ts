#!/usr/bin/env node
/**
 * Price Simulation CLI
 * npm run sim -- --points 200 --seed 42 --mode candlestick --volume 1000000
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { closePrice, decodeConfig, pointTime } from "@gbm-sim/price-sdk";
import type { OutputMode, PricePoint, SimulationConfigInput } from "@gbm-sim/price-sdk";

import { DEFAULT_SIM_CONFIG, resolveConfig } from "./config/defaults.js";
import { applyOverrides } from "./config/overrides.js";
import type { ConfigOverrides } from "./config/overrides.js";
import { generateSeries } from "./models/price-path.js";
import { toJson, toMarkdown } from "./reports/generate.js";
import { PriceCursor } from "./sim/cursor.js";
import { PlaybackHub, playCursor } from "./sim/playback.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const REPORTS_DIR = join(__dirname, "..", "reports");

interface CliOptions extends ConfigOverrides {
  config?: string;
  outDir?: string;
  play?: number;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

async function loadConfigFile(path: string): Promise<SimulationConfigInput> {
  const raw = await readFile(path, "utf-8");
  return decodeConfig(JSON.parse(raw));
}

function describePoint(point: PricePoint): string {
  const at = new Date(pointTime(point)).toISOString();
  if (point.kind === "simple") {
    const vol = point.volume !== undefined ? ` | vol ${point.volume.toFixed(0)}` : "";
    return `${at}  ${point.price.toFixed(4)}${vol}`;
  }
  return `${at}  O ${point.open.toFixed(4)} H ${point.high.toFixed(4)} L ${point.low.toFixed(4)} C ${closePrice(point).toFixed(4)} | vol ${point.volume.toFixed(0)}`;
}

async function playToConsole(cursor: PriceCursor, intervalMs: number): Promise<void> {
  const hub = new PlaybackHub<PricePoint>();
  hub.subscribe((point) => console.log(describePoint(point)));

  const handle = playCursor(hub, cursor, { intervalMs });
  const stop = () => {
    console.log("\nPlayback stopped.");
    handle.close().catch((err: unknown) => {
      console.warn(`Playback did not stop cleanly: ${err instanceof Error ? err.message : String(err)}`);
    });
  };
  process.once("SIGINT", stop);
  try {
    const delivered = await handle.done;
    console.log(`Played ${delivered}/${cursor.total} points.`);
  } finally {
    process.off("SIGINT", stop);
  }
}

const program = new Command();

program
  .name("price-sim")
  .description("Generate synthetic GBM price series (simple points or OHLC candles)")
  .option("-c, --config <path>", "JSON config file (interchange form)")
  .option("-n, --points <number>", "Number of points / candles", parseInteger)
  .option("-s, --seed <number>", "RNG seed for reproducibility (env PRICE_SIM_SEED)", parseInteger)
  .addOption(
    new Option("-m, --mode <mode>", "Output mode").choices(["simple", "candlestick"] satisfies OutputMode[])
  )
  .option("-p, --price <number>", "Initial price", parseNumber)
  .option("--drift <number>", "Drift per step", parseNumber)
  .option("--volatility <number>", "Volatility per step", parseNumber)
  .option("--interval <ms>", "Step interval in milliseconds", parseNumber)
  .option("--ticks <number>", "Intra-step ticks per candle", parseInteger)
  .option("--capture-intra", "Keep intra-step prices on each candle")
  .option("--volume <base>", "Simulate volume around this base", parseNumber)
  .option("--volume-volatility <number>", "Std-dev of log volume", parseNumber)
  .option("--supply <number>", "Initial circulating supply", parseNumber)
  .option("--supply-growth <rate>", "Supply growth per step", parseNumber)
  .option("--min <price>", "Price floor", parseNumber)
  .option("--max <price>", "Price ceiling", parseNumber)
  .option("-o, --out-dir <path>", "Report directory (env PRICE_SIM_OUT_DIR)")
  .option("--play <ms>", "Stream the series to the console, one point every <ms>", parseNumber)
  .action(async (opts: CliOptions) => {
    const base = opts.config ? await loadConfigFile(opts.config) : DEFAULT_SIM_CONFIG;
    const config = resolveConfig(applyOverrides(base, opts));

    console.log(
      `Generating ${config.dataPoints} ${config.outputMode} points (seed=${config.seed ?? "random"})...`
    );
    const series = generateSeries(config);

    const report = toJson(config, series);
    const reportMd = toMarkdown(config, report.summary);

    const outDir = resolve(opts.outDir ?? process.env.PRICE_SIM_OUT_DIR ?? REPORTS_DIR);
    await mkdir(outDir, { recursive: true });
    const jsonPath = join(outDir, "latest.json");
    const mdPath = join(outDir, "latest.md");
    await writeFile(jsonPath, JSON.stringify(report, null, 2), "utf-8");
    await writeFile(mdPath, reportMd, "utf-8");

    console.log(`\nReport written:`);
    console.log(`  ${jsonPath}`);
    console.log(`  ${mdPath}`);
    console.log(`\nEnd price: ${report.summary.endPrice.toFixed(4)} (${report.summary.returnPct.toFixed(2)}%)`);

    if (opts.play !== undefined) {
      console.log(`\nPlaying back every ${opts.play}ms (Ctrl+C to stop)...`);
      await playToConsole(new PriceCursor(series), opts.play);
    }
  });

// Strip standalone "--" so commander parses options correctly
const args = process.argv.slice(2).filter((x) => x !== "--");
program.parseAsync(["node", "cli", ...args]).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

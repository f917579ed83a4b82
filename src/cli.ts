#!/usr/bin/env node
/**
 * camapper CLI
 *
 * Maps camera app controls on Android devices reachable over adb.
 */

import path from "path";
import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";
import { adbSettingsFrom, loadConfig } from "./config.js";
import type { DiscoverySession } from "./discovery/session.js";
import {
  DEFAULT_HARDWARE_VERSION,
  mapDevices,
  outputFileName,
  writeMapping,
  type DeviceResult,
} from "./mapper.js";
import { listDevices } from "./platforms/android.js";
import { setLogLevel } from "./utils/logger.js";

const EXIT_INTERRUPTED = 130;

const mapOptionsSchema = z.object({
  ip: z.array(z.string().min(1)).min(1),
  hardwareVersion: z.string().min(1),
  output: z.string().optional(),
  outputDir: z.string().optional(),
  maxAttempts: z.string().optional(),
  settleMs: z.string().optional(),
  threshold: z.string().optional(),
  calibration: z.string().optional(),
  verbose: z.boolean().optional(),
});

type MapCommandOptions = z.infer<typeof mapOptionsSchema>;

const program = new Command();

program
  .name("camapper")
  .description("Discover camera app control coordinates on Android devices")
  .version("1.0.0");

program
  .command("map")
  .description("Map the camera controls of one or more devices")
  .requiredOption("--ip <address...>", "Device address (ip:port or adb serial)")
  .option("--hardware-version <version>", "Hardware version recorded in the map", DEFAULT_HARDWARE_VERSION)
  .option("-o, --output <file>", "Write the map to this file (single device)")
  .option("--output-dir <dir>", "Write one <device>.json per device to this directory")
  .option("--max-attempts <n>", "Attempts per control before it is recorded absent")
  .option("--settle-ms <n>", "Wait after each tap, in milliseconds")
  .option("--threshold <t>", "Similarity below which two frames differ (0-1)")
  .option("--calibration <file>", "Calibration JSON with per-control strategies")
  .option("-v, --verbose", "Log every attempt")
  .action(async (raw: Record<string, unknown>) => {
    const options = mapOptionsSchema.parse(raw);
    if (options.verbose) setLogLevel("debug");

    if (options.output && options.outputDir) {
      fail("--output and --output-dir cannot be combined");
    }
    if (options.output && options.ip.length > 1) {
      fail("--output takes a single device; use --output-dir for several");
    }

    const config = loadConfig({
      maxAttempts: options.maxAttempts,
      settleMs: options.settleMs,
      similarityThreshold: options.threshold,
      calibrationPath: options.calibration,
    });

    const controller = new AbortController();
    process.once("SIGINT", () => {
      console.error(chalk.yellow("\nInterrupted, saving what was mapped so far..."));
      controller.abort();
    });

    console.error(chalk.cyan(`\n  Mapping ${options.ip.join(", ")}\n`));
    const results = await mapDevices(options.ip, {
      config,
      hardwareVersion: options.hardwareVersion,
      signal: controller.signal,
    });

    const failed = await report(results, options);
    if (controller.signal.aborted) process.exit(EXIT_INTERRUPTED);
    if (failed > 0) process.exit(1);
  });

program
  .command("devices")
  .description("List devices known to adb")
  .action(async () => {
    const devices = await listDevices(adbSettingsFrom(loadConfig()));
    if (devices.length === 0) {
      console.error(chalk.gray("  No devices attached"));
      return;
    }
    for (const device of devices) {
      const status =
        device.status === "device" ? chalk.green(device.status) : chalk.yellow(device.status);
      console.log(`${device.id}\t${device.name}\t${status}`);
    }
  });

/**
 * Writes or prints every successful map and prints a summary per device.
 * Returns the number of devices that failed.
 */
async function report(results: DeviceResult[], options: MapCommandOptions): Promise<number> {
  const printed: Record<string, unknown> = {};
  let failed = 0;

  for (const result of results) {
    if ("error" in result) {
      failed++;
      console.error(chalk.red(`  ✗ ${result.address}: ${result.error.message}`));
      continue;
    }

    const { session } = result;
    const target = options.output ??
      (options.outputDir ? path.join(options.outputDir, outputFileName(session.deviceId)) : undefined);

    if (target) {
      const written = await writeMapping(session, target);
      console.error(summary(session, written));
    } else if (session.state === "complete") {
      printed[result.address] = session.toOutput();
      console.error(summary(session));
    } else {
      console.error(summary(session));
    }
  }

  const maps = Object.values(printed);
  if (maps.length === 1) {
    console.log(JSON.stringify(maps[0], null, 2));
  } else if (maps.length > 1) {
    console.log(JSON.stringify(printed, null, 2));
  }
  return failed;
}

function summary(session: DiscoverySession, written?: string): string {
  const absent = [...session.failures.keys()];
  const head =
    session.state === "complete"
      ? chalk.green(`  ✓ ${session.deviceId}`)
      : chalk.yellow(`  … ${session.deviceId} (interrupted)`);
  const lines = [head];
  if (written) lines.push(chalk.gray(`    written to ${written}`));
  if (absent.length > 0) {
    lines.push(chalk.yellow(`    absent: ${absent.join(", ")}`));
  }
  return lines.join("\n");
}

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : error);
  process.exit(1);
});

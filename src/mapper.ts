import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { adbSettingsFrom, type MapperConfig } from "./config.js";
import { AdbDeviceAdapter, type DeviceAdapter } from "./device/adapter.js";
import {
  readCalibrationFile,
  resolveCalibration,
  type CalibrationFile,
} from "./discovery/calibration.js";
import { ControlResolver } from "./discovery/control-resolver.js";
import { FrameComparator } from "./discovery/frame-comparator.js";
import { DiscoverySession } from "./discovery/session.js";
import { DiscoveryStateMachine } from "./discovery/state-machine.js";
import type { DiscoveryPlan } from "./discovery/task-plan.js";
import {
  TesseractTextLocator,
  type TextLocator,
} from "./discovery/text-locator.js";
import { CameraAppUnavailableError } from "./errors.js";
import { delay } from "./utils/delay.js";
import { createLogger } from "./utils/logger.js";

export const DEFAULT_HARDWARE_VERSION = "1.0.0";

const log = createLogger("mapper");

export interface MapOptions {
  config: MapperConfig;
  hardwareVersion?: string;
  signal?: AbortSignal;
  plan?: DiscoveryPlan;
  /** Defaults to the tesseract CLI. */
  locator?: TextLocator;
  /** Defaults to the file at `config.calibrationPath`. */
  calibration?: CalibrationFile;
}

export type DeviceResult =
  | { address: string; session: DiscoverySession }
  | { address: string; error: Error };

/**
 * Maps one device: reads its profile, brings the camera app forward and
 * runs discovery. Resolves with the session, aborted or complete.
 */
export async function mapDevice(
  device: DeviceAdapter,
  options: MapOptions,
): Promise<DiscoverySession> {
  const { config, signal } = options;
  const hardwareVersion = options.hardwareVersion ?? DEFAULT_HARDWARE_VERSION;
  const calibration = resolveCalibration(
    options.calibration ?? readCalibrationFile(config.calibrationPath),
    hardwareVersion,
  );

  const info = await device.readDeviceInfo(hardwareVersion);
  log.info(
    `${device.id}: ${info.profile.brand} ${info.profile.model}, Android ${info.profile.softwareVersion}, ${info.screen.width}x${info.screen.height}`,
  );
  await ensureCameraOpen(device, config, signal);

  const session = new DiscoverySession(device.id, info.profile, info.screen);
  const locator =
    options.locator ??
    new TesseractTextLocator({
      binary: config.tesseractPath,
      timeoutMs: config.ocrTimeoutMs,
    });

  const machine = new DiscoveryStateMachine({
    device,
    calibration,
    plan: options.plan,
    maxAttempts: config.maxAttempts,
    settleMs: config.settleMs,
    comparator: new FrameComparator({
      threshold: config.similarityThreshold,
      analysisWidth: config.analysisWidth,
      ignoreTopRatio: config.ignoreTopRatio,
    }),
    resolver: new ControlResolver({
      calibration,
      locator,
      hierarchy: device,
      screen: info.screen,
      minTextConfidence: config.minTextConfidence,
    }),
  });
  return machine.run(session, signal);
}

/**
 * Maps several devices in parallel, each with its own adapter and session.
 * A failing device does not stop the others.
 */
export async function mapDevices(
  addresses: string[],
  options: MapOptions & {
    connect?: (address: string) => Promise<DeviceAdapter>;
  },
): Promise<DeviceResult[]> {
  const adb = adbSettingsFrom(options.config);
  const connect =
    options.connect ?? ((address) => AdbDeviceAdapter.connect(address, adb));

  return Promise.all(
    addresses.map(async (address): Promise<DeviceResult> => {
      try {
        const device = await connect(address);
        const session = await mapDevice(device, options);
        return { address, session };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        log.error(`${address}: ${err.message}`);
        return { address, error: err };
      }
    }),
  );
}

/**
 * Starts the default camera app and waits until it holds the focus.
 */
export async function ensureCameraOpen(
  device: DeviceAdapter,
  config: Pick<MapperConfig, "cameraOpenAttempts" | "settleMs">,
  signal?: AbortSignal,
): Promise<void> {
  let activity = "";
  for (let attempt = 1; attempt <= config.cameraOpenAttempts; attempt++) {
    await device.openCamera();
    await delay(config.settleMs, signal);
    activity = await device.foregroundActivity();
    if (/cam/i.test(activity)) return;
    log.debug(`${device.id}: foreground is "${activity}" (attempt ${attempt})`);
  }
  throw new CameraAppUnavailableError(
    `Camera app did not open on ${device.id}, foreground is "${activity || "unknown"}"`,
  );
}

/** File name for a device's map inside an output directory. */
export function outputFileName(deviceId: string): string {
  return `${deviceId.replace(/[^\w.-]+/g, "_")}.json`;
}

export function partialPath(outputPath: string): string {
  return outputPath.replace(/\.json$/i, "") + ".partial.json";
}

/**
 * Writes the session's map. Aborted sessions go to the `.partial.json`
 * sibling of `outputPath`. Returns the path written.
 */
export async function writeMapping(
  session: DiscoverySession,
  outputPath: string,
): Promise<string> {
  const target = session.state === "aborted" ? partialPath(outputPath) : outputPath;
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, session.serialize() + "\n", "utf8");
  return target;
}

import { ExecError, exec, execBuffer } from "../utils/exec.js";
import type { Device, ScreenSize, UiElement } from "../types.js";

const STILL_IMAGE_CAMERA = "android.media.action.STILL_IMAGE_CAMERA";

export interface AdbSettings {
  binary: string;
  commandTimeoutMs: number;
  screenshotTimeoutMs: number;
}

export const DEFAULT_ADB_SETTINGS: Readonly<AdbSettings> = {
  binary: "adb",
  commandTimeoutMs: 15_000,
  screenshotTimeoutMs: 30_000,
};

function adb(deviceId: string, cmd: string, settings: AdbSettings): string {
  return `${settings.binary} -s ${deviceId} ${cmd}`;
}

function run(command: string, settings: AdbSettings): Promise<string> {
  return exec(command, { timeout: settings.commandTimeoutMs });
}

export async function listDevices(
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<Device[]> {
  const output = await run(`${settings.binary} devices -l`, settings);
  const lines = output.trim().split("\n").slice(1); // skip header

  const devices: Device[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("*")) continue;

    const [id, status = "unknown", ...rest] = trimmed.split(/\s+/);

    // Extract model name from "model:XXX" token
    const modelToken = rest.find((p) => p.startsWith("model:"));
    const name = modelToken ? modelToken.slice("model:".length) : id;

    devices.push({ id, name, status });
  }

  return devices;
}

/**
 * Connects to a device over TCP/IP. adb exits 0 even when the connection is
 * refused, so the output is checked as well.
 */
export async function connect(
  address: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<void> {
  const output = await run(`${settings.binary} connect ${address}`, settings);
  if (!/connected to/i.test(output)) {
    throw new Error(`adb could not connect to ${address}: ${output.trim()}`);
  }
}

export async function screenshot(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<Buffer> {
  return execBuffer(adb(deviceId, "exec-out screencap -p", settings), {
    timeout: settings.screenshotTimeoutMs,
  });
}

export async function tap(
  x: number,
  y: number,
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<void> {
  await run(adb(deviceId, `shell input tap ${x} ${y}`, settings), settings);
}

const KEYCODE_MAP = {
  home: 3,
  back: 4,
} as const;

export async function pressKey(
  key: keyof typeof KEYCODE_MAP,
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<void> {
  await run(adb(deviceId, `shell input keyevent ${KEYCODE_MAP[key]}`, settings), settings);
}

export async function getProp(
  name: string,
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<string> {
  const output = await run(adb(deviceId, `shell getprop ${name}`, settings), settings);
  return output.trim();
}

export async function getScreenSize(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<ScreenSize> {
  const output = await run(adb(deviceId, "shell wm size", settings), settings);
  return parseScreenSize(output);
}

/**
 * Parses `wm size`. An "Override size" line wins over the physical size,
 * since input coordinates follow the override.
 */
export function parseScreenSize(output: string): ScreenSize {
  const override = output.match(/Override size:\s*(\d+)x(\d+)/);
  const physical = output.match(/(\d+)x(\d+)/);
  const match = override ?? physical;
  if (!match) {
    throw new Error(`Unexpected wm size output: ${output.trim()}`);
  }
  return {
    width: parseInt(match[1], 10),
    height: parseInt(match[2], 10),
  };
}

/**
 * Package name of the default still-image camera app, or undefined when no
 * activity handles the intent.
 */
export async function getCameraPackage(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<string | undefined> {
  const output = await run(
    adb(deviceId, `shell cmd package resolve-activity --brief -a ${STILL_IMAGE_CAMERA}`, settings),
    settings,
  );
  // Last line is "com.vendor.camera/.MainActivity"
  const component = output
    .trim()
    .split("\n")
    .map((l) => l.trim())
    .reverse()
    .find((l) => l.includes("/"));
  return component?.split("/")[0];
}

export async function getPackageVersion(
  packageName: string,
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<string | undefined> {
  const output = await run(adb(deviceId, `shell dumpsys package ${packageName}`, settings), settings);
  const match = output.match(/versionName=(\S+)/);
  return match ? match[1] : undefined;
}

export async function openCamera(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<void> {
  await run(adb(deviceId, `shell am start -a ${STILL_IMAGE_CAMERA}`, settings), settings);
}

/**
 * The focused window's component, e.g. "com.vendor.camera/.CameraActivity".
 */
export async function getForegroundActivity(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<string> {
  const output = await run(adb(deviceId, "shell dumpsys window", settings), settings);
  const match =
    output.match(/mCurrentFocus=Window\{[^}]*\s(\S+\/\S+)\}/) ??
    output.match(/mFocusedApp=.*\s(\S+\/\S+)/);
  return match ? match[1] : "";
}

const DUMP_FILE = "/sdcard/window_dump.xml";

/**
 * UI hierarchy of the current screen. Tries `exec-out ... /dev/tty` first and
 * falls back to a dump file, as some builds print nothing to the tty. Dumps
 * are slow, so they get the screenshot timeout.
 */
export async function getUiTree(
  deviceId: string,
  settings: AdbSettings = DEFAULT_ADB_SETTINGS,
): Promise<UiElement[]> {
  const options = { timeout: settings.screenshotTimeoutMs };
  const dumps: Array<() => Promise<string>> = [
    () => exec(adb(deviceId, "exec-out uiautomator dump /dev/tty", settings), options),
    async () => {
      await exec(adb(deviceId, `shell uiautomator dump ${DUMP_FILE}`, settings), options);
      return run(adb(deviceId, `shell cat ${DUMP_FILE}`, settings), settings);
    },
  ];

  let reason = "no XML in dump output";
  for (const dump of dumps) {
    try {
      const xml = extractXml(await dump());
      if (xml) return parseUiXml(xml);
    } catch (error) {
      if (error instanceof ExecError && error.timedOut) throw error;
      reason = error instanceof Error ? error.message : String(error);
    }
  }
  throw new Error(`uiautomator dump failed: ${reason}`);
}

function extractXml(output: string): string | null {
  // Strip null bytes and other binary artifacts
  const cleaned = output.replace(/\0/g, "").trim();
  const match =
    cleaned.match(/<\?xml[\s\S]*<\/hierarchy>/) ??
    cleaned.match(/<hierarchy[\s\S]*<\/hierarchy>/);
  return match ? match[0] : null;
}

export function parseUiXml(xml: string): UiElement[] {
  const elements: UiElement[] = [];
  // Match both self-closing <node ... /> and opening <node ...> tags
  const nodeRegex = /<node\s+([^>]+?)\/?>/g;
  let match: RegExpExecArray | null;

  while ((match = nodeRegex.exec(xml)) !== null) {
    const attrs = match[1];

    // Parse bounds "[x1,y1][x2,y2]"
    const bounds = (extractAttr(attrs, "bounds") ?? "").match(
      /\[(\d+),(\d+)\]\[(\d+),(\d+)\]/,
    );
    if (!bounds) continue;
    const [x1, y1, x2, y2] = bounds.slice(1, 5).map((n) => parseInt(n, 10));

    // Strip package prefix from resource-id (e.g. "com.example:id/btn" → "btn")
    const rawResourceId = extractAttr(attrs, "resource-id");

    elements.push({
      type: extractAttr(attrs, "class")?.split(".").pop() ?? "Unknown",
      text: extractAttr(attrs, "text") ?? "",
      contentDesc: extractAttr(attrs, "content-desc") ?? "",
      resourceId: rawResourceId ? rawResourceId.replace(/^[^:]+:id\//, "") : undefined,
      bounds: { x: x1, y: y1, width: x2 - x1, height: y2 - y1 },
      clickable: extractAttr(attrs, "clickable") === "true",
    });
  }

  return elements;
}

function extractAttr(attrs: string, name: string): string | undefined {
  const match = attrs.match(new RegExp(`(?:^|\\s)${name}="([^"]*)"`));
  return match ? match[1] : undefined;
}

import { z } from "zod";
import type { AdbSettings } from "./platforms/android.js";

export const MapperConfigSchema = z.object({
  adbPath: z.string().min(1).default("adb"),
  tesseractPath: z.string().min(1).default("tesseract"),
  /** Attempts per task before the control is recorded absent. */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Wait after every tap for UI animations to finish. */
  settleMs: z.coerce.number().int().min(0).default(800),
  /** SSIM below this value means two frames show different UI. */
  similarityThreshold: z.coerce.number().gt(0).lt(1).default(0.9),
  /** Status bar band ignored by the comparator, as a share of the height. */
  ignoreTopRatio: z.coerce.number().min(0).lt(1).default(0.06),
  /** Width frames are reduced to before comparison. */
  analysisWidth: z.coerce.number().int().min(16).default(120),
  minTextConfidence: z.coerce.number().min(0).max(1).default(0.6),
  commandTimeoutMs: z.coerce.number().int().positive().default(15_000),
  screenshotTimeoutMs: z.coerce.number().int().positive().default(30_000),
  ocrTimeoutMs: z.coerce.number().int().positive().default(30_000),
  cameraOpenAttempts: z.coerce.number().int().min(1).default(3),
  calibrationPath: z.string().optional(),
});

export type MapperConfig = z.infer<typeof MapperConfigSchema>;
/** Raw values, validated and coerced by `loadConfig`. */
export type MapperConfigInput = { [K in keyof MapperConfig]?: unknown };

const ENV_KEYS: Record<keyof MapperConfig, string> = {
  adbPath: "CAMAPPER_ADB_PATH",
  tesseractPath: "CAMAPPER_TESSERACT_PATH",
  maxAttempts: "CAMAPPER_MAX_ATTEMPTS",
  settleMs: "CAMAPPER_SETTLE_MS",
  similarityThreshold: "CAMAPPER_SIMILARITY_THRESHOLD",
  ignoreTopRatio: "CAMAPPER_IGNORE_TOP_RATIO",
  analysisWidth: "CAMAPPER_ANALYSIS_WIDTH",
  minTextConfidence: "CAMAPPER_MIN_TEXT_CONFIDENCE",
  commandTimeoutMs: "CAMAPPER_COMMAND_TIMEOUT_MS",
  screenshotTimeoutMs: "CAMAPPER_SCREENSHOT_TIMEOUT_MS",
  ocrTimeoutMs: "CAMAPPER_OCR_TIMEOUT_MS",
  cameraOpenAttempts: "CAMAPPER_CAMERA_OPEN_ATTEMPTS",
  calibrationPath: "CAMAPPER_CALIBRATION",
};

/**
 * Builds the configuration from defaults, then environment variables, then
 * explicit overrides (CLI flags or tool arguments). Undefined overrides are
 * ignored.
 */
export function loadConfig(
  overrides: MapperConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): MapperConfig {
  const fromEnv: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== "") fromEnv[key] = value;
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined),
  );

  return MapperConfigSchema.parse({ ...fromEnv, ...defined });
}

/** adb binary and timeouts for one adapter. */
export function adbSettingsFrom(
  config: Pick<MapperConfig, "adbPath" | "commandTimeoutMs" | "screenshotTimeoutMs">,
): AdbSettings {
  return {
    binary: config.adbPath,
    commandTimeoutMs: config.commandTimeoutMs,
    screenshotTimeoutMs: config.screenshotTimeoutMs,
  };
}

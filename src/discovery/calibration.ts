import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { CalibrationError } from "../errors.js";
import { CONTROL_NAMES, type ControlName } from "./controls.js";

export const DEFAULT_CALIBRATION_PATH = path.resolve(
  __dirname,
  "..",
  "..",
  "config",
  "calibration.json",
);

const controlNameSchema = z.enum(CONTROL_NAMES);
const ratio = z.number().min(0).max(1);

/** A region of the screen, every field a share of the screen size. */
const regionSchema = z.object({
  x: ratio,
  y: ratio,
  width: ratio.gt(0),
  height: ratio.gt(0),
});

const strategySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ratio"), x: ratio, y: ratio }),
  z.object({
    kind: z.literal("text"),
    labels: z.array(z.string().min(1)).min(1),
    region: regionSchema.optional(),
    minConfidence: z.number().min(0).max(1).optional(),
  }),
  z.object({
    kind: z.literal("offset"),
    anchor: controlNameSchema,
    dx: z.number().int().default(0),
    dy: z.number().int().default(0),
    dxRatio: z.number().min(-1).max(1).default(0),
    dyRatio: z.number().min(-1).max(1).default(0),
  }),
  z.object({
    kind: z.literal("element"),
    /** Substrings of a clickable node's name, in priority order. */
    names: z.array(z.string().trim().min(1)).min(1),
  }),
  z.object({
    kind: z.literal("distance"),
    from: controlNameSchema,
    to: controlNameSchema,
  }),
]);

const controlCalibrationSchema = z.object({
  strategies: z.array(strategySchema).min(1),
  /** Tap the candidate and require a visible change before committing it. */
  probe: z
    .object({ restore: z.enum(["tap", "back", "none"]).default("none") })
    .optional(),
});

const calibrationFileSchema = z.object({
  controls: z.record(controlNameSchema, controlCalibrationSchema),
  hardwareOverrides: z
    .record(z.string(), z.record(controlNameSchema, controlCalibrationSchema))
    .default({}),
});

export type Strategy = z.infer<typeof strategySchema>;
export type StrategyKind = Strategy["kind"];
export type TextStrategy = Extract<Strategy, { kind: "text" }>;
export type ElementStrategy = Extract<Strategy, { kind: "element" }>;
export type ControlCalibration = z.infer<typeof controlCalibrationSchema>;
export type CalibrationFile = z.infer<typeof calibrationFileSchema>;

/** Strategies for every control, after hardware overrides are applied. */
export type Calibration = ReadonlyMap<ControlName, ControlCalibration>;

export function parseCalibrationFile(raw: unknown): CalibrationFile {
  const result = calibrationFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new CalibrationError(`Invalid calibration: ${issues}`);
  }
  return result.data;
}

export function readCalibrationFile(
  filePath: string = DEFAULT_CALIBRATION_PATH,
): CalibrationFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CalibrationError(`Cannot read calibration ${filePath}: ${reason}`);
  }
  return parseCalibrationFile(raw);
}

/**
 * Applies the overrides declared for `hardwareVersion` on top of the base
 * controls. An override replaces a control's entry as a whole.
 */
export function resolveCalibration(
  file: CalibrationFile,
  hardwareVersion: string,
): Calibration {
  const overrides = file.hardwareOverrides[hardwareVersion] ?? {};
  const missing: ControlName[] = [];
  const resolved = new Map<ControlName, ControlCalibration>();

  for (const name of CONTROL_NAMES) {
    const entry = overrides[name] ?? file.controls[name];
    if (entry) {
      resolved.set(name, entry);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new CalibrationError(
      `Calibration has no strategies for: ${missing.join(", ")}`,
    );
  }
  return resolved;
}

export function calibrationFor(
  calibration: Calibration,
  name: ControlName,
): ControlCalibration {
  const entry = calibration.get(name);
  if (!entry) throw new CalibrationError(`Missing calibration for ${name}`);
  return entry;
}

/** Controls a strategy reads from the store. */
export function strategyDependencies(strategy: Strategy): ControlName[] {
  switch (strategy.kind) {
    case "offset":
      return [strategy.anchor];
    case "distance":
      return [strategy.from, strategy.to];
    default:
      return [];
  }
}

import { z } from "zod";
import {
  ControlAlreadySettledError,
  IncompleteSessionError,
  InvalidMappingError,
} from "../errors.js";
import type { DeviceProfile } from "../types.js";
import { CONTROL_NAMES, type ControlName, type ControlValue } from "./controls.js";

const PROFILE_FIELDS = {
  HARDWARE_VERSION: "hardwareVersion",
  SOFTWARE_VERSION: "softwareVersion",
  BRAND: "brand",
  MODEL: "model",
  CAMERA_VERSION: "cameraVersion",
} as const satisfies Record<string, keyof DeviceProfile>;

export type MappingOutput = Record<string, string | ControlValue>;

/**
 * Control name to settled value, for one session. A control settles once,
 * either committed with a value or marked absent, and never changes after.
 */
export class MappingStore {
  private readonly values = new Map<ControlName, ControlValue>();

  commit(name: ControlName, value: Exclude<ControlValue, null>): void {
    this.settle(name, value);
  }

  markAbsent(name: ControlName): void {
    this.settle(name, null);
  }

  private settle(name: ControlName, value: ControlValue): void {
    if (this.values.has(name)) {
      throw new ControlAlreadySettledError(name);
    }
    this.values.set(name, value);
  }

  isSettled(name: ControlName): boolean {
    return this.values.has(name);
  }

  /** Settled value, or undefined while the control is still pending. */
  get(name: ControlName): ControlValue | undefined {
    return this.values.get(name);
  }

  pending(): ControlName[] {
    return CONTROL_NAMES.filter((name) => !this.values.has(name));
  }

  /** Settled controls in vocabulary order. */
  entries(): Array<[ControlName, ControlValue]> {
    const result: Array<[ControlName, ControlValue]> = [];
    for (const name of CONTROL_NAMES) {
      const value = this.values.get(name);
      if (value !== undefined) result.push([name, value]);
    }
    return result;
  }

  /**
   * Output object: device metadata first, then one field per control in
   * declared order. Pending controls are written as null only when
   * `allowIncomplete` is set.
   */
  toOutput(
    profile: DeviceProfile,
    options: { allowIncomplete?: boolean } = {},
  ): MappingOutput {
    const missing = this.pending();
    if (missing.length > 0 && !options.allowIncomplete) {
      throw new IncompleteSessionError(missing);
    }

    const output: MappingOutput = {};
    for (const [field, key] of Object.entries(PROFILE_FIELDS)) {
      output[field] = profile[key];
    }
    for (const name of CONTROL_NAMES) {
      const value = this.values.get(name);
      output[name] = value ?? null;
    }
    return output;
  }

  serialize(
    profile: DeviceProfile,
    options: { allowIncomplete?: boolean } = {},
  ): string {
    return JSON.stringify(this.toOutput(profile, options), null, 2);
  }
}

const controlValueSchema = z.union([
  z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
  z.tuple([z.number()]),
  z.null(),
]);

const metadataSchema = z.object({
  HARDWARE_VERSION: z.string(),
  SOFTWARE_VERSION: z.string(),
  BRAND: z.string(),
  MODEL: z.string(),
  CAMERA_VERSION: z.string(),
});

const KNOWN_FIELDS = new Set<string>([
  ...Object.keys(PROFILE_FIELDS),
  ...CONTROL_NAMES,
]);

export interface ParsedMapping {
  profile: DeviceProfile;
  store: MappingStore;
}

/**
 * Reads a serialized map back. Every control must be present; unknown
 * fields are rejected.
 */
export function parseMapping(json: string): ParsedMapping {
  const fields = z.record(z.unknown()).parse(JSON.parse(json));

  const unknown = Object.keys(fields).filter((key) => !KNOWN_FIELDS.has(key));
  if (unknown.length > 0) {
    throw new InvalidMappingError(`Unknown fields in mapping: ${unknown.join(", ")}`);
  }

  const metadata = metadataSchema.parse(fields);
  const profile: DeviceProfile = {
    hardwareVersion: metadata.HARDWARE_VERSION,
    softwareVersion: metadata.SOFTWARE_VERSION,
    brand: metadata.BRAND,
    model: metadata.MODEL,
    cameraVersion: metadata.CAMERA_VERSION,
  };

  const store = new MappingStore();
  for (const name of CONTROL_NAMES) {
    const result = controlValueSchema.safeParse(fields[name]);
    if (!result.success) {
      throw new InvalidMappingError(`Invalid value for ${name}: ${JSON.stringify(fields[name])}`);
    }
    if (result.data === null) {
      store.markAbsent(name);
    } else {
      store.commit(name, result.data);
    }
  }
  return { profile, store };
}

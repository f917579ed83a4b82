import type { DeviceProfile, ScreenSize } from "../types.js";
import type { ContextId, ControlName, ControlValue } from "./controls.js";
import { MappingStore, type MappingOutput } from "./mapping-store.js";
import { ROOT_CONTEXT } from "./task-plan.js";

export type SessionState = "idle" | "running" | "complete" | "aborted";

/**
 * Mutable state of one device's discovery run. The mapping store is private:
 * controls settle only through `commit` and `recordAbsent`.
 */
export class DiscoverySession {
  private readonly store = new MappingStore();
  /** Why a control ended up absent. Diagnostics only, never serialized. */
  readonly failures = new Map<ControlName, string>();
  readonly contexts: ContextId[] = [ROOT_CONTEXT];
  state: SessionState = "idle";
  /** Index of the task being run, or of the next one once stopped. */
  taskIndex = 0;

  constructor(
    readonly deviceId: string,
    readonly profile: DeviceProfile,
    readonly screen: ScreenSize,
  ) {}

  get currentContext(): ContextId {
    return this.contexts[this.contexts.length - 1];
  }

  get(name: ControlName): ControlValue | undefined {
    return this.store.get(name);
  }

  isSettled(name: ControlName): boolean {
    return this.store.isSettled(name);
  }

  commit(name: ControlName, value: Exclude<ControlValue, null>): void {
    this.store.commit(name, value);
  }

  recordAbsent(name: ControlName, reason: string): void {
    this.store.markAbsent(name);
    this.failures.set(name, reason);
  }

  /** Aborted sessions serialize with their pending controls as null. */
  toOutput(): MappingOutput {
    return this.store.toOutput(this.profile, {
      allowIncomplete: this.state === "aborted",
    });
  }

  serialize(): string {
    return JSON.stringify(this.toOutput(), null, 2);
  }
}

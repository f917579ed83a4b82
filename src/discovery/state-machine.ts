import type { DeviceAdapter } from "../device/adapter.js";
import { DeviceUnreachableError } from "../errors.js";
import type { Frame } from "../types.js";
import { delay } from "../utils/delay.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { calibrationFor, type Calibration } from "./calibration.js";
import type { ControlResolver } from "./control-resolver.js";
import { isCoordinate, type ControlName, type Coordinate } from "./controls.js";
import type { FrameComparator } from "./frame-comparator.js";
import type { DiscoverySession } from "./session.js";
import {
  DEFAULT_PLAN,
  validatePlan,
  type DiscoveryPlan,
  type DiscoveryTask,
  type ExitAction,
} from "./task-plan.js";

export interface DiscoveryStateMachineOptions {
  device: DeviceAdapter;
  comparator: Pick<FrameComparator, "differs">;
  resolver: Pick<ControlResolver, "resolve">;
  calibration: Calibration;
  plan?: DiscoveryPlan;
  maxAttempts: number;
  /** Wait after every tap or key press. */
  settleMs: number;
  logger?: Logger;
}

type Outcome = "done" | "failed" | "aborted";

type EnterTask = Extract<DiscoveryTask, { kind: "enter" }>;

/**
 * Walks a discovery plan against one device, settling every control either
 * with a verified value or as absent. Tasks run strictly one after another.
 */
export class DiscoveryStateMachine {
  private readonly plan: DiscoveryPlan;
  private readonly log: Logger;

  constructor(private readonly options: DiscoveryStateMachineOptions) {
    this.plan = options.plan ?? DEFAULT_PLAN;
    validatePlan(this.plan, options.calibration);
    this.log = options.logger ?? createLogger("discovery");
  }

  /**
   * Runs the plan from the session's current task. Returns the session once
   * it is complete or, when `signal` aborts, with the values committed so
   * far. A lost device marks the session aborted and rethrows.
   */
  async run(session: DiscoverySession, signal?: AbortSignal): Promise<DiscoverySession> {
    session.state = "running";
    this.log.info(`${session.deviceId}: mapping ${session.profile.brand} ${session.profile.model}`);

    try {
      while (session.taskIndex < this.plan.length) {
        if (signal?.aborted) break;
        const task = this.plan[session.taskIndex];
        const outcome = await this.runTask(session, task, signal);
        if (outcome === "aborted") break;
      }
    } catch (error) {
      session.state = "aborted";
      throw error;
    }

    if (session.taskIndex < this.plan.length) {
      session.state = "aborted";
      this.log.warn(`${session.deviceId}: aborted at task ${session.taskIndex}`);
    } else {
      session.state = "complete";
      this.log.info(
        `${session.deviceId}: done, ${session.failures.size} control(s) absent`,
      );
    }
    return session;
  }

  private async runTask(
    session: DiscoverySession,
    task: DiscoveryTask,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    switch (task.kind) {
      case "enter": {
        const outcome = await this.enter(session, task, signal);
        if (outcome === "done") {
          session.contexts.push(task.context);
          session.taskIndex++;
        } else if (outcome === "failed") {
          this.skipContext(session, task);
        }
        return outcome;
      }
      case "exit":
        await this.exit(session, task.action, signal);
        session.contexts.pop();
        session.taskIndex++;
        return signal?.aborted ? "aborted" : "done";
      case "resolve":
      case "anchored": {
        const outcome = await this.settleControl(session, task.control, signal);
        if (outcome !== "aborted") session.taskIndex++;
        return outcome;
      }
    }
  }

  private async enter(
    session: DiscoverySession,
    task: EnterTask,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const gate = session.get(task.via);
    if (!gate || !isCoordinate(gate)) {
      this.log.info(`${session.deviceId}: ${task.via} is absent, skipping ${task.context}`);
      return "failed";
    }

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      if (signal?.aborted) return "aborted";
      if (attempt > 1) {
        await delay(this.options.settleMs, signal);
        if (signal?.aborted) return "aborted";
      }
      const changed = await this.attempt(session, `enter ${task.context}`, () =>
        this.tapChanges(gate, signal),
      );
      if (signal?.aborted) return "aborted";
      if (changed) {
        this.log.debug(`${session.deviceId}: entered ${task.context}`);
        return "done";
      }
      this.log.debug(
        `${session.deviceId}: ${task.context} not reached (attempt ${attempt}/${this.options.maxAttempts})`,
      );
    }
    return "failed";
  }

  /**
   * Records every control inside a context that could not be entered as
   * absent, then moves past its exit task. Nested contexts go with it.
   */
  private skipContext(session: DiscoverySession, task: EnterTask): void {
    const gate = session.get(task.via);
    const reason = !gate ? "gate-absent" : "verification-timeout";
    const start = session.taskIndex;
    const end = this.plan.findIndex(
      (t, i) => i > start && t.kind === "exit" && t.context === task.context,
    );
    const last = end === -1 ? this.plan.length : end;

    for (const inner of this.plan.slice(start + 1, last)) {
      if (inner.kind === "resolve" || inner.kind === "anchored") {
        session.recordAbsent(inner.control, `${reason}: ${task.context}`);
      }
    }
    this.log.warn(`${session.deviceId}: could not enter ${task.context} (${reason})`);
    session.taskIndex = last + 1;
  }

  private async exit(
    session: DiscoverySession,
    action: ExitAction,
    signal?: AbortSignal,
  ): Promise<void> {
    const { device } = this.options;
    const target = action.kind === "tap" ? session.get(action.control) : undefined;

    await this.attempt(session, "exit", async () => {
      if (target && isCoordinate(target)) {
        await device.tap(target[0], target[1]);
      } else {
        await device.pressBack();
      }
      return true;
    });
    await delay(this.options.settleMs, signal);
  }

  private async settleControl(
    session: DiscoverySession,
    control: ControlName,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const { device, resolver, calibration, maxAttempts, settleMs } = this.options;
    const { probe } = calibrationFor(calibration, control);
    let lastFailure = "no attempt completed";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) return "aborted";
      if (attempt > 1) {
        await delay(settleMs, signal);
        if (signal?.aborted) return "aborted";
      }

      const settled = await this.attempt(session, control, async () => {
        const frame = await device.screenshot();
        const result = await resolver.resolve(control, frame, session);
        if (!result.ok) {
          lastFailure = `${result.reason}: ${result.detail}`;
          return false;
        }

        if (probe && isCoordinate(result.value)) {
          const after = await this.tapAndCapture(result.value, signal);
          if (!this.options.comparator.differs(frame, after)) {
            lastFailure = `verification-timeout: tap at (${result.value[0]}, ${result.value[1]}) changed nothing`;
            return false;
          }
          await this.restore(probe.restore, result.value, signal);
        }

        session.commit(control, result.value);
        this.log.debug(
          `${session.deviceId}: ${control} = ${JSON.stringify(result.value)} (${result.strategy})`,
        );
        return true;
      }, (error) => {
        lastFailure = error.message;
      });

      if (settled) return "done";
      if (signal?.aborted) return "aborted";
      this.log.debug(
        `${session.deviceId}: ${control} attempt ${attempt}/${maxAttempts} failed: ${lastFailure}`,
      );
    }

    session.recordAbsent(control, lastFailure);
    this.log.info(`${session.deviceId}: ${control} absent (${lastFailure})`);
    return "failed";
  }

  /** Captures, taps, settles and reports whether the screen changed. */
  private async tapChanges(point: Coordinate, signal?: AbortSignal): Promise<boolean> {
    const before = await this.options.device.screenshot();
    const after = await this.tapAndCapture(point, signal);
    return this.options.comparator.differs(before, after);
  }

  private async tapAndCapture(point: Coordinate, signal?: AbortSignal): Promise<Frame> {
    const { device, settleMs } = this.options;
    await device.tap(point[0], point[1]);
    await delay(settleMs, signal);
    return device.screenshot();
  }

  private async restore(
    action: "tap" | "back" | "none",
    point: Coordinate,
    signal?: AbortSignal,
  ): Promise<void> {
    const { device, settleMs } = this.options;
    if (action === "none") return;
    if (action === "tap") {
      await device.tap(point[0], point[1]);
    } else {
      await device.pressBack();
    }
    await delay(settleMs, signal);
  }

  /**
   * One attempt. A lost device ends the run; any other error, a timeout or
   * an OCR failure included, fails this attempt only.
   */
  private async attempt(
    session: DiscoverySession,
    label: string,
    fn: () => Promise<boolean>,
    onError?: (error: Error) => void,
  ): Promise<boolean> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DeviceUnreachableError) {
        this.log.error(`${session.deviceId}: ${error.message}`);
        throw error;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.warn(`${session.deviceId}: ${label}: ${err.message}`);
      onError?.(err);
      return false;
    }
  }
}

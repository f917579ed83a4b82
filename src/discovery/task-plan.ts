import { PlanValidationError } from "../errors.js";
import {
  calibrationFor,
  strategyDependencies,
  type Calibration,
} from "./calibration.js";
import { CONTROL_NAMES, type ContextId, type ControlName } from "./controls.js";

/** How a context is left once its controls are settled. */
export type ExitAction =
  | { kind: "back" }
  /** Tap a control settled earlier; falls back to back when it is absent. */
  | { kind: "tap"; control: ControlName };

export type DiscoveryTask =
  | { kind: "enter"; context: ContextId; via: ControlName }
  | { kind: "exit"; context: ContextId; action: ExitAction }
  | { kind: "resolve"; control: ControlName; context: ContextId }
  | {
      kind: "anchored";
      control: ControlName;
      context: ContextId;
      anchors: readonly ControlName[];
    };

export type DiscoveryPlan = readonly DiscoveryTask[];

const resolve = (control: ControlName, context: ContextId): DiscoveryTask => ({
  kind: "resolve",
  control,
  context,
});

const anchored = (
  control: ControlName,
  context: ContextId,
  ...anchors: ControlName[]
): DiscoveryTask => ({ kind: "anchored", control, context, anchors });

export const DEFAULT_PLAN: DiscoveryPlan = [
  resolve("CAM", "home"),
  resolve("TAKE_PICTURE", "home"),
  resolve("TOUCH", "home"),
  resolve("ZOOM_1", "home"),
  anchored("ZOOM_0_5", "home", "ZOOM_1"),
  anchored("ZOOM_2", "home", "ZOOM_1"),
  anchored("ZOOM_5", "home", "ZOOM_1"),
  resolve("QUICK_CONTROLS", "home"),
  resolve("PHOTO_MODE", "home"),
  resolve("PORTRAIT_MODE", "home"),

  { kind: "enter", context: "quick_controls", via: "QUICK_CONTROLS" },
  resolve("FLASH_MENU", "quick_controls"),
  resolve("ASPECT_RATIO_MENU", "quick_controls"),

  { kind: "enter", context: "flash_menu", via: "FLASH_MENU" },
  resolve("FLASH_OFF", "flash_menu"),
  resolve("FLASH_AUTO", "flash_menu"),
  resolve("FLASH_ON", "flash_menu"),
  { kind: "exit", context: "flash_menu", action: { kind: "back" } },

  { kind: "enter", context: "aspect_ratio_menu", via: "ASPECT_RATIO_MENU" },
  resolve("ASPECT_RATIO_3_4", "aspect_ratio_menu"),
  resolve("ASPECT_RATIO_9_16", "aspect_ratio_menu"),
  resolve("ASPECT_RATIO_1_1", "aspect_ratio_menu"),
  resolve("ASPECT_RATIO_FULL", "aspect_ratio_menu"),
  { kind: "exit", context: "aspect_ratio_menu", action: { kind: "back" } },
  { kind: "exit", context: "quick_controls", action: { kind: "back" } },

  { kind: "enter", context: "portrait", via: "PORTRAIT_MODE" },
  resolve("BLUR_MENU", "portrait"),

  { kind: "enter", context: "blur", via: "BLUR_MENU" },
  resolve("BLUR_BAR_MIDDLE", "blur"),
  anchored("BLUR_BAR_BEFORE", "blur", "BLUR_BAR_MIDDLE"),
  anchored("BLUR_BAR_NEXT", "blur", "BLUR_BAR_MIDDLE"),
  anchored("BLUR_BAR_STEP", "blur", "BLUR_BAR_MIDDLE", "BLUR_BAR_NEXT"),
  { kind: "exit", context: "blur", action: { kind: "back" } },
  { kind: "exit", context: "portrait", action: { kind: "tap", control: "PHOTO_MODE" } },
];

export const ROOT_CONTEXT: ContextId = "home";

/**
 * Checks that a plan can be walked front to back exactly once:
 * - contexts nest properly and none is entered twice
 * - every task runs in the context it declares
 * - every control is settled by exactly one task, and all are covered
 * - gates, exit taps and anchors are settled before they are used
 * - controls are settled in vocabulary order
 * - with a calibration, every control a strategy reads is settled earlier
 *   and anchor-reading strategies appear only on anchored tasks that
 *   declare those anchors
 */
export function validatePlan(plan: DiscoveryPlan, calibration?: Calibration): void {
  const stack: ContextId[] = [ROOT_CONTEXT];
  const entered = new Set<ContextId>([ROOT_CONTEXT]);
  const settled = new Set<ControlName>();
  const order: ControlName[] = [];
  const fail = (index: number, message: string): never => {
    throw new PlanValidationError(`Task ${index}: ${message}`);
  };

  plan.forEach((task, index) => {
    const current = stack[stack.length - 1];

    switch (task.kind) {
      case "enter":
        if (entered.has(task.context)) {
          fail(index, `context ${task.context} is entered twice`);
        }
        if (!settled.has(task.via)) {
          fail(index, `gate ${task.via} of ${task.context} is not settled yet`);
        }
        entered.add(task.context);
        stack.push(task.context);
        break;

      case "exit":
        if (task.context !== current || stack.length === 1) {
          fail(index, `exit from ${task.context} while in ${current}`);
        }
        if (task.action.kind === "tap" && !settled.has(task.action.control)) {
          fail(index, `exit tap ${task.action.control} is not settled yet`);
        }
        stack.pop();
        break;

      case "resolve":
      case "anchored": {
        if (task.context !== current) {
          fail(index, `${task.control} declared in ${task.context} but runs in ${current}`);
        }
        if (settled.has(task.control)) {
          fail(index, `${task.control} is settled twice`);
        }
        const declared: readonly ControlName[] = task.kind === "anchored" ? task.anchors : [];
        for (const anchor of declared) {
          if (!settled.has(anchor)) {
            fail(index, `anchor ${anchor} of ${task.control} is not settled yet`);
          }
        }
        if (calibration) {
          for (const strategy of calibrationFor(calibration, task.control).strategies) {
            for (const dependency of strategyDependencies(strategy)) {
              if (!declared.includes(dependency)) {
                fail(
                  index,
                  `${task.control} reads ${dependency} but does not declare it as an anchor`,
                );
              }
            }
          }
        }
        settled.add(task.control);
        order.push(task.control);
        break;
      }
    }
  });

  if (stack.length !== 1) {
    throw new PlanValidationError(`Context ${stack[stack.length - 1]} is never exited`);
  }

  const missing = CONTROL_NAMES.filter((name) => !settled.has(name));
  if (missing.length > 0) {
    throw new PlanValidationError(`Plan does not cover: ${missing.join(", ")}`);
  }

  // Output fields follow the vocabulary, so discovery must too
  const outOfOrder = order.findIndex((name, i) => name !== CONTROL_NAMES[i]);
  if (outOfOrder !== -1) {
    throw new PlanValidationError(
      `${order[outOfOrder]} is settled where ${CONTROL_NAMES[outOfOrder]} is declared`,
    );
  }
}

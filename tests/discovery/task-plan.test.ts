import {
  parseCalibrationFile,
  readCalibrationFile,
  resolveCalibration,
} from "../../src/discovery/calibration.js";
import { CONTROL_NAMES } from "../../src/discovery/controls.js";
import {
  DEFAULT_PLAN,
  validatePlan,
  type DiscoveryPlan,
  type DiscoveryTask,
} from "../../src/discovery/task-plan.js";
import { PlanValidationError } from "../../src/errors.js";

const calibration = resolveCalibration(readCalibrationFile(), "1.0.0");

function replaceTask(index: number, task: DiscoveryTask): DiscoveryPlan {
  return DEFAULT_PLAN.map((t, i) => (i === index ? task : t));
}

function indexOf(predicate: (task: DiscoveryTask) => boolean): number {
  const index = DEFAULT_PLAN.findIndex(predicate);
  if (index === -1) throw new Error("task not found");
  return index;
}

describe("validatePlan", () => {
  it("accepts the default plan with the bundled calibration", () => {
    expect(() => validatePlan(DEFAULT_PLAN, calibration)).not.toThrow();
  });

  it("covers every control exactly once", () => {
    const controls = DEFAULT_PLAN.flatMap((t) =>
      t.kind === "resolve" || t.kind === "anchored" ? [t.control] : [],
    );
    expect(controls).toEqual([...CONTROL_NAMES]);
  });

  it("rejects a missing control", () => {
    const plan = DEFAULT_PLAN.filter(
      (t) => !(t.kind === "resolve" && t.control === "TOUCH"),
    );
    expect(() => validatePlan(plan)).toThrow("Plan does not cover: TOUCH");
  });

  it("rejects a control settled twice", () => {
    const plan = [...DEFAULT_PLAN.slice(0, 2), DEFAULT_PLAN[1], ...DEFAULT_PLAN.slice(2)];
    expect(() => validatePlan(plan)).toThrow("Task 2: TAKE_PICTURE is settled twice");
  });

  it("rejects an anchor that is not settled yet", () => {
    const zoomOne = indexOf((t) => t.kind === "resolve" && t.control === "ZOOM_1");
    const plan: DiscoveryPlan = [
      ...DEFAULT_PLAN.slice(0, zoomOne),
      { kind: "anchored", control: "ZOOM_0_5", context: "home", anchors: ["ZOOM_1"] },
      ...DEFAULT_PLAN.slice(zoomOne),
    ];
    expect(() => validatePlan(plan)).toThrow(
      `Task ${zoomOne}: anchor ZOOM_1 of ZOOM_0_5 is not settled yet`,
    );
  });

  it("rejects an offset strategy on a task that does not declare its anchor", () => {
    const index = indexOf((t) => t.kind === "anchored" && t.control === "ZOOM_2");
    const plan = replaceTask(index, { kind: "resolve", control: "ZOOM_2", context: "home" });

    expect(() => validatePlan(plan)).not.toThrow();
    expect(() => validatePlan(plan, calibration)).toThrow(
      `Task ${index}: ZOOM_2 reads ZOOM_1 but does not declare it as an anchor`,
    );
  });

  it("rejects a task outside its declared context", () => {
    const index = indexOf((t) => t.kind === "resolve" && t.control === "FLASH_OFF");
    const plan = replaceTask(index, { kind: "resolve", control: "FLASH_OFF", context: "home" });

    expect(() => validatePlan(plan)).toThrow(
      `Task ${index}: FLASH_OFF declared in home but runs in flash_menu`,
    );
  });

  it("rejects entering through a gate that is not settled yet", () => {
    const plan: DiscoveryPlan = [
      { kind: "enter", context: "quick_controls", via: "QUICK_CONTROLS" },
      ...DEFAULT_PLAN,
    ];
    expect(() => validatePlan(plan)).toThrow(
      "Task 0: gate QUICK_CONTROLS of quick_controls is not settled yet",
    );
  });

  it("rejects an unbalanced exit", () => {
    const plan: DiscoveryPlan = [
      ...DEFAULT_PLAN,
      { kind: "exit", context: "home", action: { kind: "back" } },
    ];
    expect(() => validatePlan(plan)).toThrow(
      `Task ${DEFAULT_PLAN.length}: exit from home while in home`,
    );
  });

  it("rejects a context that is never exited", () => {
    const plan = DEFAULT_PLAN.slice(0, -1);
    expect(() => validatePlan(plan)).toThrow("Context portrait is never exited");
  });

  it("rejects entering a context twice", () => {
    const exitFlash = indexOf((t) => t.kind === "exit" && t.context === "flash_menu");
    const plan: DiscoveryPlan = [
      ...DEFAULT_PLAN.slice(0, exitFlash + 1),
      { kind: "enter", context: "flash_menu", via: "FLASH_MENU" },
      { kind: "exit", context: "flash_menu", action: { kind: "back" } },
      ...DEFAULT_PLAN.slice(exitFlash + 1),
    ];
    expect(() => validatePlan(plan)).toThrow(
      `Task ${exitFlash + 1}: context flash_menu is entered twice`,
    );
  });

  it("rejects controls settled out of vocabulary order", () => {
    const plan: DiscoveryPlan = [
      DEFAULT_PLAN[1],
      DEFAULT_PLAN[0],
      ...DEFAULT_PLAN.slice(2),
    ];
    expect(() => validatePlan(plan)).toThrow(PlanValidationError);
    expect(() => validatePlan(plan)).toThrow("TAKE_PICTURE is settled where CAM is declared");
  });

  it("checks calibration dependencies of every strategy, not just the first", () => {
    const withFallback = resolveCalibration(
      parseCalibrationFile({
        controls: Object.fromEntries(
          CONTROL_NAMES.map((name) => [
            name,
            {
              strategies:
                name === "PHOTO_MODE"
                  ? [
                      { kind: "text", labels: ["Photo"] },
                      { kind: "offset", anchor: "PORTRAIT_MODE", dx: -100 },
                    ]
                  : [{ kind: "ratio", x: 0.5, y: 0.5 }],
            },
          ]),
        ),
      }),
      "1.0.0",
    );

    expect(() => validatePlan(DEFAULT_PLAN, withFallback)).toThrow(
      /PHOTO_MODE reads PORTRAIT_MODE but does not declare it as an anchor/,
    );
  });
});

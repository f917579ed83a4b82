import type { UiHierarchySource } from "../device/adapter.js";
import { TextRecognitionError, UiHierarchyUnavailableError } from "../errors.js";
import type { Box, Frame, ScreenSize, UiElement } from "../types.js";
import {
  calibrationFor,
  type Calibration,
  type ElementStrategy,
  type Strategy,
  type StrategyKind,
  type TextStrategy,
} from "./calibration.js";
import {
  isCoordinate,
  type ControlName,
  type ControlValue,
  type Coordinate,
} from "./controls.js";
import type { TextLocator, TextSpan } from "./text-locator.js";

export type ResolutionFailureReason =
  | "no-match"
  | "ambiguous"
  | "anchor-absent"
  | "out-of-bounds"
  | "ocr-error"
  | "unavailable";

export type Resolution =
  | {
      ok: true;
      value: Exclude<ControlValue, null>;
      strategy: StrategyKind;
    }
  | {
      ok: false;
      reason: ResolutionFailureReason;
      detail: string;
    };

/** Read access to controls settled earlier in the session. */
export interface SettledControls {
  get(name: ControlName): ControlValue | undefined;
}

export interface ControlResolverOptions {
  calibration: Calibration;
  locator: TextLocator;
  hierarchy: UiHierarchySource;
  screen: ScreenSize;
  minTextConfidence: number;
}

/**
 * Produces a candidate value for a control from its calibrated strategies,
 * in order; the first one that succeeds wins.
 */
export class ControlResolver {
  constructor(private readonly options: ControlResolverOptions) {}

  async resolve(
    control: ControlName,
    frame: Frame,
    settled: SettledControls,
  ): Promise<Resolution> {
    const { strategies } = calibrationFor(this.options.calibration, control);
    const failures: string[] = [];
    let last: Resolution | undefined;

    for (const strategy of strategies) {
      const result = await this.apply(strategy, frame, settled);
      if (result.ok) return result;
      failures.push(`${strategy.kind}: ${result.detail}`);
      last = result;
    }

    return {
      ok: false,
      reason: last && !last.ok ? last.reason : "no-match",
      detail: failures.join("; "),
    };
  }

  private async apply(
    strategy: Strategy,
    frame: Frame,
    settled: SettledControls,
  ): Promise<Resolution> {
    switch (strategy.kind) {
      case "ratio":
        return {
          ok: true,
          value: ratioPoint(strategy.x, strategy.y, this.options.screen),
          strategy: "ratio",
        };
      case "text":
        return this.byText(strategy, frame);
      case "element":
        return this.byElement(strategy);
      case "offset": {
        const anchor = settled.get(strategy.anchor);
        if (!anchor || !isCoordinate(anchor)) {
          return {
            ok: false,
            reason: "anchor-absent",
            detail: `anchor ${strategy.anchor} is absent`,
          };
        }
        const { width, height } = this.options.screen;
        const x = anchor[0] + strategy.dx + Math.round(strategy.dxRatio * width);
        const y = anchor[1] + strategy.dy + Math.round(strategy.dyRatio * height);
        if (!inBounds(x, y, this.options.screen)) {
          return {
            ok: false,
            reason: "out-of-bounds",
            detail: `(${x}, ${y}) is outside ${width}x${height}`,
          };
        }
        return { ok: true, value: [x, y], strategy: "offset" };
      }
      case "distance": {
        const from = settled.get(strategy.from);
        const to = settled.get(strategy.to);
        if (!from || !to || !isCoordinate(from) || !isCoordinate(to)) {
          return {
            ok: false,
            reason: "anchor-absent",
            detail: `${strategy.from} or ${strategy.to} is absent`,
          };
        }
        const distance = Math.abs(to[0] - from[0]) + Math.abs(to[1] - from[1]);
        return { ok: true, value: [distance], strategy: "distance" };
      }
    }
  }

  private async byText(strategy: TextStrategy, frame: Frame): Promise<Resolution> {
    const region = strategy.region
      ? scaleRegion(strategy.region, frame)
      : undefined;
    let spans: TextSpan[];
    try {
      spans = await this.options.locator.locate(frame, region);
    } catch (error) {
      if (error instanceof TextRecognitionError) {
        return { ok: false, reason: "ocr-error", detail: error.message };
      }
      throw error;
    }

    const labels = new Set(strategy.labels.map(normalizeLabel));
    const minConfidence = strategy.minConfidence ?? this.options.minTextConfidence;
    const matches = spans.filter((span) => labels.has(normalizeLabel(span.text)));
    const confident = distinctElements(
      matches.filter((span) => span.confidence >= minConfidence),
    );

    if (confident.length === 0) {
      return {
        ok: false,
        reason: "no-match",
        detail:
          matches.length > 0
            ? `"${strategy.labels.join('", "')}" found below confidence ${minConfidence}`
            : `"${strategy.labels.join('", "')}" not found`,
      };
    }
    if (confident.length > 1) {
      return {
        ok: false,
        reason: "ambiguous",
        detail: `${confident.length} matches: ${confident
          .map((s) => `"${s.text}"@${s.box.x},${s.box.y}`)
          .join(" ")}`,
      };
    }

    const center = boxCenter(confident[0].box);
    if (!inBounds(center[0], center[1], this.options.screen)) {
      return {
        ok: false,
        reason: "out-of-bounds",
        detail: `label centre (${center[0]}, ${center[1]}) is off screen`,
      };
    }
    return { ok: true, value: center, strategy: "text" };
  }

  /**
   * Looks the control up in the UI hierarchy. Names are tried in order and
   * the first one found decides; it must name a single node.
   */
  private async byElement(strategy: ElementStrategy): Promise<Resolution> {
    let elements: UiElement[];
    try {
      elements = await this.options.hierarchy.uiElements();
    } catch (error) {
      if (error instanceof UiHierarchyUnavailableError) {
        return { ok: false, reason: "unavailable", detail: error.message };
      }
      throw error;
    }

    const named = namedClickables(elements);
    for (const name of strategy.names) {
      const pattern = elementKey(name);
      const found = named.filter((el) => el.key.includes(pattern));
      if (found.length === 0) continue;
      if (found.length > 1) {
        return {
          ok: false,
          reason: "ambiguous",
          detail: `${found.length} elements match "${name}": ${found
            .map((el) => `"${el.key}"@${el.bounds.x},${el.bounds.y}`)
            .join(" ")}`,
        };
      }

      const center = boxCenter(found[0].bounds);
      if (!inBounds(center[0], center[1], this.options.screen)) {
        return {
          ok: false,
          reason: "out-of-bounds",
          detail: `element centre (${center[0]}, ${center[1]}) is off screen`,
        };
      }
      return { ok: true, value: center, strategy: "element" };
    }

    return {
      ok: false,
      reason: "no-match",
      detail: `no clickable element named "${strategy.names.join('", "')}"`,
    };
  }
}

// Navigation and side features that share words with camera controls
const IGNORED_ELEMENT_WORDS = [
  "back",
  "overview",
  "home",
  "night",
  "timer",
  "settings",
  "config",
  "filter",
  "google",
  "lens",
  "gallery",
];

/** Trimmed, lower-cased, spaces replaced by underscores. */
export function elementKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

export interface NamedElement {
  key: string;
  bounds: Box;
}

/**
 * Clickable nodes keyed by the longer of their text and content description.
 * Unnamed nodes and ignored words are dropped; nodes sharing bounds count
 * once.
 */
export function namedClickables(elements: UiElement[]): NamedElement[] {
  const result: NamedElement[] = [];
  for (const el of elements) {
    if (!el.clickable) continue;
    const key = elementKey(
      el.text.length > el.contentDesc.length ? el.text : el.contentDesc,
    );
    if (!key || IGNORED_ELEMENT_WORDS.some((word) => key.includes(word))) continue;
    if (result.some((other) => sameBox(other.bounds, el.bounds))) continue;
    result.push({ key, bounds: el.bounds });
  }
  return result;
}

function sameBox(a: Box, b: Box): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/** Trimmed, lower-cased, inner whitespace collapsed. */
export function normalizeLabel(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

export function boxCenter(box: Box): Coordinate {
  return [
    Math.floor(box.x + box.width / 2),
    Math.floor(box.y + box.height / 2),
  ];
}

/** Proportional position scaled to the screen, clamped inside it. */
export function ratioPoint(rx: number, ry: number, screen: ScreenSize): Coordinate {
  return [
    clamp(Math.floor(rx * screen.width), 0, screen.width - 1),
    clamp(Math.floor(ry * screen.height), 0, screen.height - 1),
  ];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function inBounds(x: number, y: number, screen: ScreenSize): boolean {
  return x >= 0 && y >= 0 && x < screen.width && y < screen.height;
}

function scaleRegion(region: Box, frame: Frame): Box {
  return {
    x: Math.floor(region.x * frame.width),
    y: Math.floor(region.y * frame.height),
    width: Math.ceil(region.width * frame.width),
    height: Math.ceil(region.height * frame.height),
  };
}

/**
 * Drops spans whose centre lies inside another match's box: a line span and
 * one of its own words name the same element. The outer box is kept.
 */
function distinctElements(spans: TextSpan[]): TextSpan[] {
  return spans.filter((span, i) => {
    const [cx, cy] = boxCenter(span.box);
    return !spans.some(
      (other, j) =>
        j !== i &&
        contains(other.box, cx, cy) &&
        area(other.box) > area(span.box),
    );
  });
}

function contains(box: Box, x: number, y: number): boolean {
  return x >= box.x && x < box.x + box.width && y >= box.y && y < box.y + box.height;
}

function area(box: Box): number {
  return box.width * box.height;
}

/**
 * The control vocabulary. Declaration order is discovery order, and the
 * output map lists controls in this order.
 */
export const CONTROL_NAMES = [
  // home screen
  "CAM",
  "TAKE_PICTURE",
  "TOUCH",
  "ZOOM_1",
  "ZOOM_0_5",
  "ZOOM_2",
  "ZOOM_5",
  "QUICK_CONTROLS",
  "PHOTO_MODE",
  "PORTRAIT_MODE",
  // quick controls panel
  "FLASH_MENU",
  "ASPECT_RATIO_MENU",
  "FLASH_OFF",
  "FLASH_AUTO",
  "FLASH_ON",
  "ASPECT_RATIO_3_4",
  "ASPECT_RATIO_9_16",
  "ASPECT_RATIO_1_1",
  "ASPECT_RATIO_FULL",
  // portrait mode
  "BLUR_MENU",
  "BLUR_BAR_MIDDLE",
  "BLUR_BAR_BEFORE",
  "BLUR_BAR_NEXT",
  "BLUR_BAR_STEP",
] as const;

export type ControlName = (typeof CONTROL_NAMES)[number];

/** `[x, y]` in device pixels. */
export type Coordinate = readonly [x: number, y: number];

/** `[value]`, for step quantities such as a drag distance. */
export type Scalar = readonly [value: number];

/** Settled value of a control; null means absent. */
export type ControlValue = Coordinate | Scalar | null;

export function isCoordinate(value: ControlValue): value is Coordinate {
  return value !== null && value.length === 2;
}

export const CONTEXT_IDS = [
  "home",
  "quick_controls",
  "flash_menu",
  "aspect_ratio_menu",
  "portrait",
  "blur",
] as const;

export type ContextId = (typeof CONTEXT_IDS)[number];

import type { Frame } from "../types.js";

const WINDOW = 8;
// Standard SSIM stabilizers for 8-bit data: (0.01 * 255)^2, (0.03 * 255)^2
const C1 = 6.5025;
const C2 = 58.5225;

export interface FrameComparatorOptions {
  /** Similarity below this value means the frames differ. */
  threshold: number;
  /** Width frames are reduced to before comparison. */
  analysisWidth: number;
  /** Share of the height, from the top, left out (status bar). */
  ignoreTopRatio: number;
}

/** Luma plane after reduction. */
export interface GrayImage {
  data: Float64Array;
  width: number;
  height: number;
}

/**
 * Decides whether two frames show the same UI. Uses mean SSIM over
 * non-overlapping windows of the reduced luma image, so small rendering
 * noise (clock, compression) stays above the threshold.
 */
export class FrameComparator {
  constructor(private readonly options: FrameComparatorOptions) {}

  differs(before: Frame, after: Frame): boolean {
    return this.similarity(before, after) < this.options.threshold;
  }

  similarity(a: Frame, b: Frame): number {
    if (a === b || a.pixels.equals(b.pixels)) return 1;

    // Both frames reduce to the same grid, taken from the smaller one
    const width = Math.min(this.options.analysisWidth, a.width, b.width);
    const aspect = Math.min(a.height / a.width, b.height / b.width);
    const height = Math.max(1, Math.round(width * aspect));

    const grayA = reduceToLuma(a, width, height, this.options.ignoreTopRatio);
    const grayB = reduceToLuma(b, width, height, this.options.ignoreTopRatio);
    return structuralSimilarity(grayA, grayB);
  }
}

/**
 * Box-averages the frame's luma into a `width` x `height` grid, leaving out
 * the top `ignoreTopRatio` of the source rows.
 */
export function reduceToLuma(
  frame: Frame,
  width: number,
  height: number,
  ignoreTopRatio = 0,
): GrayImage {
  const top = Math.floor(frame.height * ignoreTopRatio);
  const srcHeight = frame.height - top;
  const outHeight = Math.max(1, Math.round(height * (1 - ignoreTopRatio)));
  const data = new Float64Array(width * outHeight);
  const { pixels, channels } = frame;

  for (let oy = 0; oy < outHeight; oy++) {
    const y0 = top + Math.floor((oy * srcHeight) / outHeight);
    const y1 = Math.max(y0 + 1, top + Math.floor(((oy + 1) * srcHeight) / outHeight));
    for (let ox = 0; ox < width; ox++) {
      const x0 = Math.floor((ox * frame.width) / width);
      const x1 = Math.max(x0 + 1, Math.floor(((ox + 1) * frame.width) / width));
      let sum = 0;
      for (let y = y0; y < y1; y++) {
        let offset = (y * frame.width + x0) * channels;
        for (let x = x0; x < x1; x++) {
          sum += channels >= 3
            ? 0.299 * pixels[offset] + 0.587 * pixels[offset + 1] + 0.114 * pixels[offset + 2]
            : pixels[offset];
          offset += channels;
        }
      }
      data[oy * width + ox] = sum / ((y1 - y0) * (x1 - x0));
    }
  }

  return { data, width, height: outHeight };
}

/**
 * Mean SSIM over non-overlapping windows. Symmetric in its arguments;
 * identical images score exactly 1.
 */
export function structuralSimilarity(a: GrayImage, b: GrayImage): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(
      `Cannot compare ${a.width}x${a.height} with ${b.width}x${b.height}`,
    );
  }

  const win = Math.min(WINDOW, a.width, a.height);
  let total = 0;
  let windows = 0;

  for (let wy = 0; wy + win <= a.height; wy += win) {
    for (let wx = 0; wx + win <= a.width; wx += win) {
      total += windowSsim(a, b, wx, wy, win);
      windows++;
    }
  }

  return windows === 0 ? 1 : total / windows;
}

function windowSsim(
  a: GrayImage,
  b: GrayImage,
  wx: number,
  wy: number,
  win: number,
): number {
  const n = win * win;
  let sumA = 0;
  let sumB = 0;
  for (let y = wy; y < wy + win; y++) {
    for (let x = wx; x < wx + win; x++) {
      sumA += a.data[y * a.width + x];
      sumB += b.data[y * b.width + x];
    }
  }
  const meanA = sumA / n;
  const meanB = sumB / n;

  let varA = 0;
  let varB = 0;
  let cov = 0;
  for (let y = wy; y < wy + win; y++) {
    for (let x = wx; x < wx + win; x++) {
      const da = a.data[y * a.width + x] - meanA;
      const db = b.data[y * b.width + x] - meanB;
      varA += da * da;
      varB += db * db;
      cov += da * db;
    }
  }
  const dof = Math.max(1, n - 1);
  varA /= dof;
  varB /= dof;
  cov /= dof;

  const numerator = (2 * (meanA * meanB) + C1) * (2 * cov + C2);
  const denominator = (meanA * meanA + meanB * meanB + C1) * (varA + varB + C2);
  return numerator / denominator;
}

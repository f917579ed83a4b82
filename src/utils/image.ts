import sharp from "sharp";
import type { Box, Frame } from "../types.js";

/**
 * Decodes a PNG screencap into an RGB frame. Alpha is dropped so every
 * frame has three channels.
 */
export async function decodeScreenshot(
  input: Buffer,
  capturedAt: number = Date.now(),
): Promise<Frame> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    pixels: data,
    width: info.width,
    height: info.height,
    channels: info.channels,
    capturedAt,
  };
}

/**
 * Clips `region` to the frame. Returns undefined when nothing is left.
 */
export function clipRegion(frame: Frame, region: Box): Box | undefined {
  const left = Math.max(0, Math.floor(region.x));
  const top = Math.max(0, Math.floor(region.y));
  const right = Math.min(frame.width, Math.floor(region.x + region.width));
  const bottom = Math.min(frame.height, Math.floor(region.y + region.height));

  if (right <= left || bottom <= top) return undefined;
  return { x: left, y: top, width: right - left, height: bottom - top };
}

/**
 * Encodes a frame (or a clipped region of it) back to PNG, as OCR tools
 * read image files rather than raw buffers.
 */
export async function encodeFramePng(frame: Frame, region?: Box): Promise<Buffer> {
  let image = sharp(frame.pixels, {
    raw: {
      width: frame.width,
      height: frame.height,
      channels: frame.channels === 1 || frame.channels === 4 ? frame.channels : 3,
    },
  });

  if (region) {
    image = image.extract({
      left: region.x,
      top: region.y,
      width: region.width,
      height: region.height,
    });
  }

  return image.png().toBuffer();
}

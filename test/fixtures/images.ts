import sharp from "sharp";

import { RgbRaster } from "../../types/rgbRaster";

export const width = 4;
export const height = 2;

//4x2, one distinct colour per pixel
export const rgbPixels = [
  255, 0, 0, 0, 255, 0, 0, 0, 255, 10, 20, 30,
  200, 100, 50, 1, 2, 3, 128, 128, 128, 0, 0, 0,
];

export const greyPixels = [0, 36, 72, 108, 144, 180, 216, 255];

export function createRaster(pixels = rgbPixels): RgbRaster {
  return { width, height, data: Uint8Array.from(pixels) };
}

export function createPng(
  pixels: number[],
  channels: 1 | 2 | 3 | 4,
  size = { width, height }
) {
  return sharp(Buffer.from(pixels), {
    raw: { width: size.width, height: size.height, channels },
  })
    .png()
    .toBuffer();
}

/**
 * Same pixels as `createPng`, stored with 16 bits per sample.
 */
export function create16BitPng(pixels: number[], channels: 3 | 4) {
  return sharp(Buffer.from(pixels), { raw: { width, height, channels } })
    .toColourspace("rgb16")
    .png()
    .toBuffer();
}

/**
 * Reads one channel out of interleaved RGB samples.
 */
export function channelValues(data: Uint8Array, offset: number) {
  const values: number[] = [];

  for (let i = offset; i < data.length; i += 3) {
    values.push(data[i]);
  }

  return values;
}

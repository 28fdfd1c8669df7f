import sharp from "sharp";

import { RgbRaster } from "../types/rgbRaster";

import { EncodeError, describeError } from "../helpers/errors";
import {
  jpegQuality,
  OutputFormat,
  contentTypes,
  RGB_CHANNEL_COUNT,
  defaultOutputFormat,
} from "../helpers/constants";

export async function encodeImage(
  raster: RgbRaster,
  format: OutputFormat = defaultOutputFormat
): Promise<Buffer> {
  const { width, height, data } = raster;

  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new EncodeError(`Invalid raster dimensions ${width}x${height}`);
  }

  if (width <= 0 || height <= 0) {
    throw new EncodeError(`Invalid raster dimensions ${width}x${height}`);
  }

  if (data.length !== width * height * RGB_CHANNEL_COUNT) {
    throw new EncodeError(
      `Raster of ${width}x${height} needs ${width * height * RGB_CHANNEL_COUNT} samples, got ${data.length}`
    );
  }

  const image = sharp(data, {
    raw: { width, height, channels: RGB_CHANNEL_COUNT },
  });

  try {
    if (format === "png") {
      return await image.png().toBuffer();
    }

    return await image.jpeg({ quality: jpegQuality }).toBuffer();
  } catch (error: unknown) {
    throw new EncodeError(`Unable to encode image: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export function contentTypeFor(format: OutputFormat) {
  return contentTypes[format];
}

import sharp from "sharp";

import { RgbRaster } from "../types/rgbRaster";

import { DecodeError, describeError } from "../helpers/errors";

import { normalizeToRgb } from "./normalizeToRgb";

export async function decodeImage(bytes: Uint8Array): Promise<RgbRaster> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };

  try {
    //16-bit sources come back as ushort unless uchar is asked for
    decoded = await sharp(bytes)
      .toColourspace("srgb")
      .raw({ depth: "uchar" })
      .toBuffer({ resolveWithObject: true });
  } catch (error: unknown) {
    throw new DecodeError(`Unable to decode image: ${describeError(error)}`, {
      cause: error,
    });
  }

  const { data, info } = decoded;
  const { width, height, channels } = info;

  if (data.length !== width * height * channels) {
    throw new DecodeError(
      `Decoded ${data.length} bytes for a ${width}x${height} image with ${channels} channels`
    );
  }

  return {
    width,
    height,
    data: normalizeToRgb(data, width * height, channels),
  };
}

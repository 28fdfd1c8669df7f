import { RGB_CHANNEL_COUNT } from "../helpers/constants";

/**
 * Expands raw samples with 1 to 4 channels into interleaved RGB.
 * Grey is copied into all three channels and any alpha channel is dropped.
 */
export function normalizeToRgb(
  samples: Uint8Array,
  pixelCount: number,
  channels: number
) {
  if (channels === RGB_CHANNEL_COUNT) {
    return new Uint8Array(samples);
  }

  const rgb = new Uint8Array(pixelCount * RGB_CHANNEL_COUNT);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const source = pixel * channels;
    const target = pixel * RGB_CHANNEL_COUNT;

    //grey and grey + alpha
    if (channels < RGB_CHANNEL_COUNT) {
      rgb[target] = samples[source];
      rgb[target + 1] = samples[source];
      rgb[target + 2] = samples[source];

      continue;
    }

    rgb[target] = samples[source];
    rgb[target + 1] = samples[source + 1];
    rgb[target + 2] = samples[source + 2];
  }

  return rgb;
}

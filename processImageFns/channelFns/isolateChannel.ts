import { RgbRaster } from "../../types/rgbRaster";
import { Channels, channelOffset } from "../../types/channels";

import { RGB_CHANNEL_COUNT } from "../../helpers/constants";

/**
 * Copies one channel of the raster into a freshly allocated raster of the
 * same size. The other two channels stay zero and the input is left untouched.
 */
export function isolateChannel(raster: RgbRaster, channel: Channels): RgbRaster {
  const { data, width, height } = raster;

  const offset = channelOffset[channel];
  const isolated = new Uint8Array(data.length);

  for (let i = offset; i < data.length; i += RGB_CHANNEL_COUNT) {
    isolated[i] = data[i];
  }

  return { width, height, data: isolated };
}

import { Channels } from "../types/channels";
import { RgbRaster, SplitChannels } from "../types/rgbRaster";

import { getRedChannel } from "./channelFns/getRedChannel";
import { getBlueChannel } from "./channelFns/getBlueChannel";
import { getGreenChannel } from "./channelFns/getGreenChannel";

/**
 * Splits a raster into three rasters of the same size, each keeping a single
 * channel. Every output owns its own buffer.
 */
export function splitChannels(raster: RgbRaster): SplitChannels {
  return {
    [Channels.RED]: getRedChannel({ raster }),
    [Channels.GREEN]: getGreenChannel({ raster }),
    [Channels.BLUE]: getBlueChannel({ raster }),
  };
}

import { Channels } from "../../types/channels";
import { ChannelFnType } from "../../types/rgbRaster";

import { isolateChannel } from "./isolateChannel";

export function getGreenChannel({ raster }: ChannelFnType) {
  return isolateChannel(raster, Channels.GREEN);
}

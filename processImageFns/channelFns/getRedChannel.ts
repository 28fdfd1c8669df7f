import { Channels } from "../../types/channels";
import { ChannelFnType } from "../../types/rgbRaster";

import { isolateChannel } from "./isolateChannel";

export function getRedChannel({ raster }: ChannelFnType) {
  return isolateChannel(raster, Channels.RED);
}

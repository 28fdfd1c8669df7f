import { Channels } from "./channels";

/**
 * 8-bit samples interleaved as R, G, B, row by row.
 * `data.length` is always `width * height * 3`.
 */
export interface RgbRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

export type SplitChannels = Record<Channels, RgbRaster>;

export type ChannelFnType = {
  raster: RgbRaster;
};

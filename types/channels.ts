/**
 * The colour planes of an RGB raster. The values double as the
 * prefix of the destination key each channel image is stored under.
 */
export enum Channels {
  RED = "red",
  GREEN = "green",
  BLUE = "blue",
}

//position of each channel inside an interleaved RGB pixel
export const channelOffset: Record<Channels, number> = {
  [Channels.RED]: 0,
  [Channels.GREEN]: 1,
  [Channels.BLUE]: 2,
};

import { Channels } from "../types/channels";

export const RGB_CHANNEL_COUNT = 3;

//the order channel images are encoded and uploaded in
export const channelOrder = [Channels.RED, Channels.GREEN, Channels.BLUE];

export const outputFormats = ["jpeg", "png"] as const;

export type OutputFormat = (typeof outputFormats)[number];

export const defaultOutputFormat: OutputFormat = "jpeg";

export const contentTypes: Record<OutputFormat, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
};

export const jpegQuality = 90;

export const processedObjectsPrefix = "Processed the following s3Objects:";

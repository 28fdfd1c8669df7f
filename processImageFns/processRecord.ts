import { StorageGateway } from "../types/storageGateway";
import { SplitterConfig } from "../types/splitterConfig";
import { NotificationRecord } from "../types/processingOutcome";

import { channelOrder } from "../helpers/constants";
import { ProcessingError, describeError } from "../helpers/errors";
import { decodeObjectKey } from "../helpers/fns/decodeObjectKey";

import { decodeImage } from "./decodeImage";
import { splitChannels } from "./splitChannels";
import { contentTypeFor, encodeImage } from "./encodeImage";

/**
 * Splits the image referenced by one notification record and stores a red,
 * green and blue copy of it as `<color>/<objectKey>` in the destination bucket.
 *
 * Outputs already uploaded are left in place when a later step fails. Storing
 * overwrites, so a retried event produces the same objects again.
 *
 * @returns the decoded object key and the destination keys, in red, green,
 * blue order
 */
export async function processRecord({
  record,
  config,
  storage,
}: {
  record: NotificationRecord;
  config: SplitterConfig;
  storage: StorageGateway;
}) {
  const { bucketName, encodedKey } = record;
  const { destinationBucket, outputFormat } = config;

  const objectKey = decodeObjectKey(encodedKey);

  console.log(`Processing object ${objectKey} from bucket ${bucketName}`);

  try {
    const sourceBytes = await storage.fetch(bucketName, objectKey);

    const raster = await decodeImage(sourceBytes);

    console.log(
      `Successfully loaded image ${objectKey}: ${raster.width}x${raster.height} pixels`
    );

    const channelImages = splitChannels(raster);

    console.log(`RGB channel separation completed for ${objectKey}`);

    const destinationKeys: string[] = [];

    for (const channel of channelOrder) {
      const destinationKey = `${channel}/${objectKey}`;

      const encoded = await encodeImage(channelImages[channel], outputFormat);

      await storage.store(
        destinationBucket,
        destinationKey,
        encoded,
        contentTypeFor(outputFormat)
      );

      destinationKeys.push(destinationKey);
    }

    return { objectKey, destinationKeys };
  } catch (error: unknown) {
    console.error(`Error processing ${objectKey}: ${describeError(error)}`);

    throw new ProcessingError(objectKey, error);
  }
}

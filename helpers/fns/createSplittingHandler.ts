import { StorageGateway } from "../../types/storageGateway";
import { SplitterConfig } from "../../types/splitterConfig";
import { InvocationResult } from "../../types/processingOutcome";

import { parseS3Event } from "./parseS3Event";
import { processedObjectsPrefix } from "../constants";
import { processRecord } from "../../processImageFns/processRecord";
import { MalformedEventError, ProcessingError } from "../errors";

/**
 * Builds the function invoked for every S3 notification.
 *
 * Records are processed one after the other. The first record that fails stops
 * the invocation and its error becomes the 500 response, records after it are
 * not attempted.
 */
export function createSplittingHandler({
  config,
  storage,
}: {
  config: SplitterConfig;
  storage: StorageGateway;
}) {
  return async (event: unknown): Promise<InvocationResult> => {
    console.log("Received event:", JSON.stringify(event));

    const processedObjectKeys: string[] = [];

    try {
      const records = parseS3Event(event);

      for (const record of records) {
        const { objectKey } = await processRecord({ record, config, storage });

        processedObjectKeys.push(objectKey);
      }
    } catch (error: unknown) {
      if (error instanceof MalformedEventError) {
        console.error("Malformed event --->", error.message);

        return { statusCode: 500, body: `Malformed event: ${error.message}` };
      }

      if (error instanceof ProcessingError) {
        console.error(error.message);

        return { statusCode: 500, body: error.message };
      }

      console.error(error);

      //so it can be caught by alarm
      throw error;
    }

    const result = `${processedObjectsPrefix} ${processedObjectKeys.join(", ")}`;

    console.log(result);

    return { statusCode: 200, body: result };
  };
}

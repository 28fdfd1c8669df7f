import { NotificationRecord } from "../../types/processingOutcome";

import { MalformedEventError } from "../errors";
import { transformZodError } from "./transformZodError";
import { s3EventValidator } from "../schemaValidator/s3EventValidator";

export function parseS3Event(event: unknown): NotificationRecord[] {
  const { success, data, error } = s3EventValidator.safeParse(event);

  if (!success) {
    throw new MalformedEventError(transformZodError(error));
  }

  return data.Records.map((record) => {
    return {
      bucketName: record.s3.bucket.name,
      encodedKey: record.s3.object.key,
    };
  });
}

import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
} from "@aws-sdk/client-s3";

import { StorageGateway } from "../../types/storageGateway";

import { NotFoundError, TransientError, describeError } from "../errors";

const missingObjectErrors = ["NoSuchKey", "NotFound"];

function isMissingObject(error: unknown) {
  return error instanceof Error && missingObjectErrors.includes(error.name);
}

export function createS3StorageGateway(s3client: S3Client): StorageGateway {
  return {
    async fetch(bucket, key) {
      try {
        const s3Object = await s3client.send(
          new GetObjectCommand({
            Bucket: bucket,
            Key: key,
          })
        );

        if (!s3Object.Body) {
          throw new NotFoundError(bucket, key);
        }

        return await s3Object.Body.transformToByteArray();
      } catch (error: unknown) {
        if (error instanceof NotFoundError) {
          throw error;
        }

        if (isMissingObject(error)) {
          throw new NotFoundError(bucket, key, { cause: error });
        }

        throw new TransientError(
          `Failed to get ${key} from ${bucket}: ${describeError(error)}`,
          { cause: error }
        );
      }
    },

    async store(bucket, key, bytes, contentType) {
      try {
        await s3client.send(
          new PutObjectCommand({
            Body: bytes,
            Bucket: bucket,
            Key: key,
            ContentType: contentType,
          })
        );
      } catch (error: unknown) {
        throw new TransientError(
          `Failed to put ${key} into ${bucket}: ${describeError(error)}`,
          { cause: error }
        );
      }

      console.log(`Successfully uploaded ${key} to bucket ${bucket}`);
    },
  };
}

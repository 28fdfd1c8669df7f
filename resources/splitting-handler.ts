import { Handler } from "aws-lambda";
import { S3Client } from "@aws-sdk/client-s3";

import { InvocationResult } from "../types/processingOutcome";

import { loadConfig } from "../helpers/fns/loadConfig";
import { createS3StorageGateway } from "../helpers/fns/createS3StorageGateway";
import { createSplittingHandler } from "../helpers/fns/createSplittingHandler";

//throws when the environment is incomplete, so a misconfigured function fails on cold start
const config = loadConfig(process.env);

const s3client = new S3Client({ region: config.region });

export const handler: Handler<unknown, InvocationResult> =
  createSplittingHandler({
    config,
    storage: createS3StorageGateway(s3client),
  });

import { SplitterConfig } from "../../types/splitterConfig";

import { ConfigError } from "../errors";
import { transformZodError } from "./transformZodError";
import { splitterEnvValidator } from "../schemaValidator/splitterEnvValidator";

export function loadConfig(env: NodeJS.ProcessEnv): SplitterConfig {
  const { success, data, error } = splitterEnvValidator.safeParse(env);

  if (!success) {
    throw new ConfigError(`Invalid configuration: ${transformZodError(error)}`);
  }

  return {
    region: data.REGION,
    outputFormat: data.OUTPUT_FORMAT,
    destinationBucket: data.DESTINATION_BUCKET,
  };
}

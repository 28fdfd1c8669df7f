import { z } from "zod";

import { defaultOutputFormat, outputFormats } from "../constants";

export const splitterEnvValidator = z.object({
  DESTINATION_BUCKET: z
    .string({ required_error: "DESTINATION_BUCKET is required" })
    .min(1, "DESTINATION_BUCKET is required"),

  REGION: z.string().min(1).optional(),

  OUTPUT_FORMAT: z.enum(outputFormats).default(defaultOutputFormat),
});

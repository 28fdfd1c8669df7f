import { z } from "zod";

export const s3RecordValidator = z.object({
  s3: z.object({
    bucket: z.object({
      name: z.string().min(1, "Bucket name is required"),
    }),
    object: z.object({
      key: z.string().min(1, "Object key is required"),
    }),
  }),
});

//an empty list is valid, there is just nothing to process
export const s3EventValidator = z.object({
  Records: z.array(s3RecordValidator),
});

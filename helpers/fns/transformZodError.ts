import { ZodError } from "zod";

export function transformZodError(error: ZodError) {
  return error.errors
    .map((issue) => {
      const path = issue.path.join(".");

      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

import { ZodError } from "zod";

export function getErrorMessage(error: unknown): string {
  // First issue only, e.g. "journeys: Required"
  if (error instanceof ZodError) {
    const [issue] = error.issues;
    if (!issue) return "Invalid response";
    return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
}

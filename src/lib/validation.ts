import { ZodError } from "zod";

/** One line per issue path: `fields.title.0.selector: Required; ...`. */
export function formatZodIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

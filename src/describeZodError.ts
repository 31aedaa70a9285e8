import type { ZodError, ZodIssue } from "zod";

export function describeZodError(err: ZodError): string {
    return err.issues
        .map((issue: ZodIssue) => `${issue.path.length > 0 ? issue.path.join(".") : "payload"}: ${issue.message}`)
        .join("; ");
}

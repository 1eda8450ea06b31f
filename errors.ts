import type { ZodIssue } from "zod";

/**
 * Raised when a partial date field falls outside its declared range.
 */
export class ValidationError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      issues.length
        ? issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ")
        : "Invalid partial date",
    );
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Raised when `parseDate` receives something other than a string, null or undefined.
 */
export class InvalidArgumentError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

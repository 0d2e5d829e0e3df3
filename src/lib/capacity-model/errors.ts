import type { ZodError } from "zod";

export interface ConfigurationIssue {
  path: string;
  message: string;
}

const describeIssue = ({ path, message }: ConfigurationIssue): string =>
  path ? `${path}: ${message}` : message;

/**
 * Raised when an assumption set breaks one of its invariants. Carries every
 * violated rule so a form can attach each message to its field.
 */
export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(issues.map(describeIssue).join("; "));
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  static fromZodError(error: ZodError): ConfigurationError {
    return new ConfigurationError(
      error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }
}

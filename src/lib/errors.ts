import type { ZodError } from "zod";

/**
 * Invalid session input. Raised before any simulation state is built.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Renders an issue path `blocks.1.width` as `blocks[1].width`
 */
export function formatIssuePath(path: ReadonlyArray<PropertyKey>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    const key = String(segment);
    return acc.length === 0 ? key : `${acc}.${key}`;
  }, "");
}

export function fromZodError(message: string, error: ZodError): ConfigurationError {
  const issues = error.issues.map((issue) => {
    const path = formatIssuePath(issue.path);
    return path.length > 0 ? `${path} ${issue.message}` : issue.message;
  });
  return new ConfigurationError(message, issues);
}

import { z } from "zod";

/**
 * Structured errors returned to the calling agent. Every failure a tool can
 * produce is one of these kinds; nothing else crosses a module boundary.
 */
export type ToolError =
  | ValidationError
  | NetworkError
  | ApiError
  | NotFoundError
  | UnknownError;

export interface ValidationIssue {
  field: string;
  reason: string;
}

export interface ValidationError extends ValidationIssue {
  kind: "VALIDATION_ERROR";
  issues: ValidationIssue[];
}

export type NetworkFailureReason = "timeout" | "connection" | "cancelled";

export interface NetworkError {
  kind: "NETWORK_ERROR";
  reason: NetworkFailureReason;
  message: string;
}

export interface ApiError {
  kind: "API_ERROR";
  statusCode: number;
  message: string;
  body?: unknown;
}

export interface NotFoundError {
  kind: "NOT_FOUND";
  message: string;
  available?: string[];
}

export interface UnknownError {
  kind: "UNKNOWN_ERROR";
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ToolError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ToolError): Result<T> {
  return { ok: false, error };
}

export function validationError(
  field: string,
  reason: string,
): ValidationError {
  return {
    kind: "VALIDATION_ERROR",
    field,
    reason,
    issues: [{ field, reason }],
  };
}

export function fromZodError(error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "arguments",
    reason: issue.message,
  }));
  const [first] = issues;
  return {
    kind: "VALIDATION_ERROR",
    field: first?.field ?? "arguments",
    reason: first?.reason ?? "Invalid arguments",
    issues,
  };
}

export function parseArgs<S extends z.ZodTypeAny>(
  schema: S,
  args: unknown,
): Result<z.output<S>> {
  const parsed = schema.safeParse(args ?? {});
  return parsed.success ? ok(parsed.data) : fail(fromZodError(parsed.error));
}

export function notFound(
  message: string,
  available?: string[],
): NotFoundError {
  return available
    ? { kind: "NOT_FOUND", message, available }
    : { kind: "NOT_FOUND", message };
}

/**
 * Raised only during startup when the credential or another setting is
 * missing or malformed. The process exits instead of serving tools.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

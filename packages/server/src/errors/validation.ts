import { BaseError } from "@featurekit/errors"

export type ValidationIssue = { path: string; message: string }

type IssueLike = { path: readonly PropertyKey[]; message: string }

export class ValidationError extends BaseError<"validation_error"> {
  get issues(): ValidationIssue[] {
    const issues = this.context.issues
    return Array.isArray(issues) ? issues.filter(isValidationIssue) : []
  }

  static fromIssues(issues: readonly IssueLike[], cause?: unknown): ValidationError {
    const formatted = issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))

    const first = formatted[0]
    const message = first
      ? `${first.path ? `${first.path}: ` : ""}${first.message}`
      : "Invalid input"

    return new ValidationError(message, {
      code: "validation_error",
      context: { issues: formatted },
      ...(cause !== undefined && { cause }),
    })
  }
}

/** `["files", 0, "name"]` becomes `files[0].name`. */
export function formatPath(path: readonly PropertyKey[]): string {
  return path.reduce<string>((out, part) => {
    if (typeof part === "number") return `${out}[${part}]`
    const name = String(part)
    return out ? `${out}.${name}` : name
  }, "")
}

/**
 * Parses with any schema exposing `parse` (zod, zod/mini) and turns
 * an issue-carrying failure into a `ValidationError`.
 */
export function parseOrThrow<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data)
  } catch (err) {
    if (hasIssues(err)) throw ValidationError.fromIssues(err.issues, err)
    throw err
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}

function hasIssues(err: unknown): err is { issues: IssueLike[] } {
  if (typeof err !== "object" || err === null || !("issues" in err)) return false

  const { issues } = err
  return Array.isArray(issues) && issues.every(isIssueLike)
}

function isIssueLike(value: unknown): value is IssueLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "message" in value &&
    Array.isArray(value.path) &&
    typeof value.message === "string"
  )
}

function isValidationIssue(value: unknown): value is ValidationIssue {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "message" in value &&
    typeof value.path === "string" &&
    typeof value.message === "string"
  )
}

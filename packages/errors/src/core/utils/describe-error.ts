/**
 * One-line, user-presentable description of a thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.length > 0 ? err.message : err.name
  }

  switch (typeof err) {
    case "string":
      return err
    case "number":
    case "boolean":
    case "bigint":
      return String(err)
    default:
      return "Unknown error"
  }
}

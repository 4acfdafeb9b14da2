import { type Context, ValidationError } from "@featurekit/server"

/**
 * Positive integer route parameter. Anything else cannot name an existing
 * record, so it is reported through `notFound`.
 */
export function parseIdParam(
  c: Context,
  notFound: (raw: string) => Error,
  name = "id",
): number {
  const raw = c.req.param(name) ?? ""
  const id = Number(raw)

  if (!/^[1-9]\d*$/.test(raw) || !Number.isSafeInteger(id)) throw notFound(raw)

  return id
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch (err) {
    throw ValidationError.fromIssues([{ path: [], message: "Request body must be valid JSON" }], err)
  }
}

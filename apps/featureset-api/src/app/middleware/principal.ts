import type { Middleware } from "@featurekit/server"
import { AuthError } from "./auth.errors"

export type PrincipalOptions = {
  /** Request header naming the caller, set by a trusted proxy in front of the service. */
  header: string
}

/** Rejects requests without a principal and binds it to the context and request logger. */
export function principalMiddleware(opts: PrincipalOptions): Middleware {
  return async (c, next) => {
    const principal = c.req.header(opts.header)?.trim()
    if (!principal) throw AuthError.unauthenticated(opts.header)

    c.set("principal", principal)
    c.set("logger", c.get("logger").child({ principal }))

    await next()
  }
}

import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Statuses an error response may carry; all of them have a body. */
export type StatusCode = ContentfulStatusCode & number

import type { AddressInfo } from "node:net"
import { serve } from "@hono/node-server"
import type { Logger } from "@featurekit/logger"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export type Listening = {
  server: Closeable
  address: { host: string; port: number }
}

/**
 * Binds the app and resolves once the socket is listening.
 * Port 0 binds an ephemeral port, reported in `address`.
 */
export function listen(
  app: Application,
  options: ResolvedServerOptions,
  logger: Logger,
): Promise<Listening> {
  return new Promise((resolve) => {
    const server = serve(
      { fetch: app.fetch, port: options.port, hostname: options.host },
      (info: AddressInfo) => {
        const address = { host: options.host, port: info.port }

        logger.info("Server listening", address)
        resolve({ server, address })
      },
    )
  })
}

export type ListenFn = typeof listen

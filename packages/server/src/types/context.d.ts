import type { Logger } from "@featurekit/logger"

export type ServerContextVariables = {
  requestId: string
  logger: Logger
  principal: string
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends ServerContextVariables {}
}

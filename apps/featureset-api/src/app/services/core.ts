import { type Clock, SystemClock } from "@featurekit/clock"
import { type IdGenerator, uuidV4 } from "@featurekit/id"
import { createPinoLogger, type Logger } from "@featurekit/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
  ids: IdGenerator
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
  ).child({ service: config.logging.serviceName, env: config.app.env })

  return { clock, logger, ids: uuidV4 }
}

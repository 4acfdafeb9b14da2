import { createPinoLogger } from "@featurekit/logger"
import { run } from "./server"

run().catch((err: unknown) => {
  createPinoLogger().fatal("Failed to start", { err })
  process.exit(1)
})

import type { Context, RequestHandler } from "@featurekit/server"
import type { FeaturesetServices } from "../composition"

export function listFeaturesetsHandler({ featuresetService }: FeaturesetServices): RequestHandler {
  return async (c: Context) => {
    const featuresets = await featuresetService.list(c.get("principal"))

    return c.json({ data: featuresets })
  }
}

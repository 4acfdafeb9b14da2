import type { Context, RequestHandler } from "@featurekit/server"
import { parseIdParam } from "../../../lib"
import type { FeaturesetServices } from "../composition"
import { FeaturesetError } from "../model/featureset.errors"

export function getFeaturesetHandler({ featuresetService }: FeaturesetServices): RequestHandler {
  return async (c: Context) => {
    const id = parseIdParam(c, FeaturesetError.featuresetNotFound)

    const record = await featuresetService.getOwned(c.get("principal"), id)

    return c.json({ data: record })
  }
}

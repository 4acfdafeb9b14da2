import type { Context, RequestHandler } from "@featurekit/server"
import { parseIdParam } from "../../../lib"
import { FETCH_FEATURESETS } from "../../notifications"
import type { FeaturesetServices } from "../composition"
import { FeaturesetError } from "../model/featureset.errors"

export function deleteFeaturesetHandler({ featuresetService }: FeaturesetServices): RequestHandler {
  return async (c: Context) => {
    const id = parseIdParam(c, FeaturesetError.featuresetNotFound)

    await featuresetService.delete(c.get("principal"), id)

    return c.json({ action: FETCH_FEATURESETS })
  }
}

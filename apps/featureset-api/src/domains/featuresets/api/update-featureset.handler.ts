import type { Context, RequestHandler } from "@featurekit/server"
import { parseIdParam } from "../../../lib"
import type { FeaturesetServices } from "../composition"
import { FeaturesetError } from "../model/featureset.errors"

/** Ownership is still checked, so a stranger's id answers 404 rather than 501. */
export function updateFeaturesetHandler({ featuresetService }: FeaturesetServices): RequestHandler {
  return async (c: Context) => {
    const id = parseIdParam(c, FeaturesetError.featuresetNotFound)

    await featuresetService.getOwned(c.get("principal"), id)

    throw FeaturesetError.notImplemented()
  }
}

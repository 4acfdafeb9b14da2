import { type Context, parseOrThrow, type RequestHandler } from "@featurekit/server"
import { readJsonBody } from "../../../lib"
import { FETCH_FEATURESETS } from "../../notifications"
import type { FeaturesetServices } from "../composition"
import { createFeaturesetRequestSchema } from "./featureset.api.schema"

export function createFeaturesetHandler({ featuresetService }: FeaturesetServices): RequestHandler {
  return async (c: Context) => {
    const request = parseOrThrow(createFeaturesetRequestSchema, await readJsonBody(c))

    const record = await featuresetService.submit(c.get("principal"), {
      name: request.featuresetName,
      datasetId: request.datasetID,
      selection: request,
    })

    return c.json({ data: record, action: FETCH_FEATURESETS }, 201)
  }
}

import { type Application, createRouter } from "@featurekit/server"
import type { FeaturesetServices } from "../composition"
import { createFeaturesetHandler } from "./create-featureset.handler"
import { deleteFeaturesetHandler } from "./delete-featureset.handler"
import { getFeaturesetHandler } from "./get-featureset.handler"
import { listFeaturesetsHandler } from "./list-featuresets.handler"
import { updateFeaturesetHandler } from "./update-featureset.handler"

type FeaturesetsModuleDeps = {
  featuresets: FeaturesetServices
}

export function createFeaturesetsModule(deps: FeaturesetsModuleDeps) {
  return {
    name: "featuresets",
    register: (api: Application) => {
      const featuresets = createRouter()

      featuresets.get("/", listFeaturesetsHandler(deps.featuresets))
      featuresets.post("/", createFeaturesetHandler(deps.featuresets))
      featuresets.get("/:id", getFeaturesetHandler(deps.featuresets))
      featuresets.put("/:id", updateFeaturesetHandler(deps.featuresets))
      featuresets.delete("/:id", deleteFeaturesetHandler(deps.featuresets))

      api.route("/featuresets", featuresets)
    },
  }
}

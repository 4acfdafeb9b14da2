export { createFeaturesetsModule } from "./api"
export {
  createFeaturesetServices,
  type FeaturesetCollaborators,
  type FeaturesetServices,
} from "./composition"
export { FeaturesetError, type FeaturesetErrorCode } from "./model/featureset.errors"
export type {
  CompletedFeatureset,
  FeaturesetId,
  FeaturesetRecord,
  PendingFeatureset,
} from "./model/featureset.model"
export type { FeaturesetArtifact, FeatureTable } from "./model/feature-table.model"

import { BaseError } from "@featurekit/errors"
import type { FeaturesetId } from "./featureset.model"

export type FeaturesetErrorCode =
  | "no_features_selected"
  | "access_denied"
  | "featureset_not_found"
  | "not_implemented"

export class FeaturesetError extends BaseError<FeaturesetErrorCode> {
  static noFeaturesSelected(): FeaturesetError {
    return new FeaturesetError("At least one feature must be selected.", {
      code: "no_features_selected",
    })
  }

  /** Deliberately the same whether the dataset is missing or someone else's. */
  static accessDenied(datasetId: number): FeaturesetError {
    return new FeaturesetError("No such data set", {
      code: "access_denied",
      context: { datasetId },
    })
  }

  static featuresetNotFound(id: FeaturesetId | string): FeaturesetError {
    return new FeaturesetError(`Featureset ${id} not found`, {
      code: "featureset_not_found",
      context: { featuresetId: id },
    })
  }

  static notImplemented(): FeaturesetError {
    return new FeaturesetError("Functionality for this endpoint is not yet implemented.", {
      code: "not_implemented",
    })
  }
}

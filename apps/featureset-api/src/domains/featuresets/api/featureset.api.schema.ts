import { z } from "zod/mini"

/**
 * Feature flags (`"<feature>": true`) ride alongside the named fields, so
 * unknown keys are kept for feature selection.
 */
export const createFeaturesetRequestSchema = z.looseObject({
  featuresetName: z._default(z.string(), ""),
  datasetID: z.coerce.number().check(
    z.multipleOf(1, { error: "datasetID must be an integer" }),
    z.positive({ error: "datasetID must be positive" }),
  ),

  // Accepted for compatibility; custom feature code is never run.
  customFeatsCode: z.optional(z.unknown()),
})

export type CreateFeaturesetRequest = z.infer<typeof createFeaturesetRequestSchema>

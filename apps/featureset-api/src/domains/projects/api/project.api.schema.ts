import { z } from "zod/mini"

const name = z.string().check(
  z.trim(),
  z.minLength(1, { error: "Name cannot be empty" }),
  z.maxLength(255, { error: "Name cannot exceed 255 characters" }),
)

export const createProjectRequestSchema = z.object({ name })

export type CreateProjectRequest = z.infer<typeof createProjectRequestSchema>

const seriesFileSchema = z.object({
  name: z.string().check(
    z.minLength(1, { error: "File name cannot be empty" }),
    z.regex(/^[\w.-]+$/, { error: "File name may only contain letters, digits, '.', '_' and '-'" }),
  ),
  label: z.optional(z.string()),
  content: z.string(),
})

export const createDatasetRequestSchema = z.object({
  name,
  files: z.array(seriesFileSchema).check(
    z.minLength(1, { error: "A dataset needs at least one file" }),
    z.refine((files) => new Set(files.map((f) => f.name)).size === files.length, {
      error: "File names must be unique",
    }),
  ),
})

export type CreateDatasetRequest = z.infer<typeof createDatasetRequestSchema>

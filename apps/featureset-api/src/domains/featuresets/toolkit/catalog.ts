import catalog from "./feature-catalog.json"

export interface CatalogEntry {
  name: string
  description: string
}

export const featureCatalog: readonly CatalogEntry[] = catalog.features

const catalogNames = new Set(featureCatalog.map((entry) => entry.name))

export function isCatalogFeature(name: string): boolean {
  return catalogNames.has(name)
}

/** Form values count when truthy; empty arrays and objects do not. */
function isSelected(flag: unknown): boolean {
  if (Array.isArray(flag)) return flag.length > 0
  if (typeof flag === "object" && flag !== null) return Object.keys(flag).length > 0

  return Boolean(flag)
}

/**
 * Names of catalog features whose flag is selected, in the order the flags
 * appear. Everything else in `flags` is ignored.
 */
export function selectFeatures(flags: Readonly<Record<string, unknown>>): string[] {
  return Object.entries(flags)
    .filter(([name, selected]) => isSelected(selected) && isCatalogFeature(name))
    .map(([name]) => name)
}

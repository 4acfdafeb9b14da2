import type { IdGenerator } from "../ports/id-generator"

/**
 * Deterministic ids for tests and fixtures: `${prefix}1`, `${prefix}2`, ...
 */
export function sequenceIds(prefix = "", start = 1): IdGenerator<string> {
  let next = start

  return { generate: () => `${prefix}${next++}` }
}

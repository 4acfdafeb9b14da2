/** Produces opaque unique identifiers. */
export interface IdGenerator<T = string> {
  generate(): T
}

/**
 * Bidirectional transform between a typed value and the bytes an adapter stores.
 *
 * @remarks
 * Adapters treat codec output as opaque and never depend on a codec directly.
 * Plain JSON codecs lose `Date`, `Map`, `Set` and `BigInt`; pick a codec that
 * keeps whatever the stored type carries.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}

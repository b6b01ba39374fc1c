/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime — it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: a group Capacity and a slot count are both numbers at runtime,
 * but only a value validated as a power of two can be passed where a
 * Capacity is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};

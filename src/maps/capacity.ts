import type { Brand } from "../type_primitives/brand";
import { is_power_of_two, validate_and_cast } from "../type_primitives/assertions";
import { SIM_ERROR, SimError } from "../utils/error";
import { MAX_CAPACITY } from "../utils/constants";

/** Number of groups in a table. Always a power of two in [1, MAX_CAPACITY]. */
export type Capacity = Brand<number, "capacity">;

export const is_valid_capacity = (v: number): boolean =>
  is_power_of_two(v) && v <= MAX_CAPACITY;

/** Dev-checked cast, for callers that already guarantee the range. */
export const as_capacity = (v: number): Capacity =>
  validate_and_cast<number, Capacity>(
    v,
    is_valid_capacity,
    `capacity ${v} must be a power of two no larger than ${MAX_CAPACITY}`,
  );

/** Checked in every build. Used at the public edges (map constructors, options). */
export function to_capacity(v: number): Capacity {
  if (!is_valid_capacity(v)) {
    throw new SimError(
      SIM_ERROR.INVALID_CAPACITY,
      `capacity must be a power of two between 1 and ${MAX_CAPACITY}, got ${v}`,
      { capacity: v },
    );
  }
  return as_capacity(v);
}

/** Number of bits needed to index `capacity` groups: bit_width(capacity - 1). */
export const index_bits = (capacity: Capacity): number =>
  32 - Math.clz32(capacity - 1);

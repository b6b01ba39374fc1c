import { is_non_negative_integer } from "../type_primitives/assertions";
import { type Capacity, is_valid_capacity, as_capacity } from "../maps/capacity";
import { SIM_ERROR, SimError } from "../utils/error";
import {
  DEFAULT_CAPACITY,
  DEFAULT_INSERT_SEED,
  DEFAULT_MAX_LOAD_FACTOR,
  DEFAULT_MISS_SEED,
  DEFAULT_NUM_POINTS,
  MAX_CAPACITY,
} from "../utils/constants";

export interface SimulationOptions {
  /** Groups per table; a power of two. */
  capacity?: number;
  /** Load factor points in the sweep, both ends included. */
  num_points?: number;
  max_load_factor?: number;
  /** Seed of the insertion draws, replayed for successful lookups. */
  insert_seed?: number;
  /** Seed of the unsuccessful lookup draws. */
  miss_seed?: number;
}

export interface ResolvedSimulationOptions {
  readonly capacity: Capacity;
  readonly num_points: number;
  readonly max_load_factor: number;
  readonly insert_seed: number;
  readonly miss_seed: number;
}

const MAX_SEED = 0xffffffff;

function invalid(field: string, value: unknown, expected: string): SimError {
  return new SimError(
    SIM_ERROR.INVALID_OPTION,
    `${field} must be ${expected}, got ${String(value)}`,
    { field, value },
  );
}

function check_seed(field: string, value: number): number {
  if (!is_non_negative_integer(value) || value > MAX_SEED) {
    throw invalid(field, value, "an integer in [0, 2^32)");
  }
  return value;
}

export function resolve_simulation_options(
  options?: SimulationOptions,
): ResolvedSimulationOptions {
  const capacity = options?.capacity ?? DEFAULT_CAPACITY;
  const num_points = options?.num_points ?? DEFAULT_NUM_POINTS;
  const max_load_factor = options?.max_load_factor ?? DEFAULT_MAX_LOAD_FACTOR;

  if (!is_valid_capacity(capacity)) {
    throw invalid("capacity", capacity, `a power of two between 1 and ${MAX_CAPACITY}`);
  }
  if (!is_non_negative_integer(num_points) || num_points < 2) {
    throw invalid("num_points", num_points, "an integer of at least 2");
  }
  // Load factor 1 would leave no free slot for the unsuccessful lookups to stop at.
  if (!Number.isFinite(max_load_factor) || max_load_factor < 0 || max_load_factor >= 1) {
    throw invalid("max_load_factor", max_load_factor, "a number in [0, 1)");
  }

  return {
    capacity: as_capacity(capacity),
    num_points,
    max_load_factor,
    insert_seed: check_seed("insert_seed", options?.insert_seed ?? DEFAULT_INSERT_SEED),
    miss_seed: check_seed("miss_seed", options?.miss_seed ?? DEFAULT_MISS_SEED),
  };
}

/** i-th of `num_points` evenly spaced load factors in [0, max_load_factor]. */
export const load_factor_at = (
  options: ResolvedSimulationOptions,
  i: number,
): number => (options.max_load_factor * i) / (options.num_points - 1);

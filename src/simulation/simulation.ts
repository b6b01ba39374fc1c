/***
 * Simulation — load factor sweep over one map variant.
 *
 * For each load factor point a fresh map is filled to
 * trunc(capacity * load_factor * N) keys, then measured:
 *
 *   1. group saturation       fraction of full groups
 *   2. successful lookups     the insertion draws replayed from the same seed
 *   3. unsuccessful lookups   draws from a second seed, absent keys only,
 *                             until as many misses as keys were inserted
 *
 * Means over an empty sample are reported as 0.
 *
 * Usage:
 *
 *   const report = run_experiment(MAP_VARIANTS.overflow, { capacity: 1024 });
 *   write_report(stdout_sink(), report);
 *
 ***/

import { LookupStats } from "../probe/lookup_stats";
import { KeySource } from "../random/key_source";
import type { MapVariant } from "../maps/variants";
import {
  type ResolvedSimulationOptions,
  type SimulationOptions,
  load_factor_at,
  resolve_simulation_options,
} from "./options";

export interface LoadPointStats {
  readonly load_factor: number;
  readonly group_full_probability: number;
  readonly successful_hops: number;
  readonly successful_cmps: number;
  readonly unsuccessful_hops: number;
  readonly unsuccessful_cmps: number;
}

export interface ExperimentReport {
  readonly label: string;
  readonly rows: readonly LoadPointStats[];
}

export type RowListener = (row: LoadPointStats, index: number) => void;

const mean = (total: number, n: number): number => (n === 0 ? 0 : total / n);

export function target_size(
  variant: MapVariant,
  capacity: number,
  load_factor: number,
): number {
  return Math.trunc(capacity * load_factor * variant.group_size);
}

export function measure_load_point(
  variant: MapVariant,
  options: ResolvedSimulationOptions,
  load_factor: number,
): LoadPointStats {
  const map = variant.create(options.capacity);
  const size = target_size(variant, options.capacity, load_factor);
  const keys = new KeySource(options.insert_seed);

  for (let n = 0; n !== size; ) {
    keys.draw();
    if (map.insert(keys.hi, keys.lo)) n++;
  }
  const group_full_probability = map.group_full_probability();

  const hit = new LookupStats();
  keys.reseed(options.insert_seed);
  for (let n = 0; n !== size; n++) {
    keys.draw();
    map.find(keys.hi, keys.lo, hit);
  }

  const miss = new LookupStats();
  const scratch = new LookupStats();
  keys.reseed(options.miss_seed);
  for (let n = 0; n !== size; ) {
    keys.draw();
    scratch.reset();
    if (!map.find(keys.hi, keys.lo, scratch)) {
      miss.add(scratch);
      n++;
    }
  }

  return {
    load_factor,
    group_full_probability,
    successful_hops: mean(hit.hops, size),
    successful_cmps: mean(hit.cmps, size),
    unsuccessful_hops: mean(miss.hops, size),
    unsuccessful_cmps: mean(miss.cmps, size),
  };
}

export function run_experiment(
  variant: MapVariant,
  options?: SimulationOptions,
  on_row?: RowListener,
): ExperimentReport {
  const resolved = resolve_simulation_options(options);
  const rows: LoadPointStats[] = [];
  for (let i = 0; i < resolved.num_points; i++) {
    const row = measure_load_point(variant, resolved, load_factor_at(resolved, i));
    rows.push(row);
    on_row?.(row, i);
  }
  return { label: variant.label, rows };
}

import { bench, describe } from "vitest";
import { MAP_VARIANTS, MAP_VARIANT_TAGS } from "../maps/variants";
import type { GroupedMap } from "../maps/grouped_map";
import { LookupStats } from "../probe/lookup_stats";
import { KeySource } from "../random/key_source";
import { run_experiment } from "../simulation/simulation";

const CAPACITY = 4096;
const LOAD_FACTOR = 0.875;

//=========================================================
// Helpers
//=========================================================

function filled(map: GroupedMap, n: number, seed: number): GroupedMap {
  const keys = new KeySource(seed);
  while (map.size < n) {
    keys.draw();
    map.insert(keys.hi, keys.lo);
  }
  return map;
}

//=========================================================
// Insert / find
//=========================================================

for (const tag of MAP_VARIANT_TAGS) {
  const variant = MAP_VARIANTS[tag];
  const n = Math.trunc(CAPACITY * LOAD_FACTOR * variant.group_size);

  describe(`${tag} map`, () => {
    bench(`insert_${n}`, () => {
      filled(variant.create(CAPACITY), n, 0);
    });

    const map = filled(variant.create(CAPACITY), n, 0);
    const keys = new KeySource(0);
    const stats = new LookupStats();

    bench(`find_hit_${n}`, () => {
      keys.reseed(0);
      for (let i = 0; i < n; i++) {
        keys.draw();
        map.find(keys.hi, keys.lo, stats);
      }
    });

    bench(`find_miss_${n}`, () => {
      keys.reseed(1);
      for (let i = 0; i < n; i++) {
        keys.draw();
        map.find(keys.hi, keys.lo, stats);
      }
    });
  });
}

//=========================================================
// Full sweep
//=========================================================

describe("sweep", () => {
  for (const tag of MAP_VARIANT_TAGS) {
    bench(`${tag}_1024x11`, () => {
      run_experiment(MAP_VARIANTS[tag], { capacity: 1024, num_points: 11 });
    });
  }
});

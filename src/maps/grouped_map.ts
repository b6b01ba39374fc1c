/***
 * GroupedMap — common surface of the simulated open-addressing tables.
 *
 * Keys are unsigned 64-bit integers passed as (hi, lo) uint32 words and
 * double as their own hash values. Tables are fixed-size: they grow only
 * by insertion and never rehash or delete.
 *
 ***/

import type { LookupStats } from "../probe/lookup_stats";
import type { Capacity } from "./capacity";

export interface GroupedMap {
  /** Number of groups. */
  readonly capacity: Capacity;
  /** Number of keys stored. */
  readonly size: number;

  /**
   * Insert a key. Returns false (and changes nothing) if it is already
   * present. Throws SimError(TABLE_FULL) if the probe cycle runs out.
   */
  insert(hi: number, lo: number): boolean;

  /** Look a key up, adding the probe cost to `stats`. */
  find(hi: number, lo: number, stats: LookupStats): boolean;

  /** Fraction of groups that have no free slot. */
  group_full_probability(): number;
}

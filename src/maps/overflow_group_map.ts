/***
 * OverflowGroupMap — 15-slot groups with an 8-bit overflow marker.
 *
 * Storage is column-oriented: the key words of group g live at
 * g * 15 .. g * 15 + count[g] - 1 in the hi/lo columns, filled in
 * insertion order. Each group also carries a byte of overflow bits.
 *
 * Layout per group:
 *
 *   hi[g*15 .. g*15+14]   high key words
 *   lo[g*15 .. g*15+14]   low key words
 *   count[g]              occupied slots (0..15)
 *   overflow[g]           bit (key mod 8) set once such a key was
 *                         pushed past this group while it was full
 *
 * A lookup stops at the first group holding the key, or at the first
 * group whose overflow bit for the key's residue is clear. Bits are only
 * ever set, so a clear bit proves no later group holds the key.
 *
 ***/

import { QuadraticProber } from "../probe/quadratic_prober";
import { LookupStats } from "../probe/lookup_stats";
import { assert, is_pow2_mask } from "../type_primitives/assertions";
import { SIM_ERROR, SimError } from "../utils/error";
import {
  OVERFLOW_GROUP_SIZE,
  OVERFLOW_RESIDUE_MASK,
  REDUCED_HASH_MASK,
} from "../utils/constants";
import { type Capacity, index_bits, to_capacity } from "./capacity";
import type { GroupedMap } from "./grouped_map";

/**
 * Low byte of the key, with 0 and 1 remapped to 8 and 9.
 * 0 and 1 are reserved for the empty and sentinel markers of the real
 * control bytes this layout models.
 */
export function reduced_hash(lo: number): number {
  const h = lo & REDUCED_HASH_MASK;
  return h === 0 ? 8 : h === 1 ? 9 : h;
}

export class OverflowGroupMap implements GroupedMap {
  static readonly GROUP_SIZE = OVERFLOW_GROUP_SIZE;

  readonly capacity: Capacity;

  private readonly _hi: Uint32Array;
  private readonly _lo: Uint32Array;
  private readonly _count: Uint8Array;
  private readonly _overflow: Uint8Array;
  private readonly _mask: number;
  private readonly _bits: number;
  private _size = 0;
  // Reused by insert's presence check
  private readonly _scratch = new LookupStats();

  constructor(capacity: number) {
    this.capacity = to_capacity(capacity);
    this._hi = new Uint32Array(capacity * OVERFLOW_GROUP_SIZE);
    this._lo = new Uint32Array(capacity * OVERFLOW_GROUP_SIZE);
    this._count = new Uint8Array(capacity);
    this._overflow = new Uint8Array(capacity);
    this._mask = capacity - 1;
    this._bits = index_bits(this.capacity);
    assert(is_pow2_mask(this._mask), `probe mask ${this._mask} is not 2^k - 1`);
  }

  get size(): number {
    return this._size;
  }

  insert(hi: number, lo: number): boolean {
    this._scratch.reset();
    if (this.find(hi, lo, this._scratch)) return false;

    const overflow_bit = 1 << (lo & OVERFLOW_RESIDUE_MASK);
    const prober = new QuadraticProber(this.home_group(hi));
    for (;;) {
      const g = prober.get();
      const n = this._count[g];
      if (n < OVERFLOW_GROUP_SIZE) {
        const slot = g * OVERFLOW_GROUP_SIZE + n;
        this._hi[slot] = hi;
        this._lo[slot] = lo;
        this._count[g] = n + 1;
        this._size++;
        return true;
      }
      this._overflow[g] |= overflow_bit;
      if (!prober.next(this._mask)) {
        throw new SimError(SIM_ERROR.TABLE_FULL, undefined, {
          capacity: this.capacity,
          size: this._size,
        });
      }
    }
  }

  find(hi: number, lo: number, stats: LookupStats): boolean {
    const rh = reduced_hash(lo);
    const overflow_bit = 1 << (lo & OVERFLOW_RESIDUE_MASK);
    const prober = new QuadraticProber(this.home_group(hi));
    for (;;) {
      const g = prober.get();
      const base = g * OVERFLOW_GROUP_SIZE;
      const end = base + this._count[g];
      for (let i = base; i < end; i++) {
        const x = this._lo[i];
        if (x === lo && this._hi[i] === hi) {
          stats.cmps++;
          return true;
        }
        if (reduced_hash(x) === rh) stats.cmps++;
      }
      if ((this._overflow[g] & overflow_bit) === 0) return false;
      if (!prober.next(this._mask)) return false;
      stats.hops++;
    }
  }

  group_full_probability(): number {
    let full = 0;
    const count = this._count;
    for (let g = 0; g < count.length; g++) {
      if (count[g] === OVERFLOW_GROUP_SIZE) full++;
    }
    return full / count.length;
  }

  /** Overflow bits of group g. */
  overflow_of(g: number): number {
    return this._overflow[g];
  }

  /** Occupied slots in group g. */
  count_of(g: number): number {
    return this._count[g];
  }

  // Top index_bits of the 64-bit key. Tables never exceed 2^22 groups,
  // so those bits always sit in the high word.
  private home_group(hi: number): number {
    return this._bits === 0 ? 0 : hi >>> (32 - this._bits);
  }
}

/***
 * FlatSlabMap — one flat slot array probed in 16-wide windows.
 *
 * There are capacity * 16 slots. A key's home position is taken from the
 * bits just above its 7-bit discriminant:
 *
 *   pos    = (key >> 7) & (slot_count - 1)
 *   offset = pos & 15          fixed for every probe of this key
 *   group  = pos >> 4          start of the probe sequence
 *
 * Probing visits logical groups g and scans the window
 * g * 16 + offset .. g * 16 + offset + 15, wrapping at the end of the
 * slab. Windows of different offsets overlap, so emptiness is checked
 * over the whole window rather than assumed to be a suffix.
 *
 * Any 64-bit value is a valid key, so emptiness is a separate per-slot
 * flag rather than a reserved key value.
 *
 ***/

import { QuadraticProber } from "../probe/quadratic_prober";
import { LookupStats } from "../probe/lookup_stats";
import { assert, is_pow2_mask } from "../type_primitives/assertions";
import { SIM_ERROR, SimError } from "../utils/error";
import {
  SLAB_GROUP_SIZE,
  SLAB_HASH_MASK,
  SLAB_OFFSET_MASK,
  SLAB_POSITION_SHIFT,
} from "../utils/constants";
import { type Capacity, to_capacity } from "./capacity";
import type { GroupedMap } from "./grouped_map";

const EMPTY = 0;
const OCCUPIED = 1;
const NOT_FOUND = -1;

export class FlatSlabMap implements GroupedMap {
  static readonly GROUP_SIZE = SLAB_GROUP_SIZE;

  readonly capacity: Capacity;

  private readonly _hi: Uint32Array;
  private readonly _lo: Uint32Array;
  private readonly _occupied: Uint8Array;
  private readonly _group_mask: number;
  private readonly _slot_mask: number;
  private _size = 0;
  private readonly _scratch = new LookupStats();

  constructor(capacity: number) {
    this.capacity = to_capacity(capacity);
    const slots = capacity * SLAB_GROUP_SIZE;
    this._hi = new Uint32Array(slots);
    this._lo = new Uint32Array(slots);
    this._occupied = new Uint8Array(slots);
    this._group_mask = capacity - 1;
    this._slot_mask = slots - 1;
    assert(is_pow2_mask(this._group_mask), `probe mask ${this._group_mask} is not 2^k - 1`);
  }

  get size(): number {
    return this._size;
  }

  insert(hi: number, lo: number): boolean {
    this._scratch.reset();
    if (this.find(hi, lo, this._scratch)) return false;

    const pos = this.position_for(hi, lo);
    const offset = pos & SLAB_OFFSET_MASK;
    const prober = new QuadraticProber(pos >>> 4);
    for (;;) {
      const slot = this.first_empty(prober.get() * SLAB_GROUP_SIZE + offset);
      if (slot !== NOT_FOUND) {
        this._hi[slot] = hi;
        this._lo[slot] = lo;
        this._occupied[slot] = OCCUPIED;
        this._size++;
        return true;
      }
      if (!prober.next(this._group_mask)) {
        throw new SimError(SIM_ERROR.TABLE_FULL, undefined, {
          capacity: this.capacity,
          size: this._size,
        });
      }
    }
  }

  find(hi: number, lo: number, stats: LookupStats): boolean {
    const h7 = lo & SLAB_HASH_MASK;
    const pos = this.position_for(hi, lo);
    const offset = pos & SLAB_OFFSET_MASK;
    const prober = new QuadraticProber(pos >>> 4);
    for (;;) {
      const start = prober.get() * SLAB_GROUP_SIZE + offset;
      let saw_empty = false;
      for (let j = 0; j < SLAB_GROUP_SIZE; j++) {
        const s = (start + j) & this._slot_mask;
        if (this._occupied[s] === EMPTY) {
          saw_empty = true;
          continue;
        }
        const x = this._lo[s];
        if (x === lo && this._hi[s] === hi) {
          stats.cmps++;
          return true;
        }
        if ((x & SLAB_HASH_MASK) === h7) stats.cmps++;
      }
      if (saw_empty) return false;
      if (!prober.next(this._group_mask)) return false;
      stats.hops++;
    }
  }

  group_full_probability(): number {
    let full = 0;
    for (let g = 0; g < this.capacity; g++) {
      const base = g * SLAB_GROUP_SIZE;
      let j = 0;
      while (j < SLAB_GROUP_SIZE && this._occupied[base + j] === OCCUPIED) j++;
      if (j === SLAB_GROUP_SIZE) full++;
    }
    return full / this.capacity;
  }

  /** Slot currently holding the key, or -1. */
  slot_of(hi: number, lo: number): number {
    for (let s = 0; s < this._occupied.length; s++) {
      if (this._occupied[s] === OCCUPIED && this._lo[s] === lo && this._hi[s] === hi) {
        return s;
      }
    }
    return NOT_FOUND;
  }

  //=========================================================
  // Internal
  //=========================================================

  // (key >> 7) over the full 64 bits, truncated to the low 32 bits
  // before masking. The slot mask never exceeds 2^26 - 1.
  private position_for(hi: number, lo: number): number {
    const shifted = (lo >>> SLAB_POSITION_SHIFT) | (hi << (32 - SLAB_POSITION_SHIFT));
    return (shifted & this._slot_mask) >>> 0;
  }

  private first_empty(start: number): number {
    for (let j = 0; j < SLAB_GROUP_SIZE; j++) {
      const s = (start + j) & this._slot_mask;
      if (this._occupied[s] === EMPTY) return s;
    }
    return NOT_FOUND;
  }
}

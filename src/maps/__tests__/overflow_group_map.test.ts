import { describe, expect, it } from "vitest";
import { OverflowGroupMap, reduced_hash } from "../overflow_group_map";
import { LookupStats } from "../../probe/lookup_stats";
import { SIM_ERROR, SimError } from "../../utils/error";

function lookup(map: OverflowGroupMap, hi: number, lo: number) {
  const stats = new LookupStats();
  const found = map.find(hi, lo, stats);
  return { found, hops: stats.hops, cmps: stats.cmps };
}

describe("reduced_hash", () => {
  it("takes the low byte", () => {
    expect(reduced_hash(2)).toBe(2);
    expect(reduced_hash(0x1ff)).toBe(255);
    expect(reduced_hash(0xabcd12)).toBe(0x12);
  });

  it("remaps 0 and 1 to 8 and 9", () => {
    expect(reduced_hash(0)).toBe(8);
    expect(reduced_hash(1)).toBe(9);
    expect(reduced_hash(0x100)).toBe(8);
    expect(reduced_hash(0x101)).toBe(9);
  });
});

describe("OverflowGroupMap", () => {
  //=========================================================
  // Construction
  //=========================================================

  it("starts empty", () => {
    const m = new OverflowGroupMap(8);
    expect(m.capacity).toBe(8);
    expect(m.size).toBe(0);
    expect(m.group_full_probability()).toBe(0);
  });

  it("rejects a capacity that is not a power of two", () => {
    expect(() => new OverflowGroupMap(6)).toThrow(SimError);
  });

  it("lookup in an empty table stops at the home group", () => {
    const m = new OverflowGroupMap(16);
    expect(lookup(m, 0x12345678, 0x9abcdef0)).toEqual({ found: false, hops: 0, cmps: 0 });
  });

  //=========================================================
  // Single group
  //=========================================================

  describe("with one group", () => {
    function full_group(): OverflowGroupMap {
      const m = new OverflowGroupMap(1);
      for (let lo = 0; lo < 15; lo++) expect(m.insert(0, lo)).toBe(true);
      return m;
    }

    it("saturates after 15 insertions", () => {
      const m = full_group();
      expect(m.size).toBe(15);
      expect(m.count_of(0)).toBe(15);
      expect(m.group_full_probability()).toBe(1);
    });

    it("counts reduced-hash collisions before the match", () => {
      const m = full_group();
      // key 0 reduces to 8, same as the target
      expect(lookup(m, 0, 8)).toEqual({ found: true, hops: 0, cmps: 2 });
      expect(lookup(m, 0, 0)).toEqual({ found: true, hops: 0, cmps: 1 });
    });

    it("reports an absent key from the home group while its overflow bit is clear", () => {
      const m = full_group();
      expect(m.overflow_of(0)).toBe(0);
      expect(lookup(m, 0, 16)).toEqual({ found: false, hops: 0, cmps: 0 });
    });

    it("throws TABLE_FULL when there is no room left", () => {
      const m = full_group();
      try {
        m.insert(0, 16);
        expect.unreachable("expected insert to throw");
      } catch (err) {
        expect(err).toBeInstanceOf(SimError);
        expect(err).toMatchObject({
          category: SIM_ERROR.TABLE_FULL,
          context: { capacity: 1, size: 15 },
        });
      }
      expect(m.size).toBe(15);
      // the full group was still marked for residue 16 % 8 = 0
      expect(m.overflow_of(0)).toBe(0b1);
    });

    it("lookups past an exhausted probe cycle report absent", () => {
      const m = full_group();
      expect(() => m.insert(0, 16)).toThrow(SimError);
      expect(lookup(m, 0, 16)).toEqual({ found: false, hops: 0, cmps: 0 });
      expect(lookup(m, 0, 17)).toEqual({ found: false, hops: 0, cmps: 0 });
    });
  });

  //=========================================================
  // Overflow chain
  //=========================================================

  describe("with two groups", () => {
    // hi = 0 homes to group 0, hi >= 2^31 to group 1
    function overflowed(): OverflowGroupMap {
      const m = new OverflowGroupMap(2);
      for (let i = 0; i < 15; i++) m.insert(0, 100 + i);
      m.insert(0, 200);
      return m;
    }

    it("pushes a key past a full group and marks its residue", () => {
      const m = overflowed();
      expect(m.count_of(0)).toBe(15);
      expect(m.count_of(1)).toBe(1);
      expect(m.overflow_of(0)).toBe(1 << (200 % 8));
      expect(m.overflow_of(1)).toBe(0);
      expect(m.group_full_probability()).toBe(0.5);
    });

    it("follows the overflow bit to the next group", () => {
      expect(lookup(overflowed(), 0, 200)).toEqual({ found: true, hops: 1, cmps: 1 });
    });

    it("stops at the home group for a residue that never overflowed", () => {
      expect(lookup(overflowed(), 0, 201)).toEqual({ found: false, hops: 0, cmps: 0 });
    });

    it("probes on for an absent key sharing an overflowed residue", () => {
      expect(lookup(overflowed(), 0, 208)).toEqual({ found: false, hops: 1, cmps: 0 });
    });

    it("counts a low-byte collision with a different key", () => {
      // 0x169 has low byte 0x69 = 105, same as the stored key 105; residue 1 is clear
      expect(lookup(overflowed(), 0, 0x169)).toEqual({ found: false, hops: 0, cmps: 1 });
    });

    it("homes keys by their top bits", () => {
      const m = overflowed();
      expect(m.insert(0x80000000, 5)).toBe(true);
      expect(m.count_of(1)).toBe(2);
      expect(lookup(m, 0x80000000, 5)).toEqual({ found: true, hops: 0, cmps: 1 });
    });
  });

  //=========================================================
  // Duplicates
  //=========================================================

  it("ignores duplicate insertions", () => {
    const m = new OverflowGroupMap(4);
    expect(m.insert(7, 7)).toBe(true);
    expect(m.insert(7, 7)).toBe(false);
    expect(m.size).toBe(1);
    expect(m.count_of(0)).toBe(1);
  });

  it("distinguishes keys that differ only in the high word", () => {
    const m = new OverflowGroupMap(1);
    m.insert(0, 100);
    expect(lookup(m, 1, 100)).toEqual({ found: false, hops: 0, cmps: 1 });
    expect(m.insert(1, 100)).toBe(true);
    expect(m.size).toBe(2);
  });
});

// Group widths
export const OVERFLOW_GROUP_SIZE = 15;
export const SLAB_GROUP_SIZE = 16;
export const SLAB_OFFSET_MASK = 15; // SLAB_GROUP_SIZE - 1

// Overflow marker: one bit per residue class of key mod 8
export const OVERFLOW_RESIDUE_MASK = 7;

// Reduced discriminants
export const REDUCED_HASH_MASK = 0xff;
export const SLAB_HASH_MASK = 0x7f;
export const SLAB_POSITION_SHIFT = 7; // position bits start above the 7-bit discriminant

// Largest accepted table, in groups. Keeps slab slot indices inside 32 bits.
export const MAX_CAPACITY = 1 << 22;

// Default sweep
export const DEFAULT_CAPACITY = 0x20000;
export const DEFAULT_NUM_POINTS = 101;
export const DEFAULT_MAX_LOAD_FACTOR = 0.875;
export const DEFAULT_INSERT_SEED = 0;
export const DEFAULT_MISS_SEED = 1;

// Report
export const DEFAULT_DELIMITER = ";";
export const REPORT_SIGNIFICANT_DIGITS = 6;

import { FlatSlabMap } from "./flat_slab_map";
import type { GroupedMap } from "./grouped_map";
import { OverflowGroupMap } from "./overflow_group_map";

export type MapVariantTag = "overflow" | "slab";

export interface MapVariant {
  readonly tag: MapVariantTag;
  readonly label: string;
  /** Slots per group, N. */
  readonly group_size: number;
  create(capacity: number): GroupedMap;
}

export const MAP_VARIANTS = {
  overflow: {
    tag: "overflow",
    label: "overflow-marker groups (N=15)",
    group_size: OverflowGroupMap.GROUP_SIZE,
    create: (capacity) => new OverflowGroupMap(capacity),
  },
  slab: {
    tag: "slab",
    label: "flat slab windows (N=16)",
    group_size: FlatSlabMap.GROUP_SIZE,
    create: (capacity) => new FlatSlabMap(capacity),
  },
} as const satisfies Record<MapVariantTag, MapVariant>;

export const MAP_VARIANT_TAGS: readonly MapVariantTag[] = ["overflow", "slab"];

export function is_map_variant_tag(value: string): value is MapVariantTag {
  return value === "overflow" || value === "slab";
}

// Maps
export { OverflowGroupMap, reduced_hash } from "./maps/overflow_group_map";
export { FlatSlabMap } from "./maps/flat_slab_map";
export type { GroupedMap } from "./maps/grouped_map";
export { MAP_VARIANTS, MAP_VARIANT_TAGS, type MapVariant, type MapVariantTag } from "./maps/variants";
export { type Capacity, to_capacity } from "./maps/capacity";

// Probing
export { QuadraticProber } from "./probe/quadratic_prober";
export { LookupStats } from "./probe/lookup_stats";

// Keys
export { KeySource } from "./random/key_source";
export { Mt19937 } from "./random/mt19937";

// Simulation
export {
  run_experiment,
  measure_load_point,
  type ExperimentReport,
  type LoadPointStats,
  type RowListener,
} from "./simulation/simulation";
export {
  resolve_simulation_options,
  type SimulationOptions,
  type ResolvedSimulationOptions,
} from "./simulation/options";

// Report
export {
  write_report,
  format_row,
  format_header,
  stream_sink,
  MemorySink,
  type ReportSink,
} from "./report/report";

// Errors
export { SimError, SIM_ERROR, is_sim_error } from "./utils/error";

// Logging
export { create_logger, LOG_LEVEL, type Logger } from "./utils/logger";

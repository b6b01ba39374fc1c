import { type ParseArgsConfig, parseArgs } from "node:util";
import { MAP_VARIANT_TAGS, type MapVariantTag, is_map_variant_tag } from "../maps/variants";
import type { SimulationOptions } from "../simulation/options";
import { LOG_LEVEL, describe_error } from "../utils/logger";
import { SIM_ERROR, SimError } from "../utils/error";
import { DEFAULT_DELIMITER } from "../utils/constants";

export interface CliOptions {
  readonly variants: readonly MapVariantTag[];
  readonly simulation: SimulationOptions;
  readonly delimiter: string;
  readonly log_level: LOG_LEVEL;
}

export type CliCommand =
  | { readonly kind: "help" }
  | { readonly kind: "run"; readonly options: CliOptions };

export const USAGE = `Usage: probe-sim [options]

Measures group saturation and lookup cost of two grouped open-addressing
layouts across a sweep of load factors.

Options:
  --variant <name>          overflow, slab or all (default: all)
  --capacity <n>            groups per table, a power of two (default: 0x20000)
  --points <n>              load factor points, at least 2 (default: 101)
  --max-load-factor <x>     last load factor of the sweep, in [0, 1) (default: 0.875)
  --seed <n>                seed of the inserted keys (default: 0)
  --miss-seed <n>           seed of the unsuccessful lookups (default: 1)
  --delimiter <s>           field separator (default: ";")
  -v, --verbose             log every load factor point
  -q, --quiet               log errors only
  -h, --help                show this text`;

function parse_number(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = raw.trim() === "" ? NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new SimError(SIM_ERROR.INVALID_OPTION, `--${flag} expects a number, got "${raw}"`, {
      field: flag,
      value: raw,
    });
  }
  return value;
}

function parse_variants(raw: string | undefined): readonly MapVariantTag[] {
  if (raw === undefined || raw === "all") return MAP_VARIANT_TAGS;
  if (is_map_variant_tag(raw)) return [raw];
  throw new SimError(
    SIM_ERROR.INVALID_OPTION,
    `--variant must be one of ${MAP_VARIANT_TAGS.join(", ")} or all, got "${raw}"`,
    { field: "variant", value: raw },
  );
}

const CLI_ARGS = {
  variant: { type: "string" },
  capacity: { type: "string" },
  points: { type: "string" },
  "max-load-factor": { type: "string" },
  seed: { type: "string" },
  "miss-seed": { type: "string" },
  delimiter: { type: "string" },
  verbose: { type: "boolean", short: "v" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
} as const satisfies ParseArgsConfig["options"];

function parse_raw(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: CLI_ARGS,
    });
  } catch (err) {
    throw new SimError(SIM_ERROR.INVALID_OPTION, describe_error(err), { argv: [...argv] });
  }
}

export function parse_cli_args(argv: readonly string[]): CliCommand {
  const parsed = parse_raw(argv);
  const { values } = parsed;
  if (values.help === true) return { kind: "help" };

  if (values.verbose === true && values.quiet === true) {
    throw new SimError(SIM_ERROR.INVALID_OPTION, "--verbose and --quiet are mutually exclusive");
  }
  const delimiter = values.delimiter ?? DEFAULT_DELIMITER;
  if (delimiter === "") {
    throw new SimError(SIM_ERROR.INVALID_OPTION, "--delimiter must not be empty", {
      field: "delimiter",
      value: delimiter,
    });
  }

  return {
    kind: "run",
    options: {
      variants: parse_variants(values.variant),
      simulation: {
        capacity: parse_number("capacity", values.capacity),
        num_points: parse_number("points", values.points),
        max_load_factor: parse_number("max-load-factor", values["max-load-factor"]),
        insert_seed: parse_number("seed", values.seed),
        miss_seed: parse_number("miss-seed", values["miss-seed"]),
      },
      delimiter,
      log_level:
        values.verbose === true
          ? LOG_LEVEL.DEBUG
          : values.quiet === true
            ? LOG_LEVEL.ERROR
            : LOG_LEVEL.INFO,
    },
  };
}

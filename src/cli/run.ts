/***
 * run_cli — command line driver.
 *
 * Parses argv, resolves the simulation options once, then runs each
 * selected variant in turn, streaming rows to the report sink as they
 * complete. Progress goes to the logger; only the report and the usage
 * text go to the sink.
 *
 * Returns the process exit code: 0 on success, 1 on a SimError (bad
 * option, table full). Any other error is a bug and is rethrown.
 *
 ***/

import { MAP_VARIANTS } from "../maps/variants";
import { format_number, format_row, write_report_header, type ReportSink } from "../report/report";
import { resolve_simulation_options } from "../simulation/options";
import { run_experiment } from "../simulation/simulation";
import { create_logger, type LineWriter, type Logger } from "../utils/logger";
import { is_sim_error } from "../utils/error";
import { USAGE, parse_cli_args } from "./options";

export interface CliIO {
  readonly sink: ReportSink;
  /** Log line writer; stderr when omitted. */
  readonly log?: LineWriter;
  readonly now?: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export function run_cli(argv: readonly string[], io: CliIO): number {
  let logger: Logger = create_logger(undefined, io.log, io.now);
  try {
    const command = parse_cli_args(argv);
    if (command.kind === "help") {
      io.sink.write_line(USAGE);
      return EXIT_OK;
    }

    const { options } = command;
    logger = create_logger(options.log_level, io.log, io.now);
    const simulation = resolve_simulation_options(options.simulation);

    for (const tag of options.variants) {
      const variant = MAP_VARIANTS[tag];
      const started = Date.now();
      logger.info(
        `${variant.label}: capacity ${simulation.capacity}, ${simulation.num_points} points up to load factor ${simulation.max_load_factor}`,
      );

      write_report_header(io.sink, variant.label, options.delimiter);
      run_experiment(variant, simulation, (row, i) => {
        io.sink.write_line(format_row(row, options.delimiter));
        logger.debug(
          `point ${i + 1}/${simulation.num_points} load factor ${format_number(row.load_factor)}`,
        );
      });

      logger.info(`${variant.label}: done in ${Date.now() - started} ms`);
    }
    return EXIT_OK;
  } catch (err) {
    if (!is_sim_error(err)) throw err;
    logger.error(err.category, err);
    return EXIT_FAILURE;
  }
}

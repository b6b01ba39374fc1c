/***
 * Report — delimited text output of an experiment.
 *
 *   <label>
 *   load factor;Pr(group full);E(num hops), successful lookup;...
 *   0;0;0;0;0;0
 *   <one row per load factor point>
 *
 * Numbers are written with at most 6 significant digits and no trailing
 * zeros.
 *
 ***/

import type { ExperimentReport, LoadPointStats } from "../simulation/simulation";
import { DEFAULT_DELIMITER, REPORT_SIGNIFICANT_DIGITS } from "../utils/constants";

export interface ReportSink {
  write_line(line: string): void;
}

export const REPORT_FIELDS = [
  "load factor",
  "Pr(group full)",
  "E(num hops), successful lookup",
  "E(num cmps), successful lookup",
  "E(num hops), unsuccessful lookup",
  "E(num cmps), unsuccessful lookup",
] as const;

export function format_number(value: number): string {
  return String(Number(value.toPrecision(REPORT_SIGNIFICANT_DIGITS)));
}

export function format_header(delimiter = DEFAULT_DELIMITER): string {
  return REPORT_FIELDS.join(delimiter);
}

export function format_row(row: LoadPointStats, delimiter = DEFAULT_DELIMITER): string {
  return [
    row.load_factor,
    row.group_full_probability,
    row.successful_hops,
    row.successful_cmps,
    row.unsuccessful_hops,
    row.unsuccessful_cmps,
  ]
    .map(format_number)
    .join(delimiter);
}

export function write_report_header(
  sink: ReportSink,
  label: string,
  delimiter = DEFAULT_DELIMITER,
): void {
  sink.write_line(label);
  sink.write_line(format_header(delimiter));
}

export function write_report(
  sink: ReportSink,
  report: ExperimentReport,
  delimiter = DEFAULT_DELIMITER,
): void {
  write_report_header(sink, report.label, delimiter);
  for (const row of report.rows) sink.write_line(format_row(row, delimiter));
}

//=========================================================
// Sinks
//=========================================================

/** Anything with a write(string) method: process.stdout, a file stream. */
export interface TextStream {
  write(chunk: string): unknown;
}

export function stream_sink(stream: TextStream): ReportSink {
  return {
    write_line(line) {
      stream.write(`${line}\n`);
    },
  };
}

export class MemorySink implements ReportSink {
  readonly lines: string[] = [];

  write_line(line: string): void {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.map((l) => `${l}\n`).join("");
  }
}

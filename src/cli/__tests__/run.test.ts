import { describe, expect, it } from "vitest";
import { EXIT_FAILURE, EXIT_OK, run_cli } from "../run";
import { USAGE } from "../options";
import { MemorySink, format_header } from "../../report/report";

const NOW = new Date("2024-01-01T00:00:00.000Z");
const STAMP = "[2024-01-01T00:00:00.000Z]";

function cli(argv: string[]) {
  const sink = new MemorySink();
  const logs: string[] = [];
  const code = run_cli(argv, { sink, log: (line) => logs.push(line), now: () => NOW });
  return { code, lines: sink.lines, logs };
}

const TINY = ["--capacity", "1", "--points", "2", "--max-load-factor", "0"];

describe("run_cli", () => {
  it("writes one report per selected variant", () => {
    const { code, lines } = cli([...TINY]);
    expect(code).toBe(EXIT_OK);
    expect(lines).toEqual([
      "overflow-marker groups (N=15)",
      format_header(),
      "0;0;0;0;0;0",
      "0;0;0;0;0;0",
      "flat slab windows (N=16)",
      format_header(),
      "0;0;0;0;0;0",
      "0;0;0;0;0;0",
    ]);
  });

  it("logs start and finish of each experiment", () => {
    const { logs } = cli([...TINY, "--variant", "overflow"]);
    expect(logs).toHaveLength(2);
    expect(logs[0]).toBe(
      `${STAMP} INFO overflow-marker groups (N=15): capacity 1, 2 points up to load factor 0`,
    );
    expect(logs[1]).toMatch(
      /^\[2024-01-01T00:00:00\.000Z\] INFO overflow-marker groups \(N=15\): done in \d+ ms$/,
    );
  });

  it("logs every point when verbose", () => {
    const { logs } = cli([...TINY, "--variant", "slab", "--verbose"]);
    expect(logs).toHaveLength(4);
    expect(logs[1]).toBe(`${STAMP} DEBUG point 1/2 load factor 0`);
    expect(logs[2]).toBe(`${STAMP} DEBUG point 2/2 load factor 0`);
  });

  it("logs nothing on success when quiet", () => {
    const { code, logs } = cli([...TINY, "--quiet"]);
    expect(code).toBe(EXIT_OK);
    expect(logs).toEqual([]);
  });

  it("uses the delimiter for header and rows", () => {
    const { lines } = cli([...TINY, "--variant", "slab", "--delimiter", ","]);
    expect(lines[1]).toBe(format_header(","));
    expect(lines[2]).toBe("0,0,0,0,0,0");
  });

  it("reports the first rows of a single-group sweep", () => {
    const { lines } = cli(["--capacity", "1", "--points", "2", "--variant", "overflow"]);
    expect(lines).toHaveLength(4);
    const fields = lines[3].split(";");
    expect(fields).toHaveLength(6);
    // 13 keys in the only group: not full, and no lookup leaves it
    expect(fields.slice(0, 3)).toEqual(["0.875", "0", "0"]);
    expect(fields[4]).toBe("0");
  });

  it("prints usage for --help", () => {
    const { code, lines, logs } = cli(["--help"]);
    expect(code).toBe(EXIT_OK);
    expect(lines).toEqual([USAGE]);
    expect(logs).toEqual([]);
  });

  it("fails with exit code 1 on invalid options and writes no report", () => {
    const { code, lines, logs } = cli(["--points", "1"]);
    expect(code).toBe(EXIT_FAILURE);
    expect(lines).toEqual([]);
    expect(logs).toEqual([
      `${STAMP} ERROR INVALID_OPTION: num_points must be an integer of at least 2, got 1`,
    ]);
  });

  it("fails on unknown options", () => {
    const { code, lines, logs } = cli(["--bogus"]);
    expect(code).toBe(EXIT_FAILURE);
    expect(lines).toEqual([]);
    expect(logs).toHaveLength(1);
    expect(logs[0].startsWith(`${STAMP} ERROR INVALID_OPTION: `)).toBe(true);
  });

  it("still logs errors when quiet", () => {
    const { code, logs } = cli(["--quiet", "--capacity", "3"]);
    expect(code).toBe(EXIT_FAILURE);
    expect(logs).toEqual([
      `${STAMP} ERROR INVALID_OPTION: capacity must be a power of two between 1 and 4194304, got 3`,
    ]);
  });
});

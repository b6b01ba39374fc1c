import { run_cli } from "./cli/run";
import { stream_sink } from "./report/report";

process.exitCode = run_cli(process.argv.slice(2), { sink: stream_sink(process.stdout) });

import path from "path";
import { DEFAULT_TOP_N } from "@/lib/analytics/config";
import { isFatalInputError } from "@/lib/ingest/errors";
import { runReport } from "@/lib/pipeline/run";
import { getFlagValue, getVerboseFlag, hasFlag } from "./argv";

export const USAGE = `Usage: hsk-report --housekeeping <csv> --usage <csv> [options]

Options:
  --out <dir>       output base directory (default: out)
  --top <n>         rows in top-N charts and tables (default: ${DEFAULT_TOP_N}, minimum 1)
  --title <text>    report title
  --anonymize       shorten housekeeper and user names to "First L."
  --verbose, -v     debug logging
  --help            show this message`;

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  now?: () => Date;
};

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function parseCliArgs(argv: readonly string[]) {
  const top = getFlagValue(argv, "--top");
  return {
    help: hasFlag(argv, "--help") || hasFlag(argv, "-h"),
    verbose: getVerboseFlag(argv),
    anonymize: hasFlag(argv, "--anonymize"),
    housekeeping: getFlagValue(argv, "--housekeeping"),
    usage: getFlagValue(argv, "--usage"),
    out: getFlagValue(argv, "--out") ?? "out",
    top: top ?? undefined,
    title: getFlagValue(argv, "--title") || undefined,
  };
}

// Resolves to the process exit code
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    io.out(USAGE);
    return 0;
  }
  if (!args.housekeeping || !args.usage) {
    io.err("[hsk-report] --housekeeping and --usage are required\n");
    io.err(USAGE);
    return 2;
  }

  try {
    const res = await runReport({
      housekeepingPath: path.resolve(args.housekeeping),
      roomUsagePath: path.resolve(args.usage),
      outBase: path.resolve(args.out),
      config: { topN: args.top, title: args.title },
      anonymize: args.anonymize,
      now: io.now?.(),
      verbose: args.verbose,
    });
    io.out(`Report written to: ${res.dir}`);
    for (const f of res.files) io.out(`  ${f}`);
    return 0;
  } catch (e) {
    if (isFatalInputError(e)) {
      io.err(`[hsk-report] ${e.name}: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

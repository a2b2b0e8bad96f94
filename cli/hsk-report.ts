#!/usr/bin/env -S npx tsx
import { runCli } from "@/lib/cli/main";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[hsk-report] unexpected failure:", err);
    process.exitCode = 1;
  }
);

#!/usr/bin/env node
import "dotenv/config";
import { CommanderError } from "commander";
import { runCli } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[wayfinder] Unhandled rejection:", reason);
  process.exit(1);
});

try {
  await runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
} catch (err) {
  if (err instanceof CommanderError) {
    // Help and version exit through here with code 0
    process.exitCode = err.exitCode;
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

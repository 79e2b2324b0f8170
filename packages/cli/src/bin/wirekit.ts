#!/usr/bin/env node
import { main } from "../run.js";

main(process.argv.slice(2), { cwd: process.cwd() })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[wirekit] Fatal error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });

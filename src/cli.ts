#!/usr/bin/env node

import { runCli } from "./main.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Unexpected error:", error);
    process.exit(1);
  });

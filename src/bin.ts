#!/usr/bin/env node

import { main } from "./cli.js";
import { createChildLogger } from "./logger.js";

process.exitCode = main(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  logger: createChildLogger({ component: "cli" }),
});

#!/usr/bin/env node
import { createCli } from "./cli/program.js";

process.once("SIGINT", () => {
  process.stderr.write("\nReport generation cancelled by user\n");
  process.exit(1);
});

await createCli().runExit(process.argv.slice(2));

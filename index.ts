#!/usr/bin/env node
import chalk from "chalk";

import { main } from "./cli";

const controller = new AbortController();

// First Ctrl-C stops after the current chunk, a second one exits at once
process.once("SIGINT", () => {
  process.stderr.write(
    chalk.yellow("\nInterrupted, finishing the current chunk...\n")
  );
  controller.abort();
});

main(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.bold.red("Unexpected error:"), error);
    process.exitCode = 1;
  }
);

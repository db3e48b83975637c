#!/usr/bin/env node

import { CommanderError } from "commander";
import chalk from "chalk";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { createProgram } from "./program.js";
import { formatErrorLines } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

const program = createProgram({ version: packageJson.version });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed help, version or a usage error
    process.exit(error.exitCode);
  }

  logger.debug({ err: error }, "command failed");
  const [message, ...hints] = formatErrorLines(error);
  console.error(chalk.red(`Error: ${message}`));
  for (const hint of hints) {
    console.error(chalk.dim(hint));
  }
  process.exit(1);
});

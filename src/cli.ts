#!/usr/bin/env node
/* eslint-disable no-console */
import process from "node:process";
import { loadConfig } from "./config.js";
import { TagcaseError, errorMessage } from "./engine/errors.js";
import { type CliOptions, formatProgress, parseArguments } from "./cliArgs.js";
import { logger } from "./logger.js";
import { start, SERVER_VERSION } from "./server.js";
import { runSuite } from "./suite.js";

function printHelp(): void {
  console.log(
    `tagcase v${SERVER_VERSION}\n\n` +
      `Usage:\n` +
      `  tagcase run <input.csv> [--config <file>] [--output <dir>]\n` +
      `  tagcase serve\n\n` +
      `Options:\n` +
      `  --config <file>  JSON configuration file\n` +
      `  --output <dir>   Directory for result, summary and log files\n` +
      `  --help, -h       Show this help message\n` +
      `  --version, -v    Print the current version`,
  );
}

async function runCommand(options: CliOptions & { inputFile: string }): Promise<number> {
  const config = await loadConfig({
    file: options.configFile ?? (process.env.TAGCASE_CONFIG || undefined),
    overrides: { outputDir: options.outputDir },
  });

  const { executionId, report, paths } = await runSuite({
    inputFile: options.inputFile,
    config,
    echoLogs: false,
    hooks: {
      onCaseComplete: (result, progress) => {
        console.log(formatProgress(result, progress.index, progress.total, config.identifierTag, config.typeTag));
      },
    },
  });

  const { total, passed, failed } = report.totals;
  console.log(`\nExecution ${executionId}: ${total} cases, ${passed} passed, ${failed} failed`);
  console.log(`Results: ${paths.resultFile}`);
  console.log(`Summary: ${paths.summaryFile}`);
  console.log(`Summary by type: ${paths.summaryByTypeFile}`);
  console.log(`Log: ${paths.logFile}`);

  return failed > 0 ? 1 : 0;
}

async function main(): Promise<void> {
  const cliOptions = parseArguments(process.argv.slice(2));

  if (cliOptions.showVersion) {
    console.log(`tagcase v${SERVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  if (cliOptions.errors.length > 0) {
    cliOptions.errors.forEach((message) => console.error(message));
    printHelp();
    process.exitCode = 2;
    return;
  }

  const { inputFile } = cliOptions;
  if (cliOptions.command === "run" && inputFile) {
    try {
      process.exitCode = await runCommand({ ...cliOptions, inputFile });
    } catch (error) {
      const message = error instanceof TagcaseError ? `${error.code}: ${error.message}` : errorMessage(error);
      logger.error("Suite run failed", "cli", { error: message });
      process.exitCode = 1;
    }
    return;
  }

  try {
    await start();
  } catch (error) {
    logger.error("Failed to start tagcase server", "cli", { error });
    process.exitCode = 1;
  }
}

void main();

import type { CaseResult } from "./schema/result.js";

type Command = "run" | "serve";

export interface CliOptions {
  command: Command;
  inputFile?: string;
  configFile?: string;
  outputDir?: string;
  showHelp: boolean;
  showVersion: boolean;
  errors: string[];
}

export function parseArguments(args: string[]): CliOptions {
  const options: CliOptions = { command: "serve", showHelp: false, showVersion: false, errors: [] };
  const positional: string[] = [];

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === "--help" || arg === "-h") {
      options.showHelp = true;
    } else if (arg === "--version" || arg === "-v") {
      options.showVersion = true;
    } else if (arg === "--config" || arg === "--output") {
      const value = args[index + 1];
      if (value === undefined || value.startsWith("-")) {
        options.errors.push(`${arg} requires a value`);
        continue;
      }
      index += 1;
      if (arg === "--config") {
        options.configFile = value;
      } else {
        options.outputDir = value;
      }
    } else if (arg.startsWith("-")) {
      options.errors.push(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, inputFile, ...extra] = positional;
  if (command === "run") {
    options.command = "run";
    options.inputFile = inputFile;
    if (!inputFile) {
      options.errors.push("run requires an input CSV file");
    }
  } else if (command !== undefined && command !== "serve") {
    options.errors.push(`Unknown command ${command}`);
  }
  if (extra.length > 0) {
    options.errors.push(`Unexpected arguments: ${extra.join(" ")}`);
  }

  return options;
}

export function formatProgress(result: CaseResult, index: number, total: number, identifierTag = "11", typeTag = "35") {
  const identifier = result.correlationKey?.identifier ?? "N/A";
  const type = result.messageType || "MISSING";
  return `[${index}/${total}] ${result.useCaseId} ${result.testCaseId} ${identifierTag}=${identifier} ${typeTag}=${type} ${result.outcome}`;
}

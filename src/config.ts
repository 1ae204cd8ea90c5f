import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "./engine/errors.js";

export const SOH = "\x01";

const tagSchema = z.string().trim().regex(/^\d+$/, "Tags are numeric field identifiers");
const delimiterSchema = z
  .string()
  .min(1, "Delimiters cannot be empty")
  .refine((value) => !value.includes("="), "Delimiters cannot contain '='");

export const runnerConfigSchema = z
  .object({
    fieldDelimiter: delimiterSchema.default("|"),
    wireDelimiter: delimiterSchema.default(SOH),
    multiValueDelimiter: delimiterSchema.default("~"),
    identifierTag: tagSchema.default("11"),
    typeTag: tagSchema.default("35"),
    parentTag: tagSchema.default("41"),
    timestampTag: tagSchema.default("52"),
    idSuffixLength: z.number().int().min(4).max(32).default(8),
    maxAttempts: z.number().int().min(1).default(8),
    retryDelayMs: z.number().int().min(0).default(500),
    transportCommand: z.string().trim().min(1).default("./send_fix_message.sh"),
    recordStorePath: z.string().trim().min(1).default("./logs/Current"),
    outputDir: z.string().trim().min(1).default("output"),
  })
  .strict()
  .refine((config) => config.fieldDelimiter !== config.multiValueDelimiter, {
    message: "fieldDelimiter and multiValueDelimiter must differ",
    path: ["multiValueDelimiter"],
  });

export type RunnerConfig = z.output<typeof runnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof runnerConfigSchema>;

const ENV_KEYS = {
  TAGCASE_FIELD_DELIMITER: "fieldDelimiter",
  TAGCASE_WIRE_DELIMITER: "wireDelimiter",
  TAGCASE_MULTI_VALUE_DELIMITER: "multiValueDelimiter",
  TAGCASE_MAX_ATTEMPTS: "maxAttempts",
  TAGCASE_RETRY_DELAY_MS: "retryDelayMs",
  TAGCASE_TRANSPORT_COMMAND: "transportCommand",
  TAGCASE_RECORD_STORE_PATH: "recordStorePath",
  TAGCASE_OUTPUT_DIR: "outputDir",
} as const satisfies Record<string, keyof RunnerConfig>;

const NUMERIC_KEYS = new Set<keyof RunnerConfig>(["maxAttempts", "retryDelayMs"]);

function decodeDelimiter(value: string): string {
  return value.toUpperCase() === "SOH" ? SOH : value;
}

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.length === 0) {
      continue;
    }
    if (NUMERIC_KEYS.has(configKey)) {
      const parsed = Number(raw);
      if (!Number.isFinite(parsed)) {
        throw new ConfigError(`${envKey} must be a number, received '${raw}'`);
      }
      result[configKey] = parsed;
    } else if (configKey.endsWith("Delimiter")) {
      result[configKey] = decodeDelimiter(raw);
    } else {
      result[configKey] = raw;
    }
  }
  return result;
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read config file ${path}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ConfigError(`Config file ${path} is not valid JSON`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  const entries = Object.entries(parsed).map(([key, value]): [string, unknown] => [
    key,
    key.endsWith("Delimiter") && typeof value === "string" ? decodeDelimiter(value) : value,
  ]);
  return Object.fromEntries(entries);
}

export function parseConfig(input: unknown): RunnerConfig {
  const result = runnerConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RunnerConfigInput;
}

/** Defaults < JSON file < environment < explicit overrides. */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RunnerConfig> {
  const fromFile = options.file ? await readConfigFile(options.file) : {};
  const fromEnv = configFromEnv(options.env ?? process.env);
  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined),
  );
  return parseConfig({ ...fromFile, ...fromEnv, ...overrides });
}

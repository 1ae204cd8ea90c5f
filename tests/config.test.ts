import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { SOH, configFromEnv, loadConfig, parseConfig } from "../src/config.js";
import { ConfigError } from "../src/engine/errors.js";

const tempDir = mkdtempSync(join(tmpdir(), "tagcase-config-"));

describe("configuration", () => {
  it("falls back to defaults", async () => {
    const config = await loadConfig({ env: {} });

    expect(config).toMatchObject({
      fieldDelimiter: "|",
      wireDelimiter: SOH,
      multiValueDelimiter: "~",
      identifierTag: "11",
      typeTag: "35",
      parentTag: "41",
      timestampTag: "52",
      idSuffixLength: 8,
      maxAttempts: 8,
      retryDelayMs: 500,
      outputDir: "output",
    });
  });

  it("reads environment variables", () => {
    expect(
      configFromEnv({ TAGCASE_MAX_ATTEMPTS: "3", TAGCASE_WIRE_DELIMITER: "soh", TAGCASE_FIELD_DELIMITER: ";" }),
    ).toEqual({ maxAttempts: 3, wireDelimiter: SOH, fieldDelimiter: ";" });
  });

  it("rejects a non-numeric attempt count", () => {
    expect(() => configFromEnv({ TAGCASE_MAX_ATTEMPTS: "abc" })).toThrow(
      new ConfigError("TAGCASE_MAX_ATTEMPTS must be a number, received 'abc'"),
    );
  });

  it("layers file, environment and overrides", async () => {
    const file = join(tempDir, "layered.json");
    writeFileSync(file, JSON.stringify({ maxAttempts: 5, retryDelayMs: 10, outputDir: "from-file" }));

    const config = await loadConfig({
      file,
      env: { TAGCASE_RETRY_DELAY_MS: "20" },
      overrides: { outputDir: "from-cli", maxAttempts: undefined },
    });

    expect(config.maxAttempts).toBe(5);
    expect(config.retryDelayMs).toBe(20);
    expect(config.outputDir).toBe("from-cli");
  });

  it("rejects invalid files", async () => {
    const file = join(tempDir, "broken.json");
    writeFileSync(file, "{ not json");

    await expect(loadConfig({ file, env: {} })).rejects.toThrow(`Config file ${file} is not valid JSON`);
    await expect(loadConfig({ file: join(tempDir, "missing.json"), env: {} })).rejects.toThrow(ConfigError);
  });

  it("rejects clashing delimiters and unknown keys", () => {
    expect(() => parseConfig({ fieldDelimiter: "~" })).toThrow(
      "Invalid configuration: multiValueDelimiter: fieldDelimiter and multiValueDelimiter must differ",
    );
    expect(() => parseConfig({ retries: 3 })).toThrow(ConfigError);
  });
});

import { describe, expect, it } from "vitest";
import { formatProgress, parseArguments } from "../src/cliArgs.js";
import type { CaseResult } from "../src/schema/result.js";

describe("parseArguments", () => {
  it("serves by default", () => {
    expect(parseArguments([])).toMatchObject({ command: "serve", errors: [] });
    expect(parseArguments(["serve"])).toMatchObject({ command: "serve", errors: [] });
  });

  it("reads the run command and its options", () => {
    expect(parseArguments(["run", "cases.csv", "--output", "out", "--config", "tagcase.json"])).toMatchObject({
      command: "run",
      inputFile: "cases.csv",
      outputDir: "out",
      configFile: "tagcase.json",
      errors: [],
    });
  });

  it("collects usage errors", () => {
    expect(parseArguments(["run"]).errors).toEqual(["run requires an input CSV file"]);
    expect(parseArguments(["run", "a.csv", "--config"]).errors).toEqual(["--config requires a value"]);
    expect(parseArguments(["deploy"]).errors).toEqual(["Unknown command deploy"]);
    expect(parseArguments(["run", "a.csv", "--fast"]).errors).toEqual(["Unknown option --fast"]);
  });

  it("recognises help and version flags", () => {
    expect(parseArguments(["-h"]).showHelp).toBe(true);
    expect(parseArguments(["--version"]).showVersion).toBe(true);
  });
});

describe("formatProgress", () => {
  const result: CaseResult = {
    useCaseId: "UC1",
    templateId: "TC1",
    testCaseId: "TC1-F",
    correlationKey: { identifier: "TC1_2", type: "F" },
    messageType: "F",
    outcome: "PASS",
    reasonCode: "VALIDATED",
    reasons: [],
    expectedOutcome: true,
    validatorPassed: true,
    sentMessage: "",
    receivedMessage: "",
  };

  it("prints position, identity, key and outcome", () => {
    expect(formatProgress(result, 2, 2)).toBe("[2/2] UC1 TC1-F 11=TC1_2 35=F PASS");
  });

  it("marks cases that never got a key", () => {
    expect(formatProgress({ ...result, correlationKey: null, messageType: "", outcome: "FAIL" }, 1, 1)).toBe(
      "[1/1] UC1 TC1-F 11=N/A 35=MISSING FAIL",
    );
  });
});

import { readFile } from "node:fs/promises";
import Papa, { type ParseError } from "papaparse";
import { z } from "zod";
import type { CaseTemplate } from "../schema/case.js";
import type { SuiteRow } from "../engine/runner.js";

const TRUE_VALUES = new Set(["", "true", "pass", "yes", "y", "1"]);
const FALSE_VALUES = new Set(["false", "fail", "no", "n", "0"]);

export function parseExpectedOutcome(value: string | undefined): boolean | null {
  const normalized = (value ?? "").trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return null;
}

const csvRowSchema = z.object({
  UseCaseID: z.string().trim().min(1, "UseCaseID is required"),
  TestCaseID: z.string().trim().min(1, "TestCaseID is required"),
  BaseMessage: z.string().trim().min(1, "BaseMessage is required"),
  TagsToUpdate: z.string().trim().default(""),
  TagsToValidate: z.string().trim().default(""),
  ExpectedValidationResult: z.string().optional(),
  ValidationResult: z.string().optional(),
});

export type CsvRow = z.infer<typeof csvRowSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`).join("; ");
}

type RawRow = Record<string, unknown>;

function cell(raw: RawRow, column: string): string {
  const value = raw[column];
  return typeof value === "string" ? value.trim() : "";
}

function invalidRow(raw: RawRow, rowNumber: number, message: string): SuiteRow {
  return {
    ok: false,
    failure: {
      rowNumber,
      useCaseId: cell(raw, "UseCaseID") || "(unknown)",
      testCaseId: cell(raw, "TestCaseID") || `row-${rowNumber}`,
      message,
    },
  };
}

export function rowToTemplate(raw: RawRow, rowNumber: number): SuiteRow {
  const parsed = csvRowSchema.safeParse(raw);
  if (!parsed.success) {
    return invalidRow(raw, rowNumber, describeIssues(parsed.error));
  }

  const row = parsed.data;
  const outcomeText = row.ExpectedValidationResult ?? row.ValidationResult;
  const expectedOutcome = parseExpectedOutcome(outcomeText);
  if (expectedOutcome === null) {
    return invalidRow(raw, rowNumber, `ExpectedValidationResult must be true or false, received '${outcomeText}'`);
  }

  const template: CaseTemplate = {
    useCaseId: row.UseCaseID,
    testCaseId: row.TestCaseID,
    baseMessage: row.BaseMessage,
    updateSpec: row.TagsToUpdate,
    validateSpec: row.TagsToValidate,
    expectedOutcome,
    rowNumber,
  };
  return { ok: true, template: Object.freeze(template) };
}

function isBlank(raw: RawRow): boolean {
  return Object.values(raw).every((value) => typeof value === "string" && value.trim() === "");
}

/**
 * Maps papaparse errors to indexes into `data`. Quote errors count the
 * header line, field count errors do not. Errors without a data row apply
 * to every row.
 */
function errorsByRow(errors: ParseError[]): { byRow: Map<number, string[]>; everyRow: string[] } {
  const byRow = new Map<number, string[]>();
  const everyRow: string[] = [];
  for (const error of errors) {
    const index = error.row === undefined ? -1 : error.type === "Quotes" ? error.row - 1 : error.row;
    if (index < 0) {
      everyRow.push(error.message);
      continue;
    }
    byRow.set(index, [...(byRow.get(index) ?? []), error.message]);
  }
  return { byRow, everyRow };
}

/**
 * Header row names the columns; blank lines are skipped. A line papaparse
 * could not split cleanly (too few or too many fields, broken quoting)
 * becomes an INVALID_ROW failure instead of running on salvaged cells.
 */
export function parseCaseTemplates(text: string): SuiteRow[] {
  // Blank lines are dropped below, not by skipEmptyLines, so error rows match data indexes.
  const parsed = Papa.parse<RawRow>(text, {
    header: true,
    delimiter: ",",
    transformHeader: (header) => header.replace(/^\uFEFF/, "").trim(),
  });
  const { byRow, everyRow } = errorsByRow(parsed.errors);

  const rows: SuiteRow[] = [];
  parsed.data.forEach((raw, index) => {
    if (isBlank(raw)) {
      return;
    }
    const rowNumber = rows.length + 1;
    const problems = [...(byRow.get(index) ?? []), ...everyRow];
    rows.push(
      problems.length > 0
        ? invalidRow(raw, rowNumber, `Malformed CSV line: ${problems.join("; ")}`)
        : rowToTemplate(raw, rowNumber),
    );
  });
  return rows;
}

export async function readCaseTemplates(path: string): Promise<SuiteRow[]> {
  const text = await readFile(path, "utf8");
  return parseCaseTemplates(text);
}

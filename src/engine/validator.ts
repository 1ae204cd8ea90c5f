import type { ReadonlyFieldMap } from "../schema/case.js";

export interface ValidationOutcome {
  passed: boolean;
  reasons: string[];
}

export type CompiledPattern = { ok: true; regex: RegExp } | { ok: false; error: string };

/**
 * Full-match patterns compiled at most once. One cache is shared by all the
 * cases expanded from a single row.
 */
export class PatternCache {
  private readonly compiled = new Map<string, CompiledPattern>();

  get(pattern: string): CompiledPattern {
    let entry = this.compiled.get(pattern);
    if (!entry) {
      try {
        entry = { ok: true, regex: new RegExp(`^(?:${pattern})$`) };
      } catch (error) {
        entry = { ok: false, error: error instanceof Error ? error.message : String(error) };
      }
      this.compiled.set(pattern, entry);
    }
    return entry;
  }
}

export function validate(
  expected: ReadonlyFieldMap,
  actual: ReadonlyFieldMap,
  patterns: PatternCache = new PatternCache(),
): ValidationOutcome {
  let passed = true;
  const reasons: string[] = [];

  for (const [tag, pattern] of expected) {
    const actualValue = actual.get(tag);

    if (pattern === "") {
      if (actualValue === undefined) {
        reasons.push(`PASS: Tag ${tag} correctly absent`);
      } else {
        passed = false;
        reasons.push(`FAIL: Tag ${tag} expected absent but found ${actualValue}`);
      }
      continue;
    }

    const compiled = patterns.get(pattern);
    if (!compiled.ok) {
      passed = false;
      reasons.push(`FAIL: Tag ${tag} has invalid pattern ${pattern}: ${compiled.error}`);
    } else if (actualValue === undefined) {
      passed = false;
      reasons.push(`FAIL: Tag ${tag} missing. Pattern: ${pattern}`);
    } else if (!compiled.regex.test(actualValue)) {
      passed = false;
      reasons.push(`FAIL: Tag ${tag} mismatch. Pattern: ${pattern}, Actual: ${actualValue}`);
    } else {
      reasons.push(`PASS: Tag ${tag} matched ${pattern}`);
    }
  }

  return { passed, reasons };
}

/** A validator failure counts as a pass when the row expects failure, and vice versa. */
export function applyExpectedOutcome(validatorPassed: boolean, expectedOutcome: boolean): boolean {
  return validatorPassed !== !expectedOutcome;
}

import type { FieldMap, ReadonlyFieldMap } from "../schema/case.js";
import { DuplicateCaseError } from "./errors.js";

export type RegistryLookup =
  | { status: "found"; fields: ReadonlyFieldMap }
  | { status: "not-executed" };

/**
 * What was actually sent per TestCaseID during one run. Entries are written
 * once and never replaced.
 */
export class ResolvedRegistry {
  private readonly entries = new Map<string, FieldMap>();

  has(testCaseId: string): boolean {
    return this.entries.has(testCaseId);
  }

  record(testCaseId: string, fields: ReadonlyFieldMap): void {
    if (this.entries.has(testCaseId)) {
      throw new DuplicateCaseError(testCaseId);
    }
    this.entries.set(testCaseId, new Map(fields));
  }

  lookup(testCaseId: string): RegistryLookup {
    const fields = this.entries.get(testCaseId);
    return fields ? { status: "found", fields } : { status: "not-executed" };
  }
}

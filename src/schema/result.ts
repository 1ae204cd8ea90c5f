import type { CorrelationKey } from "./case.js";

export type CaseOutcome = "PASS" | "FAIL";

export type ReasonCode =
  | "VALIDATED"
  | "INVALID_ROW"
  | "EXPANSION_FAILED"
  | "PLACEHOLDER_UNRESOLVED"
  | "MISSING_TYPE_FIELD"
  | "DUPLICATE_CASE_ID"
  | "TRANSMISSION_FAILED"
  | "CORRELATION_TIMEOUT"
  | "UNEXPECTED_ERROR";

export interface CaseResult {
  useCaseId: string;
  templateId: string;
  testCaseId: string;
  correlationKey: CorrelationKey | null;
  messageType: string;
  outcome: CaseOutcome;
  reasonCode: ReasonCode;
  reasons: string[];
  expectedOutcome: boolean;
  /** Raw validator verdict before outcome inversion; null when validation never ran. */
  validatorPassed: boolean | null;
  /** Human-delimited text of what was sent, empty when nothing was dispatched. */
  sentMessage: string;
  receivedMessage: string;
}

export interface SummaryCounts {
  total: number;
  passed: number;
  failed: number;
}

export type SummaryFacet = "useCase" | "useCaseTestCaseType";

export interface SummaryRow extends SummaryCounts {
  useCaseId: string;
  testCaseId?: string;
  messageType?: string;
}

export interface RunSummaries {
  byUseCase: SummaryRow[];
  byTestCaseAndType: SummaryRow[];
}

export interface RunRecord {
  id: string;
  inputFile: string;
  executionId: string;
  startedAt: string;
  finishedAt: string;
  totals: SummaryCounts;
  summaries: RunSummaries;
  results: CaseResult[];
  reportFiles?: Record<string, string>;
}

import type { CaseResult, RunSummaries, SummaryCounts, SummaryFacet, SummaryRow } from "../schema/result.js";

const FACETS: readonly SummaryFacet[] = ["useCase", "useCaseTestCaseType"];

function facetKey(facet: SummaryFacet, result: CaseResult): string {
  return facet === "useCase"
    ? JSON.stringify([result.useCaseId])
    : JSON.stringify([result.useCaseId, result.templateId, result.messageType]);
}

function facetRow(facet: SummaryFacet, result: CaseResult): SummaryRow {
  return facet === "useCase"
    ? { useCaseId: result.useCaseId, total: 0, passed: 0, failed: 0 }
    : {
        useCaseId: result.useCaseId,
        testCaseId: result.templateId,
        messageType: result.messageType,
        total: 0,
        passed: 0,
        failed: 0,
      };
}

export class Aggregator {
  private readonly facets: Record<SummaryFacet, Map<string, SummaryRow>> = {
    useCase: new Map(),
    useCaseTestCaseType: new Map(),
  };
  private readonly totals: SummaryCounts = { total: 0, passed: 0, failed: 0 };

  record(result: CaseResult): void {
    for (const facet of FACETS) {
      const key = facetKey(facet, result);
      let row = this.facets[facet].get(key);
      if (!row) {
        row = facetRow(facet, result);
        this.facets[facet].set(key, row);
      }
      bump(row, result);
    }
    bump(this.totals, result);
  }

  rows(facet: SummaryFacet): SummaryRow[] {
    return Array.from(this.facets[facet].values(), (row) => ({ ...row }));
  }

  summaries(): RunSummaries {
    return {
      byUseCase: this.rows("useCase"),
      byTestCaseAndType: this.rows("useCaseTestCaseType"),
    };
  }

  overall(): SummaryCounts {
    return { ...this.totals };
  }
}

function bump(counts: SummaryCounts, result: CaseResult): void {
  counts.total += 1;
  if (result.outcome === "PASS") {
    counts.passed += 1;
  } else {
    counts.failed += 1;
  }
}

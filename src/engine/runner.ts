import type { RunnerConfig } from "../config.js";
import type { ComponentLogger } from "../logger.js";
import type { CaseTemplate, ConcreteCase, CorrelationKey, FieldMap } from "../schema/case.js";
import type { CaseResult, ReasonCode, RunSummaries, SummaryCounts } from "../schema/result.js";
import { Aggregator } from "./aggregator.js";
import { CorrelationClient, type RecordStore, type ReplyRecord, type Transport } from "./correlation.js";
import { CorrelationTimeoutError, ExpansionError, TagcaseError, TransmissionError, errorMessage } from "./errors.js";
import { expandTemplate } from "./expansion.js";
import { finalizeOutbound, type OutboundMessage } from "./message.js";
import { resolve, resolveMap } from "./placeholders.js";
import { ResolvedRegistry } from "./registry.js";
import { encode, translate } from "./tagCodec.js";
import { PatternCache, applyExpectedOutcome, validate } from "./validator.js";

export interface RunnerDeps {
  transport: Transport;
  recordStore: RecordStore;
  logger?: ComponentLogger;
  registry?: ResolvedRegistry;
  aggregator?: Aggregator;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  generateIdentifier?: (templateId: string) => string;
}

export interface CaseProgress {
  /** 1-based position within the row's expansion. */
  index: number;
  total: number;
}

export interface RunHooks {
  onCaseComplete?: (result: CaseResult, progress: CaseProgress) => void;
}

/** A CSV row that could not be turned into a template. */
export interface RowFailure {
  rowNumber: number;
  useCaseId: string;
  testCaseId: string;
  message: string;
}

export type SuiteRow = { ok: true; template: CaseTemplate } | { ok: false; failure: RowFailure };

export interface RunReport {
  results: CaseResult[];
  summaries: RunSummaries;
  totals: SummaryCounts;
}

interface FailureDetails {
  reasonCode: Exclude<ReasonCode, "VALIDATED">;
  reasons: string[];
  correlationKey?: CorrelationKey | null;
  messageType?: string;
  sentMessage?: string;
  receivedMessage?: string;
}

/**
 * Executes cases strictly one after another in expansion order so that a
 * `${caseId.tag}` reference only ever sees cases that already went out.
 */
export class SuiteRunner {
  readonly registry: ResolvedRegistry;
  readonly aggregator: Aggregator;
  private readonly client: CorrelationClient;
  private readonly now: () => Date;

  constructor(
    private readonly config: RunnerConfig,
    private readonly deps: RunnerDeps,
  ) {
    this.registry = deps.registry ?? new ResolvedRegistry();
    this.aggregator = deps.aggregator ?? new Aggregator();
    this.now = deps.now ?? (() => new Date());
    this.client = new CorrelationClient(config, {
      transport: deps.transport,
      recordStore: deps.recordStore,
      logger: deps.logger,
      sleep: deps.sleep,
    });
  }

  async run(templates: CaseTemplate[], hooks: RunHooks = {}): Promise<RunReport> {
    return this.runRows(
      templates.map((template): SuiteRow => ({ ok: true, template })),
      hooks,
    );
  }

  async runRows(rows: SuiteRow[], hooks: RunHooks = {}): Promise<RunReport> {
    const results: CaseResult[] = [];
    for (const row of rows) {
      const rowResults = row.ok
        ? await this.runTemplate(row.template, hooks)
        : [this.recordFailure(this.rowFailureResult(row.failure), { index: 1, total: 1 }, hooks)];
      results.push(...rowResults);
    }

    const totals = this.aggregator.overall();
    this.deps.logger?.info("Execution finished", totals);
    return { results, summaries: this.aggregator.summaries(), totals };
  }

  async runTemplate(template: CaseTemplate, hooks: RunHooks = {}): Promise<CaseResult[]> {
    this.deps.logger?.info("Processing row", {
      useCaseId: template.useCaseId,
      testCaseId: template.testCaseId,
      updateSpec: template.updateSpec,
      validateSpec: template.validateSpec,
    });

    let cases: ConcreteCase[];
    try {
      cases = expandTemplate(template, {
        config: this.config,
        generateIdentifier: this.deps.generateIdentifier,
      });
    } catch (error) {
      if (!(error instanceof ExpansionError)) {
        throw error;
      }
      this.deps.logger?.error("Row expansion failed", { testCaseId: template.testCaseId, error: error.message });
      const result = this.failure(
        { useCaseId: template.useCaseId, templateId: template.testCaseId, testCaseId: template.testCaseId },
        template.expectedOutcome,
        { reasonCode: "EXPANSION_FAILED", reasons: [error.message] },
      );
      return [this.recordFailure(result, { index: 1, total: 1 }, hooks)];
    }

    this.deps.logger?.info("Expanded row", {
      testCaseId: template.testCaseId,
      cases: cases.map((concrete) => concrete.testCaseId),
    });

    const patterns = new PatternCache();
    const results: CaseResult[] = [];
    for (const [position, concrete] of cases.entries()) {
      const result = await this.runCase(concrete, patterns);
      this.aggregator.record(result);
      hooks.onCaseComplete?.(result, { index: position + 1, total: cases.length });
      results.push(result);
    }
    return results;
  }

  async runCase(concrete: ConcreteCase, patterns: PatternCache = new PatternCache()): Promise<CaseResult> {
    try {
      return await this.executeCase(concrete, patterns);
    } catch (error) {
      this.deps.logger?.error("Unexpected error while executing case", {
        testCaseId: concrete.testCaseId,
        error: errorMessage(error),
      });
      return this.failure(concrete, concrete.expectedOutcome, {
        reasonCode: "UNEXPECTED_ERROR",
        reasons: [errorMessage(error)],
        messageType: this.declaredType(concrete),
      });
    }
  }

  private async executeCase(concrete: ConcreteCase, patterns: PatternCache): Promise<CaseResult> {
    const { fieldDelimiter, wireDelimiter } = this.config;
    const declaredType = this.declaredType(concrete);

    if (this.registry.has(concrete.testCaseId)) {
      return this.failure(concrete, concrete.expectedOutcome, {
        reasonCode: "DUPLICATE_CASE_ID",
        reasons: [`Test case ${concrete.testCaseId} was already executed in this run`],
        messageType: declaredType,
      });
    }

    let outbound: OutboundMessage;
    try {
      outbound = finalizeOutbound(concrete, this.buildLocalMessage(concrete), this.config, this.now);
    } catch (error) {
      if (error instanceof TagcaseError) {
        this.deps.logger?.error("Outbound message could not be built", {
          testCaseId: concrete.testCaseId,
          code: error.code,
          error: error.message,
        });
        return this.failure(concrete, concrete.expectedOutcome, {
          reasonCode: error.code === "MISSING_TYPE_FIELD" ? "MISSING_TYPE_FIELD" : "PLACEHOLDER_UNRESOLVED",
          reasons: [error.message],
          messageType: declaredType,
        });
      }
      throw error;
    }

    const sentMessage = encode(outbound.fields, fieldDelimiter);
    this.deps.logger?.info("Sending message", { testCaseId: concrete.testCaseId, message: sentMessage });

    try {
      await this.client.dispatch(outbound.fields);
    } catch (error) {
      if (error instanceof TransmissionError) {
        this.deps.logger?.error("Transmission failed", { testCaseId: concrete.testCaseId, error: error.message });
        return this.failure(concrete, concrete.expectedOutcome, {
          reasonCode: "TRANSMISSION_FAILED",
          reasons: [error.message],
          correlationKey: outbound.key,
          messageType: outbound.key.type,
          sentMessage,
        });
      }
      throw error;
    }
    this.registry.record(concrete.testCaseId, outbound.fields);

    let reply: ReplyRecord;
    try {
      reply = await this.client.awaitReply(outbound.key);
    } catch (error) {
      if (error instanceof CorrelationTimeoutError) {
        return this.failure(concrete, concrete.expectedOutcome, {
          reasonCode: "CORRELATION_TIMEOUT",
          reasons: [error.message],
          correlationKey: outbound.key,
          messageType: outbound.key.type,
          sentMessage,
        });
      }
      throw error;
    }

    const receivedMessage = translate(reply.line, wireDelimiter, fieldDelimiter);
    this.deps.logger?.info("Received reply", { testCaseId: concrete.testCaseId, message: receivedMessage });

    let expected: FieldMap;
    try {
      expected = resolveMap(concrete.validateMap, reply.fields, this.registry);
    } catch (error) {
      if (error instanceof TagcaseError) {
        return this.failure(concrete, concrete.expectedOutcome, {
          reasonCode: "PLACEHOLDER_UNRESOLVED",
          reasons: [`Validation placeholder resolution failed: ${error.message}`],
          correlationKey: outbound.key,
          messageType: outbound.key.type,
          sentMessage,
          receivedMessage,
        });
      }
      throw error;
    }

    const verdict = validate(expected, reply.fields, patterns);
    const passed = applyExpectedOutcome(verdict.passed, concrete.expectedOutcome);
    for (const reason of verdict.reasons) {
      this.deps.logger?.debug(reason, { testCaseId: concrete.testCaseId });
    }
    this.deps.logger?.[passed ? "info" : "error"](`Test case ${concrete.testCaseId} ${passed ? "PASS" : "FAIL"}`, {
      identifier: outbound.key.identifier,
      validatorPassed: verdict.passed,
      expectedOutcome: concrete.expectedOutcome,
    });

    return {
      useCaseId: concrete.useCaseId,
      templateId: concrete.templateId,
      testCaseId: concrete.testCaseId,
      correlationKey: outbound.key,
      messageType: outbound.key.type,
      outcome: passed ? "PASS" : "FAIL",
      reasonCode: "VALIDATED",
      reasons: verdict.reasons,
      expectedOutcome: concrete.expectedOutcome,
      validatorPassed: verdict.passed,
      sentMessage,
      receivedMessage,
    };
  }

  /**
   * Applies the case's updates to its base message one field at a time, so a
   * bare `${tag}` sees the message exactly as built so far.
   */
  private buildLocalMessage(concrete: ConcreteCase): FieldMap {
    const local: FieldMap = new Map(concrete.baseMessage);
    for (const [tag, raw] of concrete.updateMap) {
      const value = resolve(raw, local, this.registry);
      if (value === "") {
        local.delete(tag);
      } else {
        local.set(tag, value);
      }
    }
    return local;
  }

  private declaredType(concrete: ConcreteCase): string {
    const tag = this.config.typeTag;
    return concrete.updateMap.get(tag) || concrete.baseMessage.get(tag) || "";
  }

  private rowFailureResult(failure: RowFailure): CaseResult {
    this.deps.logger?.error("Invalid input row", { ...failure });
    return this.failure(
      { useCaseId: failure.useCaseId, templateId: failure.testCaseId, testCaseId: failure.testCaseId },
      true,
      { reasonCode: "INVALID_ROW", reasons: [`Row ${failure.rowNumber}: ${failure.message}`] },
    );
  }

  private recordFailure(result: CaseResult, progress: CaseProgress, hooks: RunHooks): CaseResult {
    this.aggregator.record(result);
    hooks.onCaseComplete?.(result, progress);
    return result;
  }

  private failure(
    identity: Pick<ConcreteCase, "useCaseId" | "templateId" | "testCaseId">,
    expectedOutcome: boolean,
    details: FailureDetails,
  ): CaseResult {
    this.deps.logger?.error(`Test case ${identity.testCaseId} FAIL`, {
      reasonCode: details.reasonCode,
      reasons: details.reasons,
    });
    return {
      useCaseId: identity.useCaseId,
      templateId: identity.templateId,
      testCaseId: identity.testCaseId,
      correlationKey: details.correlationKey ?? null,
      messageType: details.messageType ?? "",
      outcome: "FAIL",
      reasonCode: details.reasonCode,
      reasons: details.reasons,
      expectedOutcome,
      validatorPassed: null,
      sentMessage: details.sentMessage ?? "",
      receivedMessage: details.receivedMessage ?? "",
    };
  }
}

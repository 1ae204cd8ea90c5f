import { setTimeout as delay } from "node:timers/promises";
import type { RunnerConfig } from "../config.js";
import type { ComponentLogger } from "../logger.js";
import type { CorrelationKey, FieldMap, ReadonlyFieldMap } from "../schema/case.js";
import { CorrelationTimeoutError, TransmissionError, errorMessage } from "./errors.js";
import { decode, encode } from "./tagCodec.js";

export type SubmitResult = { ok: true } | { ok: false; detail: string };

/** Hands one wire-encoded message to the counterparty. Never returns the reply. */
export interface Transport {
  submit(message: string): Promise<SubmitResult>;
}

/** Append-only sequence of wire-encoded lines written by the counterparty. */
export interface RecordStore {
  readLines(): Promise<string[]>;
}

export interface ReplyRecord {
  line: string;
  fields: FieldMap;
  attempt: number;
}

export type CorrelationConfig = Pick<
  RunnerConfig,
  "wireDelimiter" | "identifierTag" | "typeTag" | "maxAttempts" | "retryDelayMs"
>;

export interface CorrelationDeps {
  transport: Transport;
  recordStore: RecordStore;
  logger?: ComponentLogger;
  sleep?: (ms: number) => Promise<void>;
}

export class CorrelationClient {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: CorrelationConfig,
    private readonly deps: CorrelationDeps,
  ) {
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  async dispatch(fields: ReadonlyFieldMap): Promise<string> {
    const message = encode(fields, this.config.wireDelimiter);
    let result: SubmitResult;
    try {
      result = await this.deps.transport.submit(message);
    } catch (error) {
      throw new TransmissionError(`Transport rejected message: ${errorMessage(error)}`);
    }
    if (!result.ok) {
      throw new TransmissionError(`Transport rejected message: ${result.detail}`);
    }
    this.deps.logger?.debug("Dispatched message", { identifier: fields.get(this.config.identifierTag) });
    return message;
  }

  matches(fields: ReadonlyFieldMap, key: CorrelationKey): boolean {
    return fields.get(this.config.identifierTag) === key.identifier && fields.get(this.config.typeTag) === key.type;
  }

  /**
   * Polls the record store until a line carries the key's identifier and type.
   * Each attempt waits `retryDelayMs` first and rescans from the top.
   */
  async retrieve(key: CorrelationKey): Promise<ReplyRecord | null> {
    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt += 1) {
      await this.sleep(this.config.retryDelayMs);
      const lines = await this.deps.recordStore.readLines();
      for (const line of lines) {
        const fields = decode(line, this.config.wireDelimiter);
        if (this.matches(fields, key)) {
          this.deps.logger?.debug("Correlated reply", { ...key, attempt });
          return { line: line.replace(/[\r\n]+$/, ""), fields, attempt };
        }
      }
    }
    this.deps.logger?.warn("No reply found", { ...key, attempts: this.config.maxAttempts });
    return null;
  }

  /** Like `retrieve`, but a missing reply throws CorrelationTimeoutError. */
  async awaitReply(key: CorrelationKey): Promise<ReplyRecord> {
    const reply = await this.retrieve(key);
    if (!reply) {
      throw new CorrelationTimeoutError(key, this.config.maxAttempts, this.config);
    }
    return reply;
  }
}

import type { CorrelationKey } from "../schema/case.js";
import type { ReasonCode } from "../schema/result.js";

export type ErrorCode = Exclude<ReasonCode, "VALIDATED" | "UNEXPECTED_ERROR"> | "INVALID_CONFIG";

export class TagcaseError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Ambiguous DSL text. Fails the whole row; other rows still run. */
export class ExpansionError extends TagcaseError {
  constructor(
    message: string,
    readonly testCaseId: string,
  ) {
    super("EXPANSION_FAILED", message);
  }
}

export class PlaceholderResolutionError extends TagcaseError {
  constructor(
    message: string,
    readonly token: string,
  ) {
    super("PLACEHOLDER_UNRESOLVED", message);
  }
}

export class MissingTypeFieldError extends TagcaseError {
  constructor(typeTag: string) {
    super("MISSING_TYPE_FIELD", `Mandatory tag ${typeTag} missing from outbound message`);
  }
}

export class DuplicateCaseError extends TagcaseError {
  constructor(readonly testCaseId: string) {
    super("DUPLICATE_CASE_ID", `Test case ${testCaseId} was already executed in this run`);
  }
}

export class TransmissionError extends TagcaseError {
  constructor(message: string) {
    super("TRANSMISSION_FAILED", message);
  }
}

export class CorrelationTimeoutError extends TagcaseError {
  constructor(
    readonly key: CorrelationKey,
    readonly attempts: number,
    tags: { identifierTag: string; typeTag: string },
  ) {
    super(
      "CORRELATION_TIMEOUT",
      `No reply with ${tags.identifierTag}=${key.identifier} and ${tags.typeTag}=${key.type} after ${attempts} attempts`,
    );
  }
}

export class ConfigError extends TagcaseError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

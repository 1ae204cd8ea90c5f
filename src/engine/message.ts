import type { RunnerConfig } from "../config.js";
import type { ConcreteCase, CorrelationKey, FieldMap, ReadonlyFieldMap } from "../schema/case.js";
import { MissingTypeFieldError } from "./errors.js";

export type MessageConfig = Pick<RunnerConfig, "identifierTag" | "typeTag" | "parentTag" | "timestampTag">;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** UTC timestamp as `YYYYMMDD-HH:MM:SS.sss`. */
export function formatUtcTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}.` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

export interface OutboundMessage {
  fields: FieldMap;
  key: CorrelationKey;
}

/**
 * Fills in the correlation fields a message needs before dispatch: the case
 * identifier, a timestamp when none is present, and the parent reference of
 * a chained secondary.
 */
export function finalizeOutbound(
  concrete: ConcreteCase,
  resolvedFields: ReadonlyFieldMap,
  config: MessageConfig,
  now: () => Date = () => new Date(),
): OutboundMessage {
  const fields: FieldMap = new Map(resolvedFields);

  if (!fields.get(config.identifierTag)) {
    fields.set(config.identifierTag, concrete.identifier);
  }
  if (!fields.get(config.timestampTag)) {
    fields.set(config.timestampTag, formatUtcTimestamp(now()));
  }
  if (concrete.role === "secondary" && !fields.get(config.parentTag)) {
    const parent = concrete.updateMap.get(config.parentTag);
    if (parent) {
      fields.set(config.parentTag, parent);
    }
  }

  const type = fields.get(config.typeTag);
  if (!type) {
    throw new MissingTypeFieldError(config.typeTag);
  }

  const identifier = fields.get(config.identifierTag) ?? concrete.identifier;
  return { fields, key: { identifier, type } };
}

import { randomUUID } from "node:crypto";
import type { RunnerConfig } from "../config.js";
import type { CaseTemplate, ConcreteCase, FieldMap } from "../schema/case.js";
import { ExpansionError } from "./errors.js";
import { decode } from "./tagCodec.js";

export type ExpansionConfig = Pick<
  RunnerConfig,
  "fieldDelimiter" | "multiValueDelimiter" | "identifierTag" | "typeTag" | "parentTag" | "idSuffixLength"
>;

export interface ExpansionOptions {
  config: ExpansionConfig;
  /** Produces a fresh correlation identifier for a row's TestCaseID. */
  generateIdentifier?: (templateId: string) => string;
}

interface SpecEntry {
  tag: string;
  values: string[];
}

export interface ParsedUpdateSpec {
  entries: SpecEntry[];
  axis?: SpecEntry;
  typeValues?: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `[60~61~62]=9` → `60=9|61=9|62=9`, using the configured delimiters. */
export function expandGroups(text: string, fieldDelimiter: string, multiValueDelimiter: string): string {
  const groupPattern = new RegExp(`\\[([^\\]]+)\\]=((?:(?!${escapeRegExp(fieldDelimiter)}).)*)`, "g");
  return text.replace(groupPattern, (_match, group: string, value: string) =>
    group
      .split(multiValueDelimiter)
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0)
      .map((tag) => `${tag}=${value}`)
      .join(fieldDelimiter),
  );
}

function parseEntries(text: string, config: ExpansionConfig): SpecEntry[] {
  const expanded = expandGroups(text, config.fieldDelimiter, config.multiValueDelimiter);
  const fields = decode(expanded, config.fieldDelimiter);
  return Array.from(fields, ([tag, value]) => ({
    tag,
    values: value.includes(config.multiValueDelimiter) ? value.split(config.multiValueDelimiter) : [value],
  }));
}

export function parseUpdateSpec(text: string, config: ExpansionConfig, testCaseId = ""): ParsedUpdateSpec {
  const entries = parseEntries(text, config);
  let axis: SpecEntry | undefined;
  let typeValues: string[] | undefined;

  for (const entry of entries) {
    if (entry.values.length < 2) {
      continue;
    }
    if (entry.tag === config.typeTag) {
      typeValues = entry.values;
      continue;
    }
    if (axis) {
      throw new ExpansionError(
        `Only one multi-valued tag (besides ${config.typeTag}) is allowed: found ${axis.tag} and ${entry.tag}`,
        testCaseId,
      );
    }
    axis = entry;
  }

  return { entries, axis, typeValues };
}

/** Tag → candidate values; a case at axis index i takes values[min(i, last)]. */
export function parseValidateSpec(text: string, config: ExpansionConfig): Map<string, string[]> {
  return new Map(parseEntries(text, config).map((entry) => [entry.tag, entry.values]));
}

function pick(values: string[], index: number): string {
  return values[Math.min(index, values.length - 1)] ?? "";
}

function defaultIdentifierFactory(suffixLength: number): (templateId: string) => string {
  return (templateId) => `${templateId}_${randomUUID().replace(/-/g, "").slice(0, suffixLength)}`;
}

function freezeCase(value: ConcreteCase): ConcreteCase {
  return Object.freeze(value);
}

/**
 * Turns one row into its concrete cases, in axis order, each chained
 * secondary directly after its primary.
 */
export function expandTemplate(template: CaseTemplate, options: ExpansionOptions): ConcreteCase[] {
  const { config } = options;
  const generateIdentifier = options.generateIdentifier ?? defaultIdentifierFactory(config.idSuffixLength);
  const update = parseUpdateSpec(template.updateSpec, config, template.testCaseId);
  const validate = parseValidateSpec(template.validateSpec, config);
  const baseMessage = decode(template.baseMessage, config.fieldDelimiter);

  const axisLength = update.axis?.values.length ?? 1;
  const [primaryType, ...chainedTypes] = update.typeValues ?? [];
  const secondaryTypes = chainedTypes.filter((type) => type.length > 0);
  const usedIds = new Set<string>();
  const uniqueId = (candidate: string): string => {
    let id = candidate;
    for (let n = 2; usedIds.has(id); n += 1) {
      id = `${candidate}-${n}`;
    }
    usedIds.add(id);
    return id;
  };

  const cases: ConcreteCase[] = [];
  for (let index = 0; index < axisLength; index += 1) {
    const updateMap: FieldMap = new Map();
    for (const entry of update.entries) {
      if (entry === update.axis) {
        updateMap.set(entry.tag, entry.values[index] ?? "");
      } else if (entry.tag === config.typeTag && primaryType !== undefined) {
        updateMap.set(entry.tag, primaryType);
      } else {
        updateMap.set(entry.tag, entry.values[0] ?? "");
      }
    }

    const validateMap: FieldMap = new Map();
    for (const [tag, values] of validate) {
      validateMap.set(tag, pick(values, index));
    }

    const pinned = updateMap.get(config.identifierTag);
    const identifier = pinned && pinned.length > 0 ? pinned : generateIdentifier(template.testCaseId);
    updateMap.set(config.identifierTag, identifier);

    const primaryId = uniqueId(axisLength > 1 ? `${template.testCaseId}-${index + 1}` : template.testCaseId);
    cases.push(
      freezeCase({
        useCaseId: template.useCaseId,
        templateId: template.testCaseId,
        testCaseId: primaryId,
        baseMessage,
        updateMap,
        validateMap,
        expectedOutcome: template.expectedOutcome,
        identifier,
        role: "primary",
      }),
    );

    for (const secondaryType of secondaryTypes) {
      const secondaryIdentifier = generateIdentifier(template.testCaseId);
      const secondaryUpdate: FieldMap = new Map(updateMap);
      secondaryUpdate.set(config.typeTag, secondaryType);
      secondaryUpdate.set(config.identifierTag, secondaryIdentifier);
      secondaryUpdate.set(config.parentTag, identifier);

      cases.push(
        freezeCase({
          useCaseId: template.useCaseId,
          templateId: template.testCaseId,
          testCaseId: uniqueId(`${primaryId}-${secondaryType}`),
          baseMessage,
          updateMap: secondaryUpdate,
          validateMap: new Map(validateMap),
          expectedOutcome: template.expectedOutcome,
          identifier: secondaryIdentifier,
          role: "secondary",
          parentTestCaseId: primaryId,
        }),
      );
    }
  }

  return cases;
}

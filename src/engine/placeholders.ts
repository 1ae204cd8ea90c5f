import type { FieldMap, ReadonlyFieldMap } from "../schema/case.js";
import { PlaceholderResolutionError } from "./errors.js";
import type { ResolvedRegistry } from "./registry.js";

const PLACEHOLDER_PATTERN = /\$\{([^}]*)\}/g;

export function hasPlaceholder(text: string): boolean {
  return text.includes("${");
}

function lookupToken(name: string, localMap: ReadonlyFieldMap, registry: ResolvedRegistry): string {
  const dot = name.indexOf(".");
  if (dot === -1) {
    const value = localMap.get(name);
    if (value === undefined) {
      throw new PlaceholderResolutionError(`Placeholder \${${name}} not found in current message`, name);
    }
    return value;
  }

  const caseId = name.slice(0, dot);
  const tag = name.slice(dot + 1);
  const entry = registry.lookup(caseId);
  if (entry.status === "not-executed") {
    throw new PlaceholderResolutionError(
      `Placeholder \${${name}} references test case ${caseId}, which has not been executed yet`,
      name,
    );
  }

  const value = entry.fields.get(tag);
  if (value === undefined) {
    throw new PlaceholderResolutionError(
      `Placeholder \${${name}} not found: test case ${caseId} sent no tag ${tag}`,
      name,
    );
  }
  return value;
}

/** Replaces every `${tag}` and `${caseId.tag}` in `text`. */
export function resolve(text: string, localMap: ReadonlyFieldMap, registry: ResolvedRegistry): string {
  if (!hasPlaceholder(text)) {
    return text;
  }
  return text.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
    lookupToken(name.trim(), localMap, registry),
  );
}

export function resolveMap(fields: ReadonlyFieldMap, localMap: ReadonlyFieldMap, registry: ResolvedRegistry): FieldMap {
  const resolved: FieldMap = new Map();
  for (const [tag, value] of fields) {
    resolved.set(tag, resolve(value, localMap, registry));
  }
  return resolved;
}

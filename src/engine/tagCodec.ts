import type { FieldMap, ReadonlyFieldMap } from "../schema/case.js";

/**
 * Splits `text` on `delimiter` and each token on its first `=`.
 * Tokens without `=` are dropped. A repeated key keeps its first position
 * and takes the last value. A line ending on `text` is removed; tokens are
 * kept as they are.
 */
export function decode(text: string, delimiter: string): FieldMap {
  const fields: FieldMap = new Map();
  for (const token of text.replace(/[\r\n]+$/, "").split(delimiter)) {
    const separator = token.indexOf("=");
    if (separator === -1) {
      continue;
    }
    fields.set(token.slice(0, separator), token.slice(separator + 1));
  }
  return fields;
}

export function encode(fields: ReadonlyFieldMap, delimiter: string): string {
  return Array.from(fields, ([tag, value]) => `${tag}=${value}`).join(delimiter);
}

/** Re-delimits a message line, e.g. wire SOH to the human `|` for reports. */
export function translate(text: string, from: string, to: string): string {
  return text.split(from).filter((token) => token.length > 0).join(to);
}

export function fieldMapToObject(fields: ReadonlyFieldMap): Record<string, string> {
  return Object.fromEntries(fields);
}

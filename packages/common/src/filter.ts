/**
 * @otptoken/common - Search filters
 *
 * Minimal RFC 4515 filter support: escaping for filter builders, and a
 * parser/evaluator used by the in-memory directory.
 *
 * @packageDocumentation
 */

import type { AttributeMap, AttributeValue } from "./types";

export type FilterNode =
  | { op: "and"; filters: FilterNode[] }
  | { op: "or"; filters: FilterNode[] }
  | { op: "not"; filter: FilterNode }
  | { op: "present"; attribute: string }
  | { op: "equal"; attribute: string; value: string }
  | { op: "substring"; attribute: string; parts: string[] };

/**
 * Escape a value for inclusion in a filter
 */
export function escapeFilterValue(value: string): string {
  return value.replace(
    /[\\*()\0]/g,
    (c) => "\\" + c.charCodeAt(0).toString(16).padStart(2, "0"),
  );
}

export class FilterSyntaxError extends Error {
  constructor(filter: string, position: number) {
    super(`Invalid filter ${filter} at position ${position}`);
    this.name = "FilterSyntaxError";
  }
}

/**
 * Parse a filter string
 */
export function parseFilter(filter: string): FilterNode {
  let pos = 0;

  const fail = (): never => {
    throw new FilterSyntaxError(filter, pos);
  };

  const expect = (c: string): void => {
    if (filter[pos] !== c) fail();
    pos++;
  };

  const parseList = (): FilterNode[] => {
    const filters: FilterNode[] = [];
    while (filter[pos] === "(") {
      filters.push(parseOne());
    }
    if (filters.length === 0) fail();
    return filters;
  };

  const parseOne = (): FilterNode => {
    expect("(");
    let node: FilterNode;
    switch (filter[pos]) {
      case "&":
        pos++;
        node = { op: "and", filters: parseList() };
        break;
      case "|":
        pos++;
        node = { op: "or", filters: parseList() };
        break;
      case "!":
        pos++;
        node = { op: "not", filter: parseOne() };
        break;
      default:
        node = parseItem();
    }
    expect(")");
    return node;
  };

  const parseItem = (): FilterNode => {
    const eq = filter.indexOf("=", pos);
    const close = filter.indexOf(")", pos);
    if (eq <= pos || close === -1 || eq > close) fail();

    const attribute = filter.slice(pos, eq);
    if (!/^[A-Za-z][\w-]*$/.test(attribute)) fail();
    const raw = filter.slice(eq + 1, close);
    pos = close;

    if (raw === "*") {
      return { op: "present", attribute };
    }
    const parts = raw.split("*").map(unescapeFilterValue);
    if (parts.length === 1) {
      return { op: "equal", attribute, value: parts[0] };
    }
    return { op: "substring", attribute, parts };
  };

  const node = parseOne();
  if (pos !== filter.length) fail();
  return node;
}

function unescapeFilterValue(value: string): string {
  return value.replace(/\\([0-9a-fA-F]{2})/g, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16)),
  );
}

/**
 * String forms of a stored value, compared case-insensitively
 */
function valueStrings(value: AttributeValue | undefined): string[] {
  if (value === undefined || value instanceof Uint8Array) return [];
  if (Array.isArray(value)) return value.map((v) => v.toLowerCase());
  if (value instanceof Date) return [value.toISOString().toLowerCase()];
  if (typeof value === "boolean") return [value ? "true" : "false"];
  return [String(value).toLowerCase()];
}

function getAttribute(
  entry: AttributeMap,
  attribute: string,
): AttributeValue | undefined {
  const wanted = attribute.toLowerCase();
  for (const [name, value] of Object.entries(entry)) {
    if (name.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function matchSubstring(candidate: string, parts: string[]): boolean {
  const [first, ...rest] = parts.map((p) => p.toLowerCase());
  if (!candidate.startsWith(first)) return false;
  let pos = first.length;
  const last = rest.pop() ?? "";
  for (const part of rest) {
    const idx = candidate.indexOf(part, pos);
    if (idx === -1) return false;
    pos = idx + part.length;
  }
  return candidate.length - last.length >= pos && candidate.endsWith(last);
}

/**
 * Evaluate a parsed filter against an entry
 */
export function matchFilter(node: FilterNode, entry: AttributeMap): boolean {
  switch (node.op) {
    case "and":
      return node.filters.every((f) => matchFilter(f, entry));
    case "or":
      return node.filters.some((f) => matchFilter(f, entry));
    case "not":
      return !matchFilter(node.filter, entry);
    case "present":
      return getAttribute(entry, node.attribute) !== undefined;
    case "equal": {
      const wanted = node.value.toLowerCase();
      return valueStrings(getAttribute(entry, node.attribute)).includes(wanted);
    }
    case "substring":
      return valueStrings(getAttribute(entry, node.attribute)).some((v) =>
        matchSubstring(v, node.parts),
      );
  }
}

/**
 * @otptoken/manager - Token type and schema resolution
 *
 * Maps the tagged Token variant to the flat attribute map handed to the
 * store, and stored entries back to TokenView.
 *
 * @packageDocumentation
 */

import {
  ATTR,
  INFO_FIELDS,
  KNOWN_TOKEN_TYPES,
  TOKEN_OBJECT_CLASS,
  TOKEN_TYPES,
  ValidationError,
  isTokenType,
  typeObjectClass,
  type AttributeMap,
  type AttributeValue,
  type Token,
  type TokenFindOptions,
  type TokenType,
  type TokenTypeLabel,
  type TokenView,
} from "@otptoken/common";

export const DEFAULT_TOKEN_TYPE: TokenType = "totp";

const TYPE_LABELS: Record<TokenType, TokenTypeLabel> = {
  totp: "TOTP",
  hotp: "HOTP",
};

/**
 * Resolve the requested token type (case-insensitive)
 * @throws ValidationError for a type outside the enumeration
 */
export function resolveTokenType(type?: string): TokenType {
  if (type === undefined) return DEFAULT_TOKEN_TYPE;

  const lower = type.toLowerCase();
  if (!isTokenType(lower)) {
    throw new ValidationError(
      "type",
      `must be one of ${KNOWN_TOKEN_TYPES.map((t) => `'${t}'`).join(", ")}`,
    );
  }
  return lower;
}

/**
 * Schema classes of a token of the given type
 */
export function tokenObjectClasses(type: TokenType): string[] {
  return [TOKEN_OBJECT_CLASS, typeObjectClass(type)];
}

/**
 * Drop every attribute belonging to another type's group
 */
export function pruneForeignAttributes(
  attributes: AttributeMap,
  type: TokenType,
): AttributeMap {
  const foreign = new Set(
    KNOWN_TOKEN_TYPES.filter((t) => t !== type).flatMap((t) => TOKEN_TYPES[t]),
  );
  return Object.fromEntries(
    Object.entries(attributes).filter(([name]) => !foreign.has(name)),
  );
}

/**
 * Storage form of a token
 */
export function tokenAttributes(token: Token): AttributeMap {
  const attributes: AttributeMap = {
    [ATTR.uniqueId]: token.id,
    [ATTR.key]: token.key,
    [ATTR.algorithm]: token.algorithm,
    [ATTR.digits]: token.digits,
    [ATTR.disabled]: token.disabled,
  };

  if (token.owner !== undefined) attributes[ATTR.owner] = token.owner;
  if (token.managedBy.length > 0) attributes[ATTR.managedBy] = [...token.managedBy];
  if (token.notBefore) attributes[ATTR.notBefore] = token.notBefore;
  if (token.notAfter) attributes[ATTR.notAfter] = token.notAfter;

  for (const field of INFO_FIELDS) {
    const value = token.info[field];
    if (value !== undefined) attributes[ATTR[field]] = value;
  }

  switch (token.type) {
    case "totp":
      attributes[ATTR.clockOffset] = token.clockOffset;
      attributes[ATTR.timeStep] = token.timeStep;
      break;
    case "hotp":
      attributes[ATTR.counter] = token.counter;
      break;
  }

  return pruneForeignAttributes(attributes, token.type);
}

export function stringValue(value: AttributeValue | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value[0];
  return undefined;
}

export function stringList(value: AttributeValue | undefined): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return [...value];
  return [];
}

function numberValue(value: AttributeValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function booleanValue(value: AttributeValue | undefined): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function dateValue(value: AttributeValue | undefined): Date | undefined {
  return value instanceof Date ? value : undefined;
}

/**
 * Token type read from the stored schema classes: the first class
 * naming a known type wins
 */
export function storedTokenType(entry: AttributeMap): TokenType | undefined {
  for (const cls of stringList(entry[ATTR.objectClass])) {
    const type = KNOWN_TOKEN_TYPES.find(
      (t) => typeObjectClass(t).toLowerCase() === cls.toLowerCase(),
    );
    if (type) return type;
  }
  return undefined;
}

function set<K extends keyof TokenView>(
  view: TokenView,
  key: K,
  value: TokenView[K] | undefined,
): void {
  if (value !== undefined) view[key] = value;
}

/**
 * Build the caller-facing view of a stored entry. Owner and manager
 * stay as stored references; the key is never copied.
 */
export function entryToView(
  entry: AttributeMap,
  options: TokenFindOptions = {},
): TokenView {
  const view: TokenView = { id: stringValue(entry[ATTR.uniqueId]) ?? "", info: {} };

  const type = storedTokenType(entry);
  if (type) view.type = TYPE_LABELS[type];

  if (options.pkeyOnly) return view;

  set(view, "owner", stringValue(entry[ATTR.owner]));
  if (entry[ATTR.managedBy] !== undefined) {
    view.managedBy = stringList(entry[ATTR.managedBy]);
  }
  set(view, "disabled", booleanValue(entry[ATTR.disabled]));
  set(view, "notBefore", dateValue(entry[ATTR.notBefore]));
  set(view, "notAfter", dateValue(entry[ATTR.notAfter]));
  set(view, "algorithm", stringValue(entry[ATTR.algorithm]));
  set(view, "digits", numberValue(entry[ATTR.digits]));
  set(view, "clockOffset", numberValue(entry[ATTR.clockOffset]));
  set(view, "timeStep", numberValue(entry[ATTR.timeStep]));
  set(view, "counter", numberValue(entry[ATTR.counter]));

  for (const field of INFO_FIELDS) {
    const value = stringValue(entry[ATTR[field]]);
    if (value !== undefined) view.info[field] = value;
  }

  if (options.all) {
    view.objectClass = stringList(entry[ATTR.objectClass]);
  }

  return view;
}

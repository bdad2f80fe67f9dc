/**
 * @otptoken/api - Request parsing
 *
 * Turns JSON bodies and query strings into typed manager parameters.
 *
 * @packageDocumentation
 */

import {
  ValidationError,
  type KeyParam,
  type TokenAddParams,
  type TokenFindOptions,
  type TokenFindParams,
  type TokenModParams,
} from "@otptoken/common";
import type { SyncParams } from "@otptoken/sync";

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Request body as a field map. A missing body is empty.
 */
export function fieldsOf(body: unknown): Fields {
  if (body === undefined || body === null) return {};
  if (!isFields(body)) {
    throw new ValidationError("body", "must be a JSON object");
  }
  return body;
}

function optionalString(fields: Fields, name: string): string | undefined {
  const value = fields[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(name, "must be a string");
  }
  return value;
}

function nullableString(fields: Fields, name: string): string | null | undefined {
  return fields[name] === null ? null : optionalString(fields, name);
}

function optionalNumber(fields: Fields, name: string): number | undefined {
  const value = fields[name];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new ValidationError(name, "must be a number");
  }
  return value;
}

function optionalBoolean(fields: Fields, name: string): boolean | undefined {
  const value = fields[name];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ValidationError(name, "must be a boolean");
  }
  return value;
}

function optionalDate(fields: Fields, name: string): Date | undefined {
  const value = optionalString(fields, name);
  if (value === undefined) return undefined;

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(name, "must be an ISO 8601 date");
  }
  return date;
}

function nullableDate(fields: Fields, name: string): Date | null | undefined {
  return fields[name] === null ? null : optionalDate(fields, name);
}

function keyParam(fields: Fields): KeyParam | undefined {
  const value = fields.key;
  if (value === undefined || typeof value === "string") return value;
  if (Array.isArray(value) && value.length === 2) {
    const [first, second] = value;
    if (typeof first === "string" && typeof second === "string") {
      return [first, second];
    }
  }
  throw new ValidationError("key", "must be a string or a pair of strings");
}

/**
 * Fields set once, on creation
 */
const WRITE_ONCE = [
  "id",
  "type",
  "key",
  "algorithm",
  "digits",
  "clockOffset",
  "timeStep",
  "counter",
];

export function parseAddParams(body: unknown): TokenAddParams {
  const fields = fieldsOf(body);
  return {
    id: optionalString(fields, "id"),
    type: optionalString(fields, "type"),
    owner: optionalString(fields, "owner"),
    manager: optionalString(fields, "manager"),
    key: keyParam(fields),
    algorithm: optionalString(fields, "algorithm"),
    digits: optionalNumber(fields, "digits"),
    clockOffset: optionalNumber(fields, "clockOffset"),
    timeStep: optionalNumber(fields, "timeStep"),
    counter: optionalNumber(fields, "counter"),
    disabled: optionalBoolean(fields, "disabled"),
    notBefore: optionalDate(fields, "notBefore"),
    notAfter: optionalDate(fields, "notAfter"),
    description: optionalString(fields, "description"),
    vendor: optionalString(fields, "vendor"),
    model: optionalString(fields, "model"),
    serial: optionalString(fields, "serial"),
  };
}

export function parseModParams(body: unknown): TokenModParams {
  const fields = fieldsOf(body);
  for (const name of WRITE_ONCE) {
    if (fields[name] !== undefined) {
      throw new ValidationError(name, "cannot be modified");
    }
  }
  return {
    owner: optionalString(fields, "owner"),
    manager: optionalString(fields, "manager"),
    disabled: optionalBoolean(fields, "disabled"),
    notBefore: nullableDate(fields, "notBefore"),
    notAfter: nullableDate(fields, "notAfter"),
    description: nullableString(fields, "description"),
    vendor: nullableString(fields, "vendor"),
    model: nullableString(fields, "model"),
    serial: nullableString(fields, "serial"),
  };
}

function queryString(query: Fields, name: string): string | undefined {
  const value = query[name];
  return typeof value === "string" ? value : undefined;
}

function queryFlag(query: Fields, name: string): boolean {
  const value = queryString(query, name);
  return value === "" || value === "1" || value === "true";
}

export function parseFindParams(query: Fields): TokenFindParams {
  const disabled = queryString(query, "disabled");
  if (disabled !== undefined && disabled !== "true" && disabled !== "false") {
    throw new ValidationError("disabled", "must be true or false");
  }
  return {
    criteria: queryString(query, "criteria"),
    type: queryString(query, "type"),
    owner: queryString(query, "owner"),
    disabled: disabled === undefined ? undefined : disabled === "true",
    vendor: queryString(query, "vendor"),
    model: queryString(query, "model"),
    serial: queryString(query, "serial"),
  };
}

/**
 * Output flags: ?all, ?raw and ?pkeyOnly
 */
export function parseOutputOptions(query: Fields): TokenFindOptions {
  return {
    all: queryFlag(query, "all"),
    raw: queryFlag(query, "raw"),
    pkeyOnly: queryFlag(query, "pkeyOnly"),
  };
}

/**
 * User list of a managedBy change: { "users": [...] }
 */
export function parseUsers(body: unknown): string[] {
  const users = fieldsOf(body).users;
  if (typeof users === "string") return [users];
  if (
    Array.isArray(users) &&
    users.length > 0 &&
    users.every((user): user is string => typeof user === "string")
  ) {
    return users;
  }
  throw new ValidationError("users", "must be a non-empty list of user ids");
}

function requiredString(fields: Fields, name: string): string {
  const value = optionalString(fields, name);
  if (value === undefined || value === "") {
    throw new ValidationError(name, "is required");
  }
  return value;
}

export function parseSyncParams(body: unknown): SyncParams {
  const fields = fieldsOf(body);
  return {
    user: requiredString(fields, "user"),
    password: requiredString(fields, "password"),
    firstCode: requiredString(fields, "firstCode"),
    secondCode: requiredString(fields, "secondCode"),
    token: optionalString(fields, "token"),
  };
}

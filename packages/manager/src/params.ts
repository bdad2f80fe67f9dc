/**
 * @otptoken/manager - Parameter validation
 *
 * @packageDocumentation
 */

import {
  ALGORITHMS,
  DIGITS,
  INFO_FIELDS,
  KNOWN_TOKEN_TYPES,
  ValidationError,
  type Algorithm,
  type Digits,
  type Token,
  type TokenAddParams,
  type TokenInfo,
  type TokenType,
} from "@otptoken/common";

export const DEFAULT_ALGORITHM: Algorithm = "sha1";
export const DEFAULT_DIGITS: Digits = 6;
export const DEFAULT_CLOCK_OFFSET = 0;
export const DEFAULT_TIME_STEP = 30;
export const MIN_TIME_STEP = 5;
export const DEFAULT_COUNTER = 0;
export const MIN_COUNTER = 0;

function quoted(values: readonly (string | number)[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}

export function parseAlgorithm(value?: string): Algorithm {
  if (value === undefined) return DEFAULT_ALGORITHM;
  const lower = value.toLowerCase();
  const algorithm = ALGORITHMS.find((a) => a === lower);
  if (!algorithm) {
    throw new ValidationError("algorithm", `must be one of ${quoted(ALGORITHMS)}`);
  }
  return algorithm;
}

export function parseDigits(value?: number): Digits {
  if (value === undefined) return DEFAULT_DIGITS;
  const digits = DIGITS.find((d) => d === value);
  if (!digits) {
    throw new ValidationError("digits", `must be one of ${quoted(DIGITS)}`);
  }
  return digits;
}

export function parseInteger(
  name: string,
  value: number | undefined,
  defaultValue: number,
  min?: number,
): number {
  if (value === undefined) return defaultValue;
  if (!Number.isInteger(value)) {
    throw new ValidationError(name, "must be an integer");
  }
  if (min !== undefined && value < min) {
    throw new ValidationError(name, `must be at least ${min}`);
  }
  return value;
}

export function checkDate(name: string, value?: Date | null): void {
  if (value && Number.isNaN(value.getTime())) {
    throw new ValidationError(name, "must be a valid date");
  }
}

export function checkId(id: string): void {
  if (id.trim() === "" || id.includes("\0")) {
    throw new ValidationError("id", "must be a non-empty string");
  }
}

function infoOf(params: TokenInfo): TokenInfo {
  const info: TokenInfo = {};
  for (const field of INFO_FIELDS) {
    const value = params[field];
    if (value !== undefined) info[field] = value;
  }
  return info;
}

/**
 * Token fields resolved on creation, before ownership
 */
export interface TokenSettings {
  id: string;
  type: TokenType;
  key: Uint8Array;
}

/**
 * Build the token of the requested type from the creation parameters.
 * Fields of the other type are not carried over.
 */
export function buildToken(
  settings: TokenSettings,
  params: TokenAddParams,
): Token {
  checkId(settings.id);
  checkDate("notBefore", params.notBefore);
  checkDate("notAfter", params.notAfter);

  const common = {
    id: settings.id,
    key: settings.key,
    managedBy: [],
    disabled: params.disabled ?? false,
    notBefore: params.notBefore,
    notAfter: params.notAfter,
    algorithm: parseAlgorithm(params.algorithm),
    digits: parseDigits(params.digits),
    info: infoOf(params),
  };

  switch (settings.type) {
    case "totp":
      return {
        ...common,
        type: "totp",
        clockOffset: parseInteger("clockOffset", params.clockOffset, DEFAULT_CLOCK_OFFSET),
        timeStep: parseInteger("timeStep", params.timeStep, DEFAULT_TIME_STEP, MIN_TIME_STEP),
      };
    case "hotp":
      return {
        ...common,
        type: "hotp",
        counter: parseInteger("counter", params.counter, DEFAULT_COUNTER, MIN_COUNTER),
      };
  }
}

const TYPE_FIELDS: Record<TokenType, readonly (keyof TokenAddParams)[]> = {
  totp: ["clockOffset", "timeStep"],
  hotp: ["counter"],
};

/**
 * Fields given for a type other than the requested one
 */
export function foreignFields(type: TokenType, params: TokenAddParams): string[] {
  return KNOWN_TOKEN_TYPES.filter((t) => t !== type).flatMap((t) =>
    TYPE_FIELDS[t].filter((name) => params[name] !== undefined),
  );
}

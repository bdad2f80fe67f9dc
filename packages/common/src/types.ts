/**
 * @otptoken/common - Types
 *
 * Token model shared by the otptoken packages. Tokens are handled as a
 * tagged variant in memory and as a flat attribute map at the storage
 * boundary.
 *
 * @packageDocumentation
 */

/**
 * Token types, as accepted on input
 */
export type TokenType = "totp" | "hotp";

/**
 * Token type as returned to callers
 */
export type TokenTypeLabel = Uppercase<TokenType>;

export const ALGORITHMS = ["sha1", "sha256", "sha384", "sha512"] as const;
export type Algorithm = (typeof ALGORITHMS)[number];

export const DIGITS = [6, 8] as const;
export type Digits = (typeof DIGITS)[number];

/**
 * Stored attribute names
 */
export const ATTR = {
  objectClass: "objectClass",
  uniqueId: "tokenUniqueId",
  description: "description",
  owner: "tokenOwner",
  managedBy: "managedBy",
  disabled: "tokenDisabled",
  notBefore: "tokenNotBefore",
  notAfter: "tokenNotAfter",
  vendor: "tokenVendor",
  model: "tokenModel",
  serial: "tokenSerial",
  key: "tokenOTPKey",
  algorithm: "tokenOTPAlgorithm",
  digits: "tokenOTPDigits",
  clockOffset: "tokenTOTPClockOffset",
  timeStep: "tokenTOTPTimeStep",
  counter: "tokenHOTPCounter",
} as const;

/**
 * Schema class carried by every token
 */
export const TOKEN_OBJECT_CLASS = "otpToken";

/**
 * Type-specific attribute groups. A stored token carries exactly the
 * group matching its type.
 */
export const TOKEN_TYPES: Readonly<Record<TokenType, readonly string[]>> = {
  totp: [ATTR.clockOffset, ATTR.timeStep],
  hotp: [ATTR.counter],
};

export const KNOWN_TOKEN_TYPES: readonly TokenType[] = ["totp", "hotp"];

export function isTokenType(value: unknown): value is TokenType {
  return KNOWN_TOKEN_TYPES.some((type) => type === value);
}

/**
 * Schema class tag for a token type (e.g. "otpTokenTOTP")
 */
export function typeObjectClass(type: TokenType): string {
  return `${TOKEN_OBJECT_CLASS}${type.toUpperCase()}`;
}

/**
 * Value of a stored attribute
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | Date
  | Uint8Array
  | string[];

/**
 * Flat attribute map exchanged with the store
 */
export type AttributeMap = Record<string, AttributeValue>;

/**
 * Partial modification; null removes the attribute
 */
export type AttributeChanges = Record<string, AttributeValue | null>;

/**
 * Free-text informational fields, carried without validation
 */
export interface TokenInfo {
  description?: string;
  vendor?: string;
  model?: string;
  serial?: string;
}

export const INFO_FIELDS = ["description", "vendor", "model", "serial"] as const;
export type InfoField = (typeof INFO_FIELDS)[number];

interface TokenCommon {
  id: string;
  /** Owner reference (storage-canonical) */
  owner?: string;
  /** Manager references (storage-canonical) */
  managedBy: string[];
  disabled: boolean;
  notBefore?: Date;
  notAfter?: Date;
  key: Uint8Array;
  algorithm: Algorithm;
  digits: Digits;
  info: TokenInfo;
}

export interface TOTPToken extends TokenCommon {
  type: "totp";
  clockOffset: number;
  timeStep: number;
}

export interface HOTPToken extends TokenCommon {
  type: "hotp";
  counter: number;
}

/**
 * Fully resolved token, ready to be stored
 */
export type Token = TOTPToken | HOTPToken;

/**
 * Token as returned to callers. The key is never part of it.
 */
export interface TokenView {
  id: string;
  /** Omitted when no known schema class is stored */
  type?: TokenTypeLabel;
  owner?: string;
  managedBy?: string[];
  disabled?: boolean;
  notBefore?: Date;
  notAfter?: Date;
  algorithm?: string;
  digits?: number;
  clockOffset?: number;
  timeStep?: number;
  counter?: number;
  info: TokenInfo;
  /** Schema classes, only with the "all" option */
  objectClass?: string[];
}

/**
 * Creation result: the view plus the one-time provisioning URI
 */
export interface TokenAddResult extends TokenView {
  uri: string;
}

/**
 * Key as supplied by a caller: raw bytes or base32 text
 */
export type KeyInput = string | Uint8Array;

/**
 * Key parameter, optionally with its confirmation
 */
export type KeyParam = KeyInput | readonly [KeyInput, KeyInput];

export interface TokenAddParams extends TokenInfo {
  id?: string;
  /** Token type (case-insensitive, default: totp) */
  type?: string;
  /** Owner identifier (default: caller) */
  owner?: string;
  /** Manager identifier (default: caller when the caller owns the token) */
  manager?: string;
  /** Key (default: random) */
  key?: KeyParam;
  algorithm?: string;
  digits?: number;
  clockOffset?: number;
  timeStep?: number;
  counter?: number;
  disabled?: boolean;
  notBefore?: Date;
  notAfter?: Date;
}

/**
 * Mutable fields. null clears an optional field.
 */
export interface TokenModParams {
  owner?: string;
  manager?: string;
  disabled?: boolean;
  notBefore?: Date | null;
  notAfter?: Date | null;
  description?: string | null;
  vendor?: string | null;
  model?: string | null;
  serial?: string | null;
}

export interface TokenFindParams {
  /** Substring matched against id and description */
  criteria?: string;
  type?: string;
  owner?: string;
  disabled?: boolean;
  vendor?: string;
  model?: string;
  serial?: string;
}

export interface TokenOutputOptions {
  /** Keep the schema classes in the output */
  all?: boolean;
  /** Return stored references untouched */
  raw?: boolean;
}

export interface TokenFindOptions extends TokenOutputOptions {
  /** Only return token ids */
  pkeyOnly?: boolean;
}

export interface TokenFindResult {
  count: number;
  result: TokenView[];
}

/**
 * Result of a membership change on managedBy
 */
export interface MembershipResult {
  completed: number;
  failed: Record<string, string>;
  result: TokenView;
}

/**
 * Per-call context
 */
export interface OperationContext {
  /** Identifier of the principal performing the call */
  caller?: string;
}

/**
 * @otptoken/types
 *
 * Ambient types shared by every otptoken package
 *
 * @packageDocumentation
 */

/**
 * Log levels, most severe first
 */
export const LOG_LEVELS = ["error", "warn", "notice", "info", "debug"] as const;

export type OTP_LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger handed to every component
 */
export interface OTP_Logger {
  error(message: string): void;
  warn(message: string): void;
  notice(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Resolved configuration
 */
export interface OTP_Conf {
  /** Realm name, used as provisioning issuer when the owner has none */
  realm: string;
  /** Directory base DN */
  basedn: string;
  /** Token container, relative to basedn */
  container: string;
  /** RPC endpoint the sync URI is derived from */
  xmlrpcUri?: string;
  /** Response header carrying the sync status */
  syncResultHeader: string;
  /** Owner attribute used as provisioning issuer */
  issuerAttribute: string;
  /** Logger threshold */
  logLevel: OTP_LogLevel;
}

export function isLogLevel(value: unknown): value is OTP_LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

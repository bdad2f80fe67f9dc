/**
 * @otptoken/logger
 *
 * Standard logger writing to the console, filtered by logLevel
 *
 * @packageDocumentation
 */

import {
  LOG_LEVELS,
  type OTP_Conf,
  type OTP_LogLevel,
  type OTP_Logger,
} from "@otptoken/types";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

/**
 * Console method used for each level
 */
const CONSOLE_METHODS: Record<OTP_LogLevel, ConsoleMethod> = {
  error: "error",
  warn: "warn",
  notice: "warn",
  info: "log",
  debug: "debug",
};

export const DEFAULT_LOG_LEVEL: OTP_LogLevel = "notice";

/**
 * Build a logger that drops messages below conf.logLevel
 */
export function createLogger(
  conf: Partial<Pick<OTP_Conf, "logLevel">> = {},
): OTP_Logger {
  const threshold = LOG_LEVELS.indexOf(conf.logLevel ?? DEFAULT_LOG_LEVEL);

  const write =
    (level: OTP_LogLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(level) > threshold) return;
      console[CONSOLE_METHODS[level]](message);
    };

  return {
    error: write("error"),
    warn: write("warn"),
    notice: write("notice"),
    info: write("info"),
    debug: write("debug"),
  };
}

/**
 * Wrap a logger so that every message carries a "[tag] " prefix
 */
export function withPrefix(logger: OTP_Logger, tag: string): OTP_Logger {
  const prefixed =
    (level: OTP_LogLevel) =>
    (message: string): void =>
      logger[level](`[${tag}] ${message}`);

  return {
    error: prefixed("error"),
    warn: prefixed("warn"),
    notice: prefixed("notice"),
    info: prefixed("info"),
    debug: prefixed("debug"),
  };
}

export default createLogger;

/**
 * @otptoken/conf
 *
 * Reads the [otptoken] section of an INI configuration file
 *
 * @packageDocumentation
 */

import { readFile } from "fs/promises";
import { parse } from "ini";
import { isLogLevel, type OTP_Conf } from "@otptoken/types";

export const DEFAULT_CONF_FILE = "/etc/otptoken/otptoken.ini";
export const CONF_FILE_ENV = "OTPTOKEN_CONFFILE";
export const CONF_SECTION = "otptoken";

/**
 * Defaults applied under every loaded configuration
 */
export const DEFAULT_CONF: Omit<OTP_Conf, "realm"> = {
  basedn: "",
  container: "cn=otp",
  syncResultHeader: "X-IPA-TokenSync-Result",
  issuerAttribute: "principalName",
  logLevel: "notice",
};

export interface LoadConfOptions {
  /** INI file path (default: $OTPTOKEN_CONFFILE or /etc/otptoken/otptoken.ini) */
  confFile?: string;
  /** Values taking precedence over the file */
  overrides?: Partial<OTP_Conf>;
}

export class ConfError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfError";
  }
}

/**
 * Resolve the configuration file path
 */
export function confFilePath(confFile?: string): string {
  return confFile ?? process.env[CONF_FILE_ENV] ?? DEFAULT_CONF_FILE;
}

/**
 * Build an OTP_Conf from an already parsed section
 */
export function buildConf(
  section: Record<string, unknown>,
  overrides: Partial<OTP_Conf> = {},
): OTP_Conf {
  const str = (key: keyof OTP_Conf): string | undefined => {
    const value = section[key];
    return typeof value === "string" && value !== "" ? value : undefined;
  };

  const logLevel = str("logLevel");
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfError(`Invalid logLevel: ${logLevel}`);
  }

  const conf: OTP_Conf = {
    realm: str("realm") ?? "",
    basedn: str("basedn") ?? DEFAULT_CONF.basedn,
    container: str("container") ?? DEFAULT_CONF.container,
    xmlrpcUri: str("xmlrpcUri"),
    syncResultHeader: str("syncResultHeader") ?? DEFAULT_CONF.syncResultHeader,
    issuerAttribute: str("issuerAttribute") ?? DEFAULT_CONF.issuerAttribute,
    logLevel: logLevel ?? DEFAULT_CONF.logLevel,
    ...overrides,
  };

  if (!conf.realm) {
    throw new ConfError("Missing realm in configuration");
  }
  return conf;
}

/**
 * Load configuration from an INI file
 */
export async function loadConf(options: LoadConfOptions = {}): Promise<OTP_Conf> {
  const file = confFilePath(options.confFile);

  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (e) {
    throw new ConfError(`Unable to read configuration file ${file}`, {
      cause: e,
    });
  }

  const parsed: Record<string, unknown> = parse(content);
  const section = parsed[CONF_SECTION];
  if (typeof section !== "object" || section === null) {
    throw new ConfError(`Missing [${CONF_SECTION}] section in ${file}`);
  }

  return buildConf(Object.fromEntries(Object.entries(section)), options.overrides);
}

export default loadConf;

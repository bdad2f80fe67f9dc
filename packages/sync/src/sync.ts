/**
 * @otptoken/sync - Token resynchronization
 *
 * Hands a user's two consecutive codes to the server endpoint that
 * realigns the token counter or clock. The core only builds the request
 * and reads back the status header.
 *
 * @packageDocumentation
 */

import { withPrefix } from "@otptoken/logger";
import type { OTP_Conf, OTP_Logger } from "@otptoken/types";

export const SYNC_STATUSES = [
  "ok",
  "error",
  "invalid-credentials",
  "unknown",
] as const;
export type SyncStatus = (typeof SYNC_STATUSES)[number];

/**
 * Human-readable message of each status
 */
export const SYNC_MESSAGES: Record<SyncStatus, string> = {
  ok: "Token synchronized.",
  error: "Error contacting server!",
  "invalid-credentials": "Invalid Credentials!",
  unknown: "Unknown Error!",
};

export function isSyncStatus(value: unknown): value is SyncStatus {
  return SYNC_STATUSES.some((status) => status === value);
}

export interface SyncParams {
  user: string;
  password: string;
  firstCode: string;
  secondCode: string;
  /** Token id; the server picks the user's token when absent */
  token?: string;
}

export interface SyncResult {
  status: SyncStatus;
  message: string;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TokenSyncClientOptions {
  conf: Pick<
    OTP_Conf,
    "xmlrpcUri" | "syncResultHeader" | "container" | "basedn"
  >;
  logger: OTP_Logger;
  /** Transport (default: global fetch) */
  fetch?: FetchLike;
}

export class SyncConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SyncConfigurationError";
  }
}

/**
 * Escape a value for use in a distinguished name (RFC 4514)
 */
export function escapeDnValue(value: string): string {
  return value
    .replace(/[\\,+"<>;=]/g, (c) => `\\${c}`)
    .replace(/^[ #]/, (c) => `\\${c}`)
    .replace(/ $/, "\\ ");
}

/**
 * Derive the resynchronization endpoint from the RPC endpoint
 * @throws SyncConfigurationError when the URI is missing or not https
 */
export function syncUri(xmlrpcUri?: string): string {
  if (!xmlrpcUri) {
    throw new SyncConfigurationError("xmlrpcUri is not configured");
  }
  const url = new URL(xmlrpcUri);
  if (url.protocol !== "https:") {
    throw new SyncConfigurationError(
      `Refusing to send credentials over ${url.protocol.slice(0, -1)}`,
    );
  }
  url.pathname = url.pathname.replace("/xml", "/session/sync_token");
  return url.toString();
}

/**
 * Client of the token resynchronization endpoint
 */
export class TokenSyncClient {
  private conf: TokenSyncClientOptions["conf"];
  private logger: OTP_Logger;
  private fetch: FetchLike;

  constructor(options: TokenSyncClientOptions) {
    this.conf = options.conf;
    this.logger = withPrefix(options.logger, "otptoken-sync");
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Directory reference of a token
   */
  tokenReference(id: string): string {
    return [`tokenUniqueId=${escapeDnValue(id)}`, this.conf.container, this.conf.basedn]
      .filter((part) => part !== "")
      .join(",");
  }

  /**
   * Form body of a resynchronization request
   */
  buildRequest(params: SyncParams): URLSearchParams {
    const body = new URLSearchParams({
      user: params.user,
      password: params.password,
      first_code: params.firstCode,
      second_code: params.secondCode,
    });
    if (params.token !== undefined) {
      body.set("token", this.tokenReference(params.token));
    }
    return body;
  }

  /**
   * Submit a resynchronization request
   */
  async sync(params: SyncParams): Promise<SyncResult> {
    const uri = syncUri(this.conf.xmlrpcUri);
    this.logger.debug(`Synchronizing token of ${params.user} at ${uri}`);

    const response = await this.fetch(uri, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: this.buildRequest(params).toString(),
    });

    let status: SyncStatus = "unknown";
    if (response.status === 200) {
      const value = response.headers.get(this.conf.syncResultHeader);
      if (isSyncStatus(value)) status = value;
    } else {
      this.logger.warn(`Synchronization endpoint returned ${response.status}`);
    }
    // Only the header is used
    await response.body?.cancel();

    if (status === "ok") {
      this.logger.info(`Synchronized token of ${params.user}`);
    }
    return { status, message: SYNC_MESSAGES[status] };
  }
}

export default TokenSyncClient;

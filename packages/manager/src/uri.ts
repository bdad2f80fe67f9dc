/**
 * @otptoken/manager - Provisioning URI
 *
 * Builds the otpauth:// URI handed to authenticator apps on enrollment.
 * The URI is the only place the key leaves the system in clear text.
 *
 * @packageDocumentation
 */

import type { IdentityDirectory, Token } from "@otptoken/common";
import { base32Encode } from "@otptoken/key";
import type { OTP_Conf, OTP_Logger } from "@otptoken/types";

/**
 * Issuer shown by authenticator apps: the owner's principal name, else
 * the realm. Lookup failures fall back on the realm.
 */
export async function resolveIssuer(
  identities: IdentityDirectory,
  conf: Pick<OTP_Conf, "realm" | "issuerAttribute">,
  logger: OTP_Logger,
  owner?: string,
): Promise<string> {
  if (owner === undefined) return conf.realm;

  try {
    const issuer = await identities.lookupAttribute(owner, conf.issuerAttribute);
    if (issuer) return issuer;
  } catch (e) {
    logger.debug(`Unable to read ${conf.issuerAttribute} of ${owner}: ${e}`);
  }
  return conf.realm;
}

/**
 * Percent-encode a label, keeping "/" and escaping every character
 * outside the RFC 3986 unreserved set
 */
export function quoteLabel(label: string): string {
  return encodeURIComponent(label)
    .replace(/%2F/gi, "/")
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Build the provisioning URI of a token
 *
 * otpauth://{type}/{issuer}:{id}?issuer=&secret=&digits=&algorithm=
 * followed by period (TOTP) or counter (HOTP)
 */
export function buildProvisioningUri(token: Token, issuer: string): string {
  const params = new URLSearchParams({
    issuer,
    secret: base32Encode(token.key),
    digits: String(token.digits),
    algorithm: token.algorithm.toUpperCase(),
  });

  switch (token.type) {
    case "totp":
      params.set("period", String(token.timeStep));
      break;
    case "hotp":
      params.set("counter", String(token.counter));
      break;
  }

  const label = quoteLabel(token.id);
  return `otpauth://${token.type}/${issuer}:${label}?${params.toString()}`;
}

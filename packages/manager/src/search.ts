/**
 * @otptoken/manager - Search filters
 *
 * @packageDocumentation
 */

import {
  ATTR,
  TOKEN_OBJECT_CLASS,
  escapeFilterValue,
  isTokenType,
  typeObjectClass,
  type TokenFindParams,
} from "@otptoken/common";

/**
 * Predicate matching tokens of every type
 */
export const TOKEN_PREDICATE = `(${ATTR.objectClass}=${TOKEN_OBJECT_CLASS})`;

/**
 * Narrow the generic token predicate to one type. Unknown or missing
 * types leave the filter as is; nothing else in it is touched.
 */
export function rewriteSearchFilter(filter: string, type?: string): string {
  const lower = type?.toLowerCase();
  if (!isTokenType(lower)) return filter;

  return filter
    .split(TOKEN_PREDICATE)
    .join(`(${ATTR.objectClass}=${typeObjectClass(lower)})`);
}

/**
 * Build the search filter for the given criteria
 * @param params Search criteria
 * @param owner Owner reference, already normalized
 */
export function buildSearchFilter(
  params: Omit<TokenFindParams, "owner" | "type">,
  owner?: string,
): string {
  const terms = [TOKEN_PREDICATE];

  if (params.criteria) {
    const value = escapeFilterValue(params.criteria);
    terms.push(`(|(${ATTR.uniqueId}=*${value}*)(${ATTR.description}=*${value}*))`);
  }
  if (owner !== undefined) {
    terms.push(`(${ATTR.owner}=${escapeFilterValue(owner)})`);
  }
  if (params.disabled !== undefined) {
    terms.push(`(${ATTR.disabled}=${params.disabled ? "TRUE" : "FALSE"})`);
  }
  for (const field of ["vendor", "model", "serial"] as const) {
    const value = params[field];
    if (value !== undefined) {
      terms.push(`(${ATTR[field]}=${escapeFilterValue(value)})`);
    }
  }

  return terms.length === 1 ? TOKEN_PREDICATE : `(&${terms.join("")})`;
}

/**
 * @otptoken/manager - Validity interval
 *
 * notBefore must not be later than notAfter once both are set.
 *
 * @packageDocumentation
 */

import { ValidationError } from "@otptoken/common";

export interface ValidityBounds {
  notBefore?: Date | null;
  notAfter?: Date | null;
}

/**
 * True unless both bounds are set and out of order
 */
export function checkInterval(
  notBefore?: Date | null,
  notAfter?: Date | null,
): boolean {
  if (notBefore && notAfter) {
    return notBefore.getTime() <= notAfter.getTime();
  }
  return true;
}

const notAfterError = () =>
  new ValidationError("notAfter", "is before the validity start");

const notBeforeError = () =>
  new ValidationError("notBefore", "is after the validity end");

/**
 * Check the bounds given on creation
 */
export function validateCreateInterval(bounds: ValidityBounds): void {
  if (!checkInterval(bounds.notBefore, bounds.notAfter)) {
    throw notAfterError();
  }
}

/**
 * Check the bounds given on update
 *
 * When the request carries exactly one bound, the other one is read from
 * the stored token and the error names the bound being changed. A bound
 * set to null is cleared and counts as given.
 *
 * @param requested Bounds present in the request
 * @param readStored Reads the bounds currently stored
 */
export async function validateUpdateInterval(
  requested: ValidityBounds,
  readStored: () => Promise<ValidityBounds>,
): Promise<void> {
  const hasNotBefore = requested.notBefore !== undefined;
  const hasNotAfter = requested.notAfter !== undefined;

  let { notBefore, notAfter } = requested;
  if (hasNotBefore !== hasNotAfter) {
    const stored = await readStored();
    if (!hasNotBefore) notBefore = stored.notBefore;
    if (!hasNotAfter) notAfter = stored.notAfter;
  }

  if (!checkInterval(notBefore, notAfter)) {
    throw hasNotAfter ? notAfterError() : notBeforeError();
  }
}

/**
 * @otptoken/manager
 *
 * Configuration and provisioning engine for OTP tokens
 *
 * @packageDocumentation
 */

export { TokenManager, type TokenManagerOptions } from "./manager";

export {
  DEFAULT_TOKEN_TYPE,
  resolveTokenType,
  tokenObjectClasses,
  pruneForeignAttributes,
  tokenAttributes,
  storedTokenType,
  entryToView,
} from "./schema";

export {
  checkInterval,
  validateCreateInterval,
  validateUpdateInterval,
  type ValidityBounds,
} from "./interval";

export { OwnerResolver, isSelfManaged, type Ownership } from "./owner";

export { buildProvisioningUri, quoteLabel, resolveIssuer } from "./uri";

export { TOKEN_PREDICATE, rewriteSearchFilter, buildSearchFilter } from "./search";

export {
  DEFAULT_ALGORITHM,
  DEFAULT_DIGITS,
  DEFAULT_TIME_STEP,
  MIN_TIME_STEP,
  buildToken,
} from "./params";

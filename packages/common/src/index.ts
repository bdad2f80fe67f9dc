/**
 * @otptoken/common
 *
 * Token model, errors and directory collaborators shared by the
 * otptoken packages
 *
 * @packageDocumentation
 */

export * from "./types";
export * from "./errors";

export {
  escapeFilterValue,
  parseFilter,
  matchFilter,
  FilterSyntaxError,
  type FilterNode,
} from "./filter";

export {
  InMemoryDirectory,
  type TokenStore,
  type IdentityDirectory,
} from "./directory";

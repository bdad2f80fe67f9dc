/**
 * @otptoken/api
 *
 * express router for OTP token management
 *
 * @packageDocumentation
 */

export { createTokenApp, type TokenAppOptions } from "./app";

export { createTokenRoutes, errorStatus, type TokenRoutesOptions } from "./routes";

export {
  fieldsOf,
  parseAddParams,
  parseModParams,
  parseFindParams,
  parseOutputOptions,
  parseUsers,
  parseSyncParams,
} from "./params";

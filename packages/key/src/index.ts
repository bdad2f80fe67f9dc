/**
 * @otptoken/key
 *
 * Key material codec for OTP tokens
 *
 * @packageDocumentation
 */

export {
  KEY_LENGTH,
  generateKey,
  base32Encode,
  base32Decode,
  convertKey,
} from "./key";

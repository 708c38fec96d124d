/**
 * Codec Utility Functions
 *
 * Re-exports from the shortuuid module.
 * @see ./shortuuid.ts for implementation details.
 */

// UUID <-> short code
export {
  encode,
  decode,
  generate,
  validateShortCode,
} from "./shortuuid.js";

// Base-N conversion
export {
  calculateLength,
  toBaseN,
  fromBaseN,
} from "./shortuuid.js";

// UUID text
export {
  isUuid,
  uuidToBigInt,
  bigIntToUuid,
} from "./shortuuid.js";

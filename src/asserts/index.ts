export {
  Assertion,
  ModelAssertion,
  SerialAssertion,
  ASSERTION_TYPES,
  findAssertionType,
} from "./assertion.js";
export { decodeAssertion, encodeAssertion } from "./decoder.js";
export type { AssertionDecoder } from "./decoder.js";
export { parseHeaders } from "./headers.js";
export type {
  AssertionParts,
  AssertionType,
  HeaderMap,
  HeaderValue,
  Result,
} from "./types.js";

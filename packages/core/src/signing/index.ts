export {
  createRequestSigner,
  buildObjectUrl,
  fullPath,
  isHttpMethod,
  HTTP_METHODS,
  type HttpMethod,
  type RequestSigner,
  type RequestSignerOptions,
  type SignedRequest,
} from "./request-signer.js";
export {
  ALGORITHM,
  EMPTY_SHA256,
  formatAmzDate,
  hashPayload,
  signV4,
  type SigningScope,
} from "./sigv4.js";
export { uriEncode, encodePath, canonicalQueryString } from "./canonical.js";

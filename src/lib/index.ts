/**
 * cloudfront-canned-signer
 * Signed URLs and signed cookies for CloudFront canned policies
 *
 * RSA-SHA1 (RSASSA-PKCS1-v1_5) over a fixed-shape policy document
 */

// Signer
export { CloudFrontSigner } from './cloudfront.js';
export type { CloudFrontSignerOptions } from './cloudfront.js';

// Pipeline stages
export { buildPolicy, parsePolicy, toEpochSeconds } from './policy.js';
export { sign } from './signer.js';
export { urlSafeBase64, fromUrlSafeBase64, assembleCookie, assembleUrl } from './encoding.js';

// Inspection
export { inspect, inspectJson, inspectPolicy, inspectSignedUrl } from './inspect.js';
export type { InspectionResult } from './inspect.js';

// Errors
export { CannedSignError } from './errors.js';
export type { CannedSignErrorCode } from './errors.js';

// Types
export { COOKIE_NAMES, URL_PARAMS } from './types.js';
export type {
  SigningIdentity,
  CannedPolicy,
  PolicyStatement,
  DateLessThanCondition,
  SignedCookie,
  PolicyInspection,
  SignedUrlInspection,
} from './types.js';

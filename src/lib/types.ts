/**
 * Type definitions for CloudFront canned-policy signing
 */

import type { KeyObject } from 'node:crypto';

/**
 * Signing identity shared by every request a signer issues
 */
export interface SigningIdentity {
  /** Base resource URL, e.g. https://d111111abcdef8.cloudfront.net */
  readonly baseUrl: string;
  /** Key-pair ID assigned by CloudFront to the matching public key */
  readonly keyPairId: string;
  /** RSA private key; only ever read to compute signatures */
  readonly privateKey: KeyObject;
}

/**
 * Expiry condition of a canned policy
 */
export interface DateLessThanCondition {
  DateLessThan: {
    'AWS:EpochTime': number;
  };
}

/**
 * The single statement of a canned policy
 */
export interface PolicyStatement {
  Resource: string;
  Condition: DateLessThanCondition;
}

/**
 * Canned policy document
 */
export interface CannedPolicy {
  Statement: [PolicyStatement];
}

/**
 * Signed cookie values. All three must be sent together.
 */
export interface SignedCookie {
  policy: string;
  signature: string;
  keyPairId: string;
}

/**
 * Cookie names CloudFront looks for
 */
export const COOKIE_NAMES = {
  policy: 'CloudFront-Policy',
  signature: 'CloudFront-Signature',
  keyPairId: 'CloudFront-Key-Pair-Id',
} as const satisfies Record<keyof SignedCookie, string>;

/**
 * Query parameters appended to a signed URL, in emission order
 */
export const URL_PARAMS = ['Expires', 'Signature', 'Key-Pair-Id'] as const;

/**
 * Decoded CloudFront-Policy cookie value
 */
export interface PolicyInspection {
  resource: string;
  epochTime: number;
  expires: string;
  expired: boolean;
}

/**
 * Decoded signed URL
 */
export interface SignedUrlInspection {
  /** The URL with the signing parameters removed */
  url: string;
  epochTime: number;
  expires: string;
  expired: boolean;
  keyPairId: string;
  hasSignature: boolean;
}

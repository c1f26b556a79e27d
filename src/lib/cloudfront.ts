/**
 * CloudFront canned-policy signer
 */

import type { KeyObject } from 'node:crypto';
import { buildPolicy, toEpochSeconds } from './policy.js';
import { sign } from './signer.js';
import { assembleCookie, assembleUrl, urlSafeBase64 } from './encoding.js';
import type { SignedCookie, SigningIdentity } from './types.js';

/**
 * Signer options
 */
export interface CloudFrontSignerOptions {
  /** Distribution base URL, with or without a trailing slash */
  baseUrl: string;
  /** CloudFront key-pair ID of the public key */
  keyPairId: string;
  /** Matching RSA private key */
  privateKey: KeyObject;
}

/**
 * Issues signed cookies and signed URLs for one distribution and key pair.
 * Holds no mutable state; one instance can serve any number of callers.
 */
export class CloudFrontSigner implements SigningIdentity {
  readonly baseUrl: string;
  readonly keyPairId: string;
  readonly privateKey: KeyObject;

  constructor(options: CloudFrontSignerOptions) {
    this.baseUrl = options.baseUrl;
    this.keyPairId = options.keyPairId;
    this.privateKey = options.privateKey;
  }

  /**
   * Sign a canned policy for `resource` and return the cookie values
   *
   * @param resource - Resource relative to the base URL, e.g. "images/*"
   * @param expires - Instant after which access is denied
   */
  cookie(resource: string, expires: Date): SignedCookie {
    const policy = buildPolicy(`${trimTrailingSlash(this.baseUrl)}/${resource}`, expires);
    const signature = sign(policy, this);

    return assembleCookie(urlSafeBase64(policy), urlSafeBase64(signature), this.keyPairId);
  }

  /**
   * Create a signed URL using a canned policy
   *
   * With a query string the signed resource is `path?queryString`, without the
   * base URL prefix. Deployed verifiers expect exactly these bytes, so `path`
   * must already match what CloudFront will see.
   *
   * @param path - Resource path, e.g. "/videos/intro.mp4"
   * @param queryString - Raw query string to keep, or ''
   * @param expires - Instant after which access is denied
   * @returns Fully assembled signed URL
   */
  cannedSignedUrl(path: string, queryString: string, expires: Date): string {
    const resource =
      queryString !== ''
        ? `${path}?${queryString}`
        : `${trimTrailingSlash(this.baseUrl)}/${trimLeadingSlash(path)}`;

    const policy = buildPolicy(resource, expires);
    const signature = urlSafeBase64(sign(policy, this));

    return assembleUrl(
      this.baseUrl,
      path,
      queryString,
      toEpochSeconds(expires),
      signature,
      this.keyPairId
    );
  }
}

function trimTrailingSlash(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value;
}

function trimLeadingSlash(value: string): string {
  return value.startsWith('/') ? value.slice(1) : value;
}

/**
 * CloudFront-safe base64 and output assembly for cookies and URLs
 */

import { base64pad } from 'multiformats/bases/base64';
import { CannedSignError, describeError } from './errors.js';
import type { SignedCookie } from './types.js';

// CloudFront's substitution table. Not RFC 4648 base64url: '/' becomes '~'
// and padding is kept as '_'.
const SUBSTITUTIONS: Readonly<Record<string, string>> = {
  '=': '_',
  '+': '-',
  '/': '~',
};

const REVERSE_SUBSTITUTIONS: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(SUBSTITUTIONS).map(([from, to]) => [to, from])
);

/**
 * Encode bytes as base64 with CloudFront's character substitutions
 *
 * @param bytes - Bytes to encode
 * @returns String safe for query strings and cookie values
 */
export function urlSafeBase64(bytes: Uint8Array): string {
  return base64pad.baseEncode(bytes).replace(/[=+/]/g, (c) => SUBSTITUTIONS[c] ?? c);
}

/**
 * Decode a value produced by {@link urlSafeBase64}
 *
 * @param value - CloudFront-safe base64 string
 * @returns Decoded bytes
 */
export function fromUrlSafeBase64(value: string): Uint8Array {
  return base64pad.baseDecode(value.replace(/[_\-~]/g, (c) => REVERSE_SUBSTITUTIONS[c] ?? c));
}

/**
 * Assemble the signed cookie values
 */
export function assembleCookie(
  policyB64: string,
  signatureB64: string,
  keyPairId: string
): SignedCookie {
  return {
    policy: policyB64,
    signature: signatureB64,
    keyPairId,
  };
}

/**
 * Assemble a signed URL
 *
 * The path of `baseUrl` is replaced by `path`. A caller query string is kept
 * byte for byte and followed by `&` before the signing parameters, since the
 * signed resource carries it raw. The path is normalized by the URL parser:
 * a leading `/` is added and spaces are escaped, but existing `%` escapes are
 * left as they are so pre-encoded paths pass through unchanged. A fragment
 * on `baseUrl` is kept.
 *
 * @param baseUrl - Distribution URL (scheme and host are kept)
 * @param path - Resource path
 * @param queryString - Raw caller query string, or ''
 * @param expiresEpochSeconds - Expiry in Unix seconds
 * @param signatureB64 - CloudFront-safe base64 signature
 * @param keyPairId - Key-pair ID
 * @throws CannedSignError (CF_INVALID_BASE_URL) if `baseUrl` does not parse
 */
export function assembleUrl(
  baseUrl: string,
  path: string,
  queryString: string,
  expiresEpochSeconds: number,
  signatureB64: string,
  keyPairId: string
): string {
  let uri: URL;
  try {
    uri = new URL(baseUrl);
  } catch (error) {
    throw new CannedSignError(
      'CF_INVALID_BASE_URL',
      `Invalid base URL "${baseUrl}": ${describeError(error)}`,
      { cause: error }
    );
  }

  const signingParams =
    `Expires=${expiresEpochSeconds}` + `&Signature=${signatureB64}` + `&Key-Pair-Id=${keyPairId}`;

  uri.pathname = path;

  const userinfo = uri.username
    ? `${uri.username}${uri.password ? `:${uri.password}` : ''}@`
    : '';
  const query = (queryString !== '' ? `${queryString}&` : '') + signingParams;

  return `${uri.protocol}//${userinfo}${uri.host}${uri.pathname}?${query}${uri.hash}`;
}

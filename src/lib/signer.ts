/**
 * RSA-SHA1 signing of canned policies (RSASSA-PKCS1-v1_5)
 */

import { sha1 } from '@noble/hashes/sha1';
import { constants, privateEncrypt } from 'node:crypto';
import { CannedSignError, describeError } from './errors.js';
import type { SigningIdentity } from './types.js';

// DER prefix of DigestInfo { sha1, NULL } (RFC 8017 §9.2 note 1)
const SHA1_DIGEST_INFO_PREFIX = new Uint8Array([
  0x30, 0x21, 0x30, 0x09, 0x06, 0x05, 0x2b, 0x0e, 0x03, 0x02, 0x1a, 0x05, 0x00, 0x04, 0x14,
]);

/**
 * Wrap a SHA-1 digest in its DigestInfo encoding
 */
function encodeDigestInfo(digest: Uint8Array): Uint8Array {
  const encoded = new Uint8Array(SHA1_DIGEST_INFO_PREFIX.length + digest.length);
  encoded.set(SHA1_DIGEST_INFO_PREFIX, 0);
  encoded.set(digest, SHA1_DIGEST_INFO_PREFIX.length);
  return encoded;
}

/**
 * Sign policy bytes with the identity's private key
 *
 * @param policy - Policy bytes exactly as they will be encoded and sent
 * @param identity - Holder of the RSA private key
 * @returns Raw signature (modulus length bytes)
 * @throws CannedSignError (CF_SIGNING_FAILED) if the key is not a private RSA key
 *   or the RSA operation fails
 */
export function sign(policy: Uint8Array, identity: Pick<SigningIdentity, 'privateKey'>): Uint8Array {
  const { privateKey } = identity;

  if (privateKey.type !== 'private') {
    throw new CannedSignError(
      'CF_SIGNING_FAILED',
      `Invalid signing key: expected a private key, got ${privateKey.type}`
    );
  }

  if (privateKey.asymmetricKeyType !== 'rsa') {
    throw new CannedSignError(
      'CF_SIGNING_FAILED',
      `Invalid signing key: expected RSA, got ${privateKey.asymmetricKeyType ?? 'unknown'}`
    );
  }

  const digestInfo = encodeDigestInfo(sha1(policy));

  try {
    // PKCS#1 v1.5 block type 1 over DigestInfo; OpenSSL blinds the private
    // key operation with its own CSPRNG
    const signature = privateEncrypt(
      { key: privateKey, padding: constants.RSA_PKCS1_PADDING },
      digestInfo
    );
    return new Uint8Array(signature);
  } catch (error) {
    throw new CannedSignError('CF_SIGNING_FAILED', `Signing failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Typed errors for canned-policy signing
 */

/**
 * Error codes
 *
 * - CF_POLICY_SERIALIZATION: the policy document could not be encoded
 * - CF_SIGNING_FAILED: the private key was unusable or the RSA operation failed
 * - CF_INVALID_BASE_URL: the signer's base URL does not parse as a URL
 * - CF_INVALID_POLICY: an inspected policy or signed URL is malformed
 */
export type CannedSignErrorCode =
  | 'CF_POLICY_SERIALIZATION'
  | 'CF_SIGNING_FAILED'
  | 'CF_INVALID_BASE_URL'
  | 'CF_INVALID_POLICY';

/**
 * Error raised by every signing and inspection operation.
 * Match on `err.code` rather than the message.
 */
export class CannedSignError extends Error {
  readonly code: CannedSignErrorCode;

  constructor(code: CannedSignErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CannedSignError';
    this.code = code;
    Object.setPrototypeOf(this, CannedSignError.prototype);
  }
}

/**
 * Render an unknown thrown value for inclusion in a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

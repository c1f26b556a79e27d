/**
 * Canned policy construction and parsing
 *
 * CloudFront rebuilds the canned policy from the request and checks the
 * signature against those bytes, so the document is written from a fixed
 * template: field order, names and the absence of whitespace never change.
 */

import { CannedSignError, describeError } from './errors.js';
import type { CannedPolicy } from './types.js';

const EPOCH_TIME_FIELD = 'AWS:EpochTime';

/** Largest epoch (in seconds, either sign) a `Date` can represent */
export const MAX_EPOCH_SECONDS = 8.64e12;

/**
 * Convert an expiry instant to whole Unix epoch seconds
 *
 * @param expiry - Expiry instant (millisecond resolution)
 * @returns Epoch seconds, truncated
 * @throws CannedSignError (CF_POLICY_SERIALIZATION) if the date is invalid
 */
export function toEpochSeconds(expiry: Date): number {
  const ms = expiry.getTime();
  if (!Number.isFinite(ms)) {
    throw new CannedSignError('CF_POLICY_SERIALIZATION', 'Invalid expiry: not a valid date');
  }
  return Math.floor(ms / 1000);
}

/**
 * Build the canned policy for a resource and expiry
 *
 * @param resource - Exact resource URL (or path) being authorized
 * @param expiry - Instant after which access is denied
 * @returns UTF-8 policy bytes, ready to sign
 */
export function buildPolicy(resource: string, expiry: Date): Uint8Array {
  const epochTime = toEpochSeconds(expiry);

  const document =
    `{"Statement":[{"Resource":${JSON.stringify(resource)},` +
    `"Condition":{"DateLessThan":{"${EPOCH_TIME_FIELD}":${epochTime}}}}]}`;

  return new TextEncoder().encode(document);
}

/**
 * Parse policy bytes back into a canned policy document
 *
 * @param bytes - UTF-8 policy bytes
 * @throws CannedSignError (CF_INVALID_POLICY) if the bytes are not a canned policy
 */
export function parsePolicy(bytes: Uint8Array): CannedPolicy {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (error) {
    throw new CannedSignError('CF_INVALID_POLICY', `Invalid policy: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.Statement) || parsed.Statement.length !== 1) {
    throw new CannedSignError('CF_INVALID_POLICY', 'Invalid policy: expected exactly one Statement');
  }

  const statement: unknown = parsed.Statement[0];
  if (!isRecord(statement) || typeof statement.Resource !== 'string') {
    throw new CannedSignError('CF_INVALID_POLICY', "Invalid policy: missing field 'Resource'");
  }

  const condition = statement.Condition;
  const dateLessThan = isRecord(condition) ? condition.DateLessThan : undefined;
  const epochTime = isRecord(dateLessThan) ? dateLessThan[EPOCH_TIME_FIELD] : undefined;
  if (typeof epochTime !== 'number' || !Number.isInteger(epochTime)) {
    throw new CannedSignError(
      'CF_INVALID_POLICY',
      `Invalid policy: missing field 'Condition.DateLessThan.${EPOCH_TIME_FIELD}'`
    );
  }

  if (Math.abs(epochTime) > MAX_EPOCH_SECONDS) {
    throw new CannedSignError(
      'CF_INVALID_POLICY',
      `Invalid policy: ${EPOCH_TIME_FIELD} ${epochTime} is out of range`
    );
  }

  return {
    Statement: [
      {
        Resource: statement.Resource,
        Condition: { DateLessThan: { [EPOCH_TIME_FIELD]: epochTime } },
      },
    ],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

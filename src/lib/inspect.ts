/**
 * Inspection: human-readable view of signed cookies and signed URLs
 * Decodes only; signatures are not checked
 */

import { CannedSignError, describeError } from './errors.js';
import { fromUrlSafeBase64 } from './encoding.js';
import { MAX_EPOCH_SECONDS, parsePolicy } from './policy.js';
import { URL_PARAMS } from './types.js';
import type { PolicyInspection, SignedUrlInspection } from './types.js';

/**
 * Inspection result tagged by input kind
 */
export type InspectionResult =
  | ({ kind: 'policy' } & PolicyInspection)
  | ({ kind: 'url' } & SignedUrlInspection);

const RULE = '\u2501'.repeat(41); // ━ box drawing character
const SIGNING_PARAMS: ReadonlySet<string> = new Set<string>(URL_PARAMS);

function isUrlInput(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

function describeExpiry(epochTime: number, now: Date): { expires: string; expired: boolean } {
  return {
    expires: new Date(epochTime * 1000).toISOString(),
    expired: now.getTime() >= epochTime * 1000,
  };
}

/**
 * Decode a CloudFront-Policy cookie value
 *
 * @param policyB64 - CloudFront-safe base64 policy
 * @param now - Reference instant for the expired flag
 * @throws CannedSignError (CF_INVALID_POLICY) if the value does not decode to a canned policy
 */
export function inspectPolicy(policyB64: string, now: Date = new Date()): PolicyInspection {
  let bytes: Uint8Array;
  try {
    bytes = fromUrlSafeBase64(policyB64.trim());
  } catch (error) {
    throw new CannedSignError('CF_INVALID_POLICY', `Invalid policy encoding: ${describeError(error)}`, {
      cause: error,
    });
  }

  const [statement] = parsePolicy(bytes).Statement;
  const epochTime = statement.Condition.DateLessThan['AWS:EpochTime'];

  return {
    resource: statement.Resource,
    epochTime,
    ...describeExpiry(epochTime, now),
  };
}

/**
 * Decode a signed URL into its unsigned URL and signing parameters
 *
 * @param url - Signed URL
 * @param now - Reference instant for the expired flag
 * @throws CannedSignError (CF_INVALID_POLICY) if the URL or a signing parameter is malformed
 */
export function inspectSignedUrl(url: string, now: Date = new Date()): SignedUrlInspection {
  let uri: URL;
  try {
    uri = new URL(url.trim());
  } catch (error) {
    throw new CannedSignError('CF_INVALID_POLICY', `Invalid signed URL: ${describeError(error)}`, {
      cause: error,
    });
  }

  const signing = new Map<string, string>();
  const kept: string[] = [];
  for (const pair of uri.search.slice(1).split('&')) {
    if (pair === '') continue;
    const eq = pair.indexOf('=');
    const name = eq === -1 ? pair : pair.slice(0, eq);
    if (SIGNING_PARAMS.has(name)) {
      signing.set(name, eq === -1 ? '' : pair.slice(eq + 1));
    } else {
      kept.push(pair);
    }
  }

  const expires = signing.get('Expires');
  if (expires === undefined || !/^\d+$/.test(expires)) {
    throw new CannedSignError('CF_INVALID_POLICY', "Invalid signed URL: missing or malformed 'Expires'");
  }

  const keyPairId = signing.get('Key-Pair-Id');
  if (!keyPairId) {
    throw new CannedSignError('CF_INVALID_POLICY', "Invalid signed URL: missing 'Key-Pair-Id'");
  }

  const epochTime = Number(expires);
  if (epochTime > MAX_EPOCH_SECONDS) {
    throw new CannedSignError('CF_INVALID_POLICY', `Invalid signed URL: 'Expires' ${expires} is out of range`);
  }

  uri.search = kept.length > 0 ? `?${kept.join('&')}` : '';

  return {
    url: uri.toString(),
    epochTime,
    ...describeExpiry(epochTime, now),
    keyPairId,
    hasSignature: Boolean(signing.get('Signature')),
  };
}

/**
 * Inspect a signed URL or a CloudFront-Policy value
 *
 * @param input - Signed URL (http/https) or base64 policy
 * @param now - Reference instant for the expired flag
 */
export function inspectJson(input: string, now: Date = new Date()): InspectionResult {
  return isUrlInput(input)
    ? { kind: 'url', ...inspectSignedUrl(input, now) }
    : { kind: 'policy', ...inspectPolicy(input, now) };
}

/**
 * Generate human-readable inspection output
 *
 * @param input - Signed URL (http/https) or base64 policy
 * @param now - Reference instant for the expired flag
 * @returns Formatted string for terminal display
 */
export function inspect(input: string, now: Date = new Date()): string {
  const result = inspectJson(input, now);
  const lines: string[] = [];

  if (result.kind === 'url') {
    lines.push('CloudFront signed URL');
    lines.push(RULE);
    lines.push(`URL: ${result.url}`);
    lines.push(`Key-Pair-Id: ${result.keyPairId}`);
  } else {
    lines.push('CloudFront canned policy');
    lines.push(RULE);
    lines.push(`Resource: ${result.resource}`);
  }

  lines.push(`Expires: ${result.expires} (${result.epochTime})`);
  if (result.kind === 'url') {
    lines.push(`Signature: ${result.hasSignature ? 'present' : 'missing'}`);
  }

  lines.push('');
  lines.push(`Status: ${result.expired ? 'EXPIRED' : 'ACTIVE'}`);

  return lines.join('\n');
}

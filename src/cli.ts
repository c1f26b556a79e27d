#!/usr/bin/env node
/**
 * cfsign - Command line interface for CloudFront canned-policy signing
 *
 * Commands:
 *   url     - Create a signed URL
 *   cookie  - Create signed cookie values
 *   inspect - Decode a signed URL or CloudFront-Policy value
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createPrivateKey, type KeyObject } from 'node:crypto';
import { fileURLToPath } from 'node:url';

import { CloudFrontSigner } from './lib/cloudfront.js';
import { inspect, inspectJson } from './lib/inspect.js';
import { COOKIE_NAMES } from './lib/types.js';

const DEFAULT_TTL_SECONDS = 3600;

// Get package version
const __dirname = path.dirname(fileURLToPath(import.meta.url));
let version = '0.1.0';
try {
  const pkgPath = path.resolve(__dirname, '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    version = pkg.version;
  }
} catch {
  // Use default version
}

interface SigningOptions {
  baseUrl: string;
  keyPairId: string;
  key: string;
  expires?: string;
  ttl: string;
}

interface UrlOptions extends SigningOptions {
  query: string;
}

interface CookieOptions extends SigningOptions {
  json?: boolean;
}

interface InspectOptions {
  json?: boolean;
}

const program = new Command();

program
  .name('cfsign')
  .description('Signed URLs and signed cookies for CloudFront canned policies')
  .version(version);

/**
 * Read an RSA private key from a PEM file
 */
function readPrivateKey(keyPath: string): KeyObject {
  const absolutePath = path.resolve(keyPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Key file not found: ${keyPath}`);
  }

  try {
    return createPrivateKey(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Invalid key format in ${keyPath}: expected a PEM-encoded RSA private key (${error instanceof Error ? error.message : error})`
    );
  }
}

/**
 * Resolve the expiry from --expires or --ttl
 */
function resolveExpiry(options: SigningOptions): Date {
  if (options.expires) {
    const expires = new Date(options.expires);
    if (Number.isNaN(expires.getTime())) {
      throw new Error(`Invalid --expires value: ${options.expires}`);
    }
    return expires;
  }

  const ttl = Number(options.ttl);
  if (!Number.isInteger(ttl) || ttl <= 0) {
    throw new Error(`Invalid --ttl value: ${options.ttl}`);
  }
  return new Date(Date.now() + ttl * 1000);
}

function createSigner(options: SigningOptions): CloudFrontSigner {
  return new CloudFrontSigner({
    baseUrl: options.baseUrl,
    keyPairId: options.keyPairId,
    privateKey: readPrivateKey(options.key),
  });
}

/**
 * Attach the signing identity and expiry options shared by url and cookie
 */
function withSigningOptions(command: Command): Command {
  return command
    .addOption(
      new Option('-b, --base-url <url>', 'Distribution base URL')
        .env('CLOUDFRONT_BASE_URL')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('-i, --key-pair-id <id>', 'CloudFront key-pair ID')
        .env('CLOUDFRONT_KEY_PAIR_ID')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('-k, --key <path>', 'Path to PEM-encoded RSA private key')
        .env('CLOUDFRONT_PRIVATE_KEY_PATH')
        .makeOptionMandatory()
    )
    .option('--expires <iso8601>', 'Expiry timestamp (overrides --ttl)')
    .option('--ttl <seconds>', 'Lifetime in seconds', String(DEFAULT_TTL_SECONDS));
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

// ============================================================================
// URL COMMAND
// ============================================================================

withSigningOptions(
  program
    .command('url')
    .description('Create a signed URL')
    .argument('<path>', 'Resource path, e.g. /videos/intro.mp4')
    .option('-q, --query <string>', 'Query string to keep in the signed URL', '')
).action((resourcePath: string, options: UrlOptions) => {
  try {
    const signer = createSigner(options);
    const expires = resolveExpiry(options);

    console.log(signer.cannedSignedUrl(resourcePath, options.query, expires));
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// COOKIE COMMAND
// ============================================================================

withSigningOptions(
  program
    .command('cookie')
    .description('Create signed cookie values')
    .argument('<resource>', 'Resource relative to the base URL, e.g. images/*')
    .option('--json', 'Output as JSON')
).action((resource: string, options: CookieOptions) => {
  try {
    const signer = createSigner(options);
    const expires = resolveExpiry(options);
    const cookie = signer.cookie(resource, expires);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            [COOKIE_NAMES.policy]: cookie.policy,
            [COOKIE_NAMES.signature]: cookie.signature,
            [COOKIE_NAMES.keyPairId]: cookie.keyPairId,
            expires: expires.toISOString(),
          },
          null,
          2
        )
      );
      return;
    }

    console.log(chalk.cyan(COOKIE_NAMES.policy) + '=' + cookie.policy);
    console.log(chalk.cyan(COOKIE_NAMES.signature) + '=' + cookie.signature);
    console.log(chalk.cyan(COOKIE_NAMES.keyPairId) + '=' + cookie.keyPairId);
    console.log(chalk.dim('Expires: ' + expires.toISOString()));
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// INSPECT COMMAND
// ============================================================================

program
  .command('inspect')
  .description('Decode a signed URL or CloudFront-Policy value (signature is not checked)')
  .argument('<input>', 'Signed URL or base64 policy')
  .option('--json', 'Output as JSON')
  .action((input: string, options: InspectOptions) => {
    try {
      if (options.json) {
        console.log(JSON.stringify(inspectJson(input), null, 2));
      } else {
        console.log(inspect(input));
      }
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// PARSE AND EXECUTE
// ============================================================================

program.parse();

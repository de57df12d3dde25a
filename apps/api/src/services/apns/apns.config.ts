// =====================================================
// APNs Credential Loading
// =====================================================
// Resolves signing material from the environment-backed config.
// Any missing or malformed field is a ConfigurationError: the
// process must not start dispatching without valid credentials.

import { createPrivateKey } from 'crypto';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors';
import type { ApnsCredentials } from './types';

export interface ApnsConfigSource {
  keyId: string;
  teamId: string;
  bundleId: string;
  keyPath: string;
  keyBase64: string;
  environment: string;
}

const identifierSchema = z
  .string()
  .regex(/^[A-Z0-9]{10}$/, 'must be a 10-character Apple identifier');

const apnsConfigSchema = z.object({
  keyId: identifierSchema,
  teamId: identifierSchema,
  bundleId: z
    .string()
    .min(1, 'is required')
    .regex(/^[A-Za-z0-9-]+(\.[A-Za-z0-9-]+)+$/, 'must be a reverse-DNS bundle identifier'),
  environment: z.enum(['development', 'production']),
});

/**
 * Read the PEM key from base64 (cloud deployments) or from disk.
 */
function readPrivateKey(source: ApnsConfigSource): string {
  if (source.keyBase64) {
    return Buffer.from(source.keyBase64, 'base64').toString('utf8');
  }

  if (!source.keyPath) {
    throw new ConfigurationError('APNs signing key is missing: set APNS_KEY_BASE64 or APNS_KEY_PATH', [
      'privateKey',
    ]);
  }

  try {
    return readFileSync(source.keyPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `APNs signing key could not be read from ${source.keyPath}: ${error instanceof Error ? error.message : String(error)}`,
      ['privateKey'],
    );
  }
}

/**
 * Ensure the key parses as a P-256 EC private key, which ES256 requires.
 */
export function assertSigningKey(pem: string): void {
  let keyType: string | undefined;
  let curve: string | undefined;

  try {
    const key = createPrivateKey(pem);
    keyType = key.asymmetricKeyType;
    curve = key.asymmetricKeyDetails?.namedCurve;
  } catch {
    throw new ConfigurationError('APNs signing key is malformed: not a PEM private key', ['privateKey']);
  }

  if (keyType !== 'ec' || curve !== 'prime256v1') {
    throw new ConfigurationError(
      `APNs signing key must be an EC P-256 key (got ${keyType ?? 'unknown'}${curve ? `/${curve}` : ''})`,
      ['privateKey'],
    );
  }
}

/**
 * Validate identifiers and load the signing key.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function loadApnsCredentials(source: ApnsConfigSource): ApnsCredentials {
  const parsed = apnsConfigSchema.safeParse(source);

  if (!parsed.success) {
    const fields = parsed.error.errors.map((e) => e.path.join('.'));
    const details = parsed.error.errors.map((e) => `${e.path.join('.')} ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid APNs configuration: ${details}`, fields);
  }

  const privateKey = readPrivateKey(source);
  assertSigningKey(privateKey);

  return {
    ...parsed.data,
    privateKey,
  };
}

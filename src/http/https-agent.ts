import { Logger } from '@nestjs/common';
import { Agent as HttpsAgent } from 'https';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { ClientApiTlsOptions } from '../config/client-api.config';
import { ClientApiConfigError } from '../errors';

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const CERT_VALIDATION_CODES = new Set([
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
]);

export function isCertValidationError(code?: string): boolean {
  return code !== undefined && CERT_VALIDATION_CODES.has(code);
}

/**
 * Resolves the CA to trust. `CLIENT_API_CA_CERT` wins over `CLIENT_API_CA_FILE`.
 * @throws ClientApiConfigError when the configured value cannot be used
 */
export function loadCertificateAuthority({ caFile, caCert }: Readonly<ClientApiTlsOptions>): string | Buffer | undefined {
  const inline = caCert?.trim();
  if (inline) {
    if (PEM_BLOCK.test(inline)) {
      return inline;
    }

    const compact = inline.replace(/\s+/g, '');
    if (!BASE64.test(compact)) {
      throw new ClientApiConfigError(['CLIENT_API_CA_CERT is neither a PEM certificate nor base64 DER']);
    }
    return Buffer.from(compact, 'base64');
  }

  const path = caFile?.trim();
  if (!path) {
    return undefined;
  }

  try {
    return readFileSync(resolve(process.cwd(), path));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ClientApiConfigError([`CLIENT_API_CA_FILE "${path}" cannot be read: ${message}`]);
  }
}

export function buildHttpsAgent(
  tls: Readonly<ClientApiTlsOptions>,
  logger = new Logger('HttpsAgent'),
): HttpsAgent | undefined {
  const ca = loadCertificateAuthority(tls);
  const verify = tls.rejectUnauthorized !== false;

  if (ca === undefined && verify) {
    return undefined;
  }
  if (!verify) {
    logger.warn('CLIENT_API_REJECT_UNAUTHORIZED=false: Books API certificates are not verified.');
  }

  return new HttpsAgent(ca === undefined ? { rejectUnauthorized: verify } : { ca, rejectUnauthorized: verify });
}

// SPDX-License-Identifier: Apache-2.0

import * as x509 from '@peculiar/x509';
import crypto, {type KeyObject} from 'node:crypto';
import forge from 'node-forge';

export interface DecodedCertificate {
  readonly pem: string;
  readonly der: Buffer;
  readonly subject: string;
  readonly notAfter: Date;
  /** SHA-256 of the DER encoding, lower case hex */
  readonly fingerprint: string;
  /** DER encoded SubjectPublicKeyInfo */
  readonly publicKey: Buffer;
}

export const CERTIFICATE_PEM_TYPES: readonly string[] = ['CERTIFICATE', 'X509 CERTIFICATE'];
export const PRIVATE_KEY_PEM_TYPES: readonly string[] = [
  'PRIVATE KEY',
  'RSA PRIVATE KEY',
  'EC PRIVATE KEY',
  'ENCRYPTED PRIVATE KEY',
];

/**
 * Parses one DER encoded X.509 certificate. All certificates go through here so that the PEM text of equal
 * certificates is identical whichever container they came from.
 */
export function certificateFromDer(der: Buffer): DecodedCertificate {
  const certificate = new x509.X509Certificate(der);
  return {
    pem: certificate.toString('pem') + '\n',
    der,
    subject: certificate.subject,
    notAfter: certificate.notAfter,
    fingerprint: crypto.createHash('sha256').update(der).digest('hex'),
    publicKey: Buffer.from(certificate.publicKey.rawData),
  };
}

/**
 * Splits PEM text into its blocks.
 *
 * @throws Error when the text contains a malformed block
 */
export function pemBlocks(text: string): forge.pem.ObjectPEM[] {
  return forge.pem.decode(text);
}

/**
 * All certificates of a PEM bundle, in order. Blocks of other types are skipped.
 */
export function readCertificates(text: string): DecodedCertificate[] {
  return pemBlocks(text)
    .filter(block => CERTIFICATE_PEM_TYPES.includes(block.type))
    .map(block => certificateFromDer(Buffer.from(block.body, 'binary')));
}

export function canonicalPrivateKey(key: KeyObject): string {
  const pem = key.export({type: 'pkcs8', format: 'pem'});
  return typeof pem === 'string' ? pem : pem.toString('utf8');
}

export function keyMatchesCertificate(key: KeyObject, certificate: DecodedCertificate): boolean {
  const publicKey = crypto.createPublicKey(key).export({type: 'spki', format: 'der'});
  return publicKey.equals(certificate.publicKey);
}

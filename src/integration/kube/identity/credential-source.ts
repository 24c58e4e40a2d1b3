// SPDX-License-Identifier: Apache-2.0

/**
 * The encoding a configuration declares for a credential. It is only a hint: every source is sniffed against the
 * decoders in priority order regardless of what it claims to be.
 */
export type CredentialEncoding = 'pem' | 'pkcs12' | 'der-key' | 'auto';

export interface CredentialSource {
  /** raw bytes, or text (PEM, or base64 of a binary encoding) */
  readonly data: Buffer | string;
  readonly encoding?: CredentialEncoding;
  readonly passphrase?: string;
  /** shown in error messages, usually the file name or config key */
  readonly label?: string;
}

export function labelOf(source: CredentialSource, index: number = 0): string {
  return source.label ?? `credential #${index + 1}`;
}

/**
 * The bytes of a source. Text that does not look like PEM is treated as base64 when it decodes cleanly.
 */
export function bytesOf(source: CredentialSource): Buffer {
  if (Buffer.isBuffer(source.data)) {
    return source.data;
  }

  const text = source.data.trim();
  if (!text.includes('-----BEGIN ') && /^[A-Za-z0-9+/\s]+={0,2}$/.test(text)) {
    return Buffer.from(text.replace(/\s+/g, ''), 'base64');
  }
  return Buffer.from(source.data, 'utf8');
}

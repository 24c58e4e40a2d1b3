// SPDX-License-Identifier: Apache-2.0

import crypto from 'node:crypto';
import {bytesOf, type CredentialSource} from '../credential-source.js';
import {type DecodedCredential} from '../client-identity.js';
import {DecodeMismatch} from './decode-mismatch.js';
import {errorMessage} from '../../../../core/helpers.js';

const DECODER = 'der-key';
const KEY_TYPES = ['pkcs8', 'pkcs1', 'sec1'] as const;

/**
 * A bare private key in DER form, as PKCS#8, PKCS#1 (RSA) or SEC1 (EC).
 */
export function decodeDerKey(source: CredentialSource): DecodedCredential | DecodeMismatch {
  const bytes = bytesOf(source);
  const failures: string[] = [];
  for (const type of KEY_TYPES) {
    try {
      return {
        decoder: DECODER,
        certificates: [],
        privateKey: crypto.createPrivateKey({key: bytes, format: 'der', type}),
      };
    } catch (error) {
      failures.push(`${type}: ${errorMessage(error)}`);
    }
  }
  return new DecodeMismatch(DECODER, failures.join('; '));
}

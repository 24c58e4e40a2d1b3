// SPDX-License-Identifier: Apache-2.0

import crypto, {type KeyObject} from 'node:crypto';
import forge from 'node-forge';
import {bytesOf, labelOf, type CredentialSource} from '../credential-source.js';
import {type DecodedCredential} from '../client-identity.js';
import {DecodeMismatch} from './decode-mismatch.js';
import {
  CERTIFICATE_PEM_TYPES,
  PRIVATE_KEY_PEM_TYPES,
  certificateFromDer,
  pemBlocks,
  type DecodedCertificate,
} from './certificates.js';
import {InvalidPassphraseError} from '../../../../core/errors/credential-errors.js';
import {errorMessage} from '../../../../core/helpers.js';

const DECODER = 'pem';

function isEncrypted(block: forge.pem.ObjectPEM): boolean {
  return block.type === 'ENCRYPTED PRIVATE KEY' || block.procType?.type === 'ENCRYPTED';
}

export function decodePem(source: CredentialSource): DecodedCredential | DecodeMismatch {
  const text = bytesOf(source).toString('utf8');
  if (!text.includes('-----BEGIN ')) {
    return new DecodeMismatch(DECODER, 'no PEM header');
  }

  let blocks: forge.pem.ObjectPEM[];
  try {
    blocks = pemBlocks(text);
  } catch (error) {
    return new DecodeMismatch(DECODER, errorMessage(error));
  }

  const certificates: DecodedCertificate[] = [];
  let privateKey: KeyObject | undefined;

  for (const block of blocks) {
    if (CERTIFICATE_PEM_TYPES.includes(block.type)) {
      try {
        certificates.push(certificateFromDer(Buffer.from(block.body, 'binary')));
      } catch (error) {
        return new DecodeMismatch(DECODER, `malformed certificate: ${errorMessage(error)}`);
      }
    } else if (PRIVATE_KEY_PEM_TYPES.includes(block.type) && !privateKey) {
      try {
        privateKey = crypto.createPrivateKey({key: forge.pem.encode(block), format: 'pem', passphrase: source.passphrase});
      } catch (error) {
        if (isEncrypted(block)) {
          throw new InvalidPassphraseError(labelOf(source), source.passphrase !== undefined, undefined, error);
        }
        return new DecodeMismatch(DECODER, `malformed private key: ${errorMessage(error)}`);
      }
    }
  }

  if (certificates.length === 0 && !privateKey) {
    return new DecodeMismatch(DECODER, 'no certificate or private key blocks');
  }
  return {decoder: DECODER, certificates, privateKey};
}

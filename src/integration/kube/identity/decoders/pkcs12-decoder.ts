// SPDX-License-Identifier: Apache-2.0

import crypto, {type KeyObject} from 'node:crypto';
import forge from 'node-forge';
import {bytesOf, labelOf, type CredentialSource} from '../credential-source.js';
import {type DecodedCredential} from '../client-identity.js';
import {DecodeMismatch} from './decode-mismatch.js';
import {certificateFromDer, type DecodedCertificate} from './certificates.js';
import {InvalidPassphraseError} from '../../../../core/errors/credential-errors.js';
import {errorMessage} from '../../../../core/helpers.js';

const DECODER = 'pkcs12';

/**
 * Once the outer PFX structure is recognised, a failure is either an unsupported construct or, since a container
 * without a MAC only fails while its bags are decrypted, a wrong passphrase.
 */
function isPassphraseFailure(error: unknown): boolean {
  return !/ASN\.1 object is not an? PKCS ?#12 PFX|Unsupported|must be of type/i.test(errorMessage(error));
}

function derOf(asn1: forge.asn1.Asn1): Buffer {
  return Buffer.from(forge.asn1.toDer(asn1).getBytes(), 'binary');
}

function openPfx(asn1: forge.asn1.Asn1, source: CredentialSource): forge.pkcs12.Pkcs12Pfx | DecodeMismatch {
  // a missing passphrase may still open containers written with an empty one
  const candidates = source.passphrase === undefined ? [undefined, ''] : [source.passphrase];
  let lastError: unknown;
  for (const passphrase of candidates) {
    try {
      return forge.pkcs12.pkcs12FromAsn1(asn1, true, passphrase);
    } catch (error) {
      if (!isPassphraseFailure(error)) {
        return new DecodeMismatch(DECODER, errorMessage(error));
      }
      lastError = error;
    }
  }
  throw new InvalidPassphraseError(labelOf(source), source.passphrase !== undefined, undefined, lastError);
}

function readCertificate(bag: forge.pkcs12.Bag): DecodedCertificate {
  return certificateFromDer(bag.cert ? derOf(forge.pki.certificateToAsn1(bag.cert)) : derOf(bag.asn1));
}

function readPrivateKey(bag: forge.pkcs12.Bag): KeyObject {
  if (bag.key) {
    return crypto.createPrivateKey(forge.pki.privateKeyToPem(bag.key));
  }
  return crypto.createPrivateKey({key: derOf(bag.asn1), format: 'der', type: 'pkcs8'});
}

export function decodePkcs12(source: CredentialSource): DecodedCredential | DecodeMismatch {
  const bytes = bytesOf(source);
  // a DER SEQUENCE is the least a PFX can be
  if (bytes.length < 2 || bytes[0] !== 0x30) {
    return new DecodeMismatch(DECODER, 'not a DER sequence');
  }

  let asn1: forge.asn1.Asn1;
  try {
    asn1 = forge.asn1.fromDer(forge.util.createBuffer(bytes.toString('binary')));
  } catch (error) {
    return new DecodeMismatch(DECODER, errorMessage(error));
  }

  const pfx = openPfx(asn1, source);
  if (pfx instanceof DecodeMismatch) {
    return pfx;
  }

  const certificateBags = pfx.getBags({bagType: forge.pki.oids.certBag})[forge.pki.oids.certBag] ?? [];
  const keyBags = [
    ...(pfx.getBags({bagType: forge.pki.oids.pkcs8ShroudedKeyBag})[forge.pki.oids.pkcs8ShroudedKeyBag] ?? []),
    ...(pfx.getBags({bagType: forge.pki.oids.keyBag})[forge.pki.oids.keyBag] ?? []),
  ];

  try {
    const certificates = certificateBags.map(readCertificate);
    const privateKey = keyBags.length > 0 ? readPrivateKey(keyBags[0]) : undefined;
    if (certificates.length === 0 && !privateKey) {
      return new DecodeMismatch(DECODER, 'container holds no certificate or key');
    }
    return {decoder: DECODER, certificates, privateKey};
  } catch (error) {
    return new DecodeMismatch(DECODER, `unreadable bag: ${errorMessage(error)}`);
  }
}

// SPDX-License-Identifier: Apache-2.0

import {type KeyObject} from 'node:crypto';
import {type DecodedCertificate} from './decoders/certificates.js';

/**
 * What a single decoder recovers from one credential source.
 */
export interface DecodedCredential {
  readonly decoder: string;
  readonly certificates: readonly DecodedCertificate[];
  readonly privateKey?: KeyObject;
}

/**
 * A TLS client identity: the certificate chain (leaf first) and its private key, in canonical PEM form. Two identities
 * decoded from different encodings of the same key and certificates are field-for-field equal.
 */
export class ClientIdentity {
  public constructor(
    public readonly certificateChain: readonly string[],
    public readonly privateKey: string,
    public readonly fingerprint: string,
    public readonly subject: string,
    public readonly notAfter: Date,
  ) {
    Object.freeze(this.certificateChain);
    Object.freeze(this);
  }

  public get certificatePem(): string {
    return this.certificateChain.join('');
  }

  public isExpired(now: Date = new Date()): boolean {
    return this.notAfter.getTime() < now.getTime();
  }

  public equals(other: ClientIdentity): boolean {
    return (
      this.fingerprint === other.fingerprint &&
      this.privateKey === other.privateKey &&
      this.certificateChain.length === other.certificateChain.length &&
      this.certificateChain.every((pem, index) => pem === other.certificateChain[index])
    );
  }

  public toString(): string {
    return `${this.subject} (sha256:${this.fingerprint.slice(0, 16)}…)`;
  }
}

// SPDX-License-Identifier: Apache-2.0

import {type CredentialSource} from '../credential-source.js';
import {type DecodedCredential} from '../client-identity.js';

/**
 * Returned by a decoder that does not recognise its input, so the next decoder can be tried.
 */
export class DecodeMismatch {
  public constructor(
    public readonly decoder: string,
    public readonly reason: string,
  ) {}
}

/**
 * A decoding strategy. Decoders never throw for input they do not understand; they only throw once they have
 * recognised the format and hit a failure no other decoder could recover from, such as a wrong passphrase.
 */
export type CredentialDecoder = (source: CredentialSource) => DecodedCredential | DecodeMismatch;

// SPDX-License-Identifier: Apache-2.0

import {type CredentialDecoder} from './decode-mismatch.js';
import {decodePem} from './pem-decoder.js';
import {decodePkcs12} from './pkcs12-decoder.js';
import {decodeDerKey} from './der-key-decoder.js';

export {DecodeMismatch, type CredentialDecoder} from './decode-mismatch.js';
export {decodePem} from './pem-decoder.js';
export {decodePkcs12} from './pkcs12-decoder.js';
export {decodeDerKey} from './der-key-decoder.js';

/**
 * Decoders in the order they are tried: text formats first, then binary containers, then bare keys.
 */
export const CREDENTIAL_DECODERS: readonly CredentialDecoder[] = Object.freeze([decodePem, decodePkcs12, decodeDerKey]);

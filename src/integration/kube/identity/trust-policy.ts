// SPDX-License-Identifier: Apache-2.0

import {CredentialError, MissingTrustPolicyError} from '../../../core/errors/credential-errors.js';
import {readCertificates} from './decoders/certificates.js';

export interface StrictCaTrustPolicy {
  readonly type: 'StrictCA';
  /** PEM bundle of the authorities the server certificate must chain to */
  readonly caBundle: string;
}

/**
 * Accepts any server certificate. Only reachable through {@link TrustPolicy.insecureSkipVerify}.
 */
export interface InsecureSkipVerifyTrustPolicy {
  readonly type: 'InsecureSkipVerify';
}

export type TrustPolicy = StrictCaTrustPolicy | InsecureSkipVerifyTrustPolicy;

/**
 * The trust settings exactly as configured, before validation.
 */
export interface TrustDirective {
  readonly caBundle?: string | Buffer;
  readonly insecureSkipVerify?: boolean;
}

export const TrustPolicy = {
  strictCa(caBundle: string | Buffer, context?: string): StrictCaTrustPolicy {
    const pem = Buffer.isBuffer(caBundle) ? caBundle.toString('utf8') : caBundle;
    const certificates = readCertificates(pem);
    if (certificates.length === 0) {
      throw new CredentialError(`certificate authority bundle for '${context}' contains no certificates`, context);
    }
    return Object.freeze({type: 'StrictCA', caBundle: certificates.map(c => c.pem).join('')});
  },

  insecureSkipVerify(): InsecureSkipVerifyTrustPolicy {
    return Object.freeze({type: 'InsecureSkipVerify'});
  },

  /**
   * @throws MissingTrustPolicyError when neither a CA nor the insecure opt-in is present
   * @throws CredentialError when both are present
   */
  fromDirective(directive: TrustDirective | undefined, context?: string): TrustPolicy {
    const hasCa = directive?.caBundle !== undefined && directive.caBundle.length > 0;
    const insecure = directive?.insecureSkipVerify === true;

    if (hasCa && insecure) {
      throw new CredentialError(
        `context '${context}' specifies a certificate authority together with insecure-skip-tls-verify`,
        context,
      );
    }
    if (insecure) {
      return TrustPolicy.insecureSkipVerify();
    }
    if (directive?.caBundle !== undefined && hasCa) {
      return TrustPolicy.strictCa(directive.caBundle, context);
    }
    throw new MissingTrustPolicyError(context);
  },
};

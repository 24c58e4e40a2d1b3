// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type KeyObject} from 'node:crypto';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type KubewalkLogger} from '../../../core/logging/kubewalk-logger.js';
import {
  IncompleteIdentityError,
  InvalidPassphraseError,
  UnsupportedCredentialFormatError,
} from '../../../core/errors/credential-errors.js';
import {labelOf, type CredentialSource} from './credential-source.js';
import {ClientIdentity, type DecodedCredential} from './client-identity.js';
import {TrustPolicy, type TrustDirective} from './trust-policy.js';
import {CREDENTIAL_DECODERS, DecodeMismatch, type CredentialDecoder} from './decoders/index.js';
import {canonicalPrivateKey, keyMatchesCertificate, type DecodedCertificate} from './decoders/certificates.js';

export interface IdentityRequest {
  readonly context: string;
  readonly credentials: readonly CredentialSource[];
  readonly trust?: TrustDirective;
}

export interface ResolvedIdentity {
  readonly context: string;
  readonly identity: ClientIdentity;
  readonly trustPolicy: TrustPolicy;
}

/**
 * Turns the credential material configured for a context into one TLS client identity and a trust policy.
 */
@injectable()
export class IdentityResolver {
  private readonly logger: KubewalkLogger;

  public constructor(@inject(InjectTokens.KubewalkLogger) logger?: KubewalkLogger) {
    this.logger = patchInject(logger, InjectTokens.KubewalkLogger, this.constructor.name);
  }

  /**
   * @throws MissingTrustPolicyError - no CA and no explicit insecure opt-in
   * @throws UnsupportedCredentialFormatError - a source no decoder accepts
   * @throws InvalidPassphraseError - a protected container without the right passphrase
   * @throws IncompleteIdentityError - no certificate, no key, several keys, or a key matching no certificate
   */
  public async resolve(request: IdentityRequest): Promise<ResolvedIdentity> {
    const {context} = request;
    const trustPolicy = TrustPolicy.fromDirective(request.trust, context);
    if (trustPolicy.type === 'InsecureSkipVerify') {
      this.logger.warn(`context '${context}' accepts any server certificate (insecure-skip-tls-verify)`);
    }

    if (request.credentials.length === 0) {
      throw new IncompleteIdentityError(`context '${context}' has no client credentials`, context);
    }

    const decoded = request.credentials.map((source, index) => this.decode(source, index, context));
    const certificates = IdentityResolver.uniqueCertificates(decoded);
    const privateKey = IdentityResolver.singlePrivateKey(decoded, context);

    if (certificates.length === 0) {
      throw new IncompleteIdentityError(`context '${context}' has a private key but no client certificate`, context);
    }

    const leaf = certificates.find(certificate => keyMatchesCertificate(privateKey, certificate));
    if (!leaf) {
      throw new IncompleteIdentityError(`private key of context '${context}' matches none of its certificates`, context);
    }

    const chain = [leaf, ...certificates.filter(certificate => certificate !== leaf)];
    const identity = new ClientIdentity(
      chain.map(certificate => certificate.pem),
      canonicalPrivateKey(privateKey),
      leaf.fingerprint,
      leaf.subject,
      leaf.notAfter,
    );

    if (identity.isExpired()) {
      this.logger.warn(`client certificate of context '${context}' expired on ${identity.notAfter.toISOString()}`);
    }
    this.logger.debug(`resolved identity for context '${context}': ${identity}`);

    return Object.freeze({context, identity, trustPolicy});
  }

  /**
   * Tries each decoder in turn and returns the first success.
   */
  public decode(
    source: CredentialSource,
    index: number,
    context?: string,
    decoders: readonly CredentialDecoder[] = CREDENTIAL_DECODERS,
  ): DecodedCredential {
    const label = labelOf(source, index);
    const mismatches: DecodeMismatch[] = [];

    for (const decoder of decoders) {
      let result: DecodedCredential | DecodeMismatch;
      try {
        result = decoder(source);
      } catch (error) {
        if (error instanceof InvalidPassphraseError && error.context === undefined) {
          throw new InvalidPassphraseError(error.source, error.passphraseSupplied, context, error.cause);
        }
        throw error;
      }

      if (result instanceof DecodeMismatch) {
        mismatches.push(result);
        continue;
      }

      if (source.encoding && source.encoding !== 'auto' && source.encoding !== result.decoder) {
        this.logger.debug(`${label} declared as ${source.encoding} but decoded as ${result.decoder}`);
      }
      return result;
    }

    this.logger.debug(`no decoder accepted ${label}: ${mismatches.map(m => `${m.decoder}: ${m.reason}`).join(' | ')}`);
    throw new UnsupportedCredentialFormatError(
      label,
      mismatches.map(m => m.decoder),
      context,
    );
  }

  private static uniqueCertificates(decoded: readonly DecodedCredential[]): DecodedCertificate[] {
    const seen = new Set<string>();
    const certificates: DecodedCertificate[] = [];
    for (const certificate of decoded.flatMap(d => d.certificates)) {
      if (!seen.has(certificate.fingerprint)) {
        seen.add(certificate.fingerprint);
        certificates.push(certificate);
      }
    }
    return certificates;
  }

  private static singlePrivateKey(decoded: readonly DecodedCredential[], context: string): KeyObject {
    const keys = new Map<string, KeyObject>();
    for (const {privateKey} of decoded) {
      if (privateKey) {
        keys.set(canonicalPrivateKey(privateKey), privateKey);
      }
    }

    if (keys.size === 0) {
      throw new IncompleteIdentityError(`context '${context}' has no client private key`, context);
    }
    if (keys.size > 1) {
      throw new IncompleteIdentityError(`context '${context}' has ${keys.size} different private keys`, context);
    }
    return [...keys.values()][0];
  }
}

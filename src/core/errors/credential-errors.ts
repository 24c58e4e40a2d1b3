// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

/**
 * Base class for every failure to turn configured credential material into a client identity. A credential error is
 * fatal to the activation of the context it belongs to and to nothing else.
 */
export class CredentialError extends KubewalkError {
  public constructor(
    message: string,
    public readonly context: string | undefined,
    cause: unknown = {},
    meta: Record<string, unknown> = {},
  ) {
    super(message, cause, {...meta, context});
  }
}

export class UnsupportedCredentialFormatError extends CredentialError {
  /**
   * @param source - label of the credential source that no decoder accepted
   * @param attempted - names of the decoders that were tried, in order
   */
  public constructor(
    public readonly source: string,
    attempted: readonly string[],
    context?: string,
  ) {
    super(`unsupported credential format for '${source}' (tried ${attempted.join(', ')})`, context, {}, {source});
  }
}

export class InvalidPassphraseError extends CredentialError {
  public constructor(
    public readonly source: string,
    public readonly passphraseSupplied: boolean,
    context?: string,
    cause: unknown = {},
  ) {
    super(
      passphraseSupplied
        ? `invalid passphrase for PKCS#12 credential '${source}'`
        : `PKCS#12 credential '${source}' requires a passphrase`,
      context,
      cause,
      {source, passphraseSupplied},
    );
  }
}

export class MissingTrustPolicyError extends CredentialError {
  public constructor(context?: string) {
    super(
      `no trust policy configured for context '${context ?? '<unnamed>'}': ` +
        'supply a certificate authority or explicitly opt into insecure-skip-tls-verify',
      context,
    );
  }
}

export class IncompleteIdentityError extends CredentialError {
  public constructor(message: string, context?: string) {
    super(message, context);
  }
}

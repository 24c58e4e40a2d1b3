// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsIn, IsOptional, IsString} from 'class-validator';
import {type CredentialEncoding} from '../../../integration/kube/identity/credential-source.js';

export const CREDENTIAL_ENCODINGS: readonly CredentialEncoding[] = ['pem', 'pkcs12', 'der-key', 'auto'];

/**
 * One credential of a context: a file or inline data, and optionally the passphrase protecting it.
 */
@Exclude()
export class CredentialSettings {
  @Expose()
  @IsOptional()
  @IsString()
  public file?: string;

  /** PEM text, or base64 of a binary encoding */
  @Expose()
  @IsOptional()
  @IsString()
  public data?: string;

  @Expose()
  @IsOptional()
  @IsIn(CREDENTIAL_ENCODINGS)
  public encoding?: CredentialEncoding;

  @Expose()
  @IsOptional()
  @IsString()
  public passphrase?: string;

  /** name of an environment variable holding the passphrase */
  @Expose()
  @IsOptional()
  @IsString()
  public passphraseEnv?: string;
}

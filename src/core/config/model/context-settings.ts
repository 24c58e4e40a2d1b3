// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsArray, IsNotEmpty, IsOptional, IsString, IsUrl, ValidateNested} from 'class-validator';
import {CredentialSettings} from './credential-settings.js';
import {TrustSettings} from './trust-settings.js';

@Exclude()
export class ContextSettings {
  @Expose()
  @IsString()
  @IsNotEmpty()
  public name: string;

  @Expose()
  @IsUrl({protocols: ['https', 'http'], require_protocol: true, require_tld: false})
  public server: string;

  @Expose()
  @IsArray()
  @ValidateNested({each: true})
  @Type(() => CredentialSettings)
  public credentials: CredentialSettings[];

  @Expose()
  @IsOptional()
  @ValidateNested()
  @Type(() => TrustSettings)
  public trust?: TrustSettings;

  public constructor(name?: string, server?: string, credentials?: CredentialSettings[], trust?: TrustSettings) {
    this.name = name ?? '';
    this.server = server ?? '';
    this.credentials = credentials ?? [];
    this.trust = trust;
  }
}

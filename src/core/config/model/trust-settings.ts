// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {IsBoolean, IsOptional, IsString} from 'class-validator';

@Exclude()
export class TrustSettings {
  @Expose()
  @IsOptional()
  @IsString()
  public caFile?: string;

  @Expose()
  @IsOptional()
  @IsString()
  public caData?: string;

  @Expose()
  @IsOptional()
  @IsBoolean()
  public insecureSkipVerify?: boolean;
}

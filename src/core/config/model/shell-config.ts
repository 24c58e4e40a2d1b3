// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsArray, IsIn, IsInt, IsNumber, IsOptional, Max, Min} from 'class-validator';
import * as constants from '../../constants.js';

export const LOG_LEVELS: readonly string[] = ['error', 'warn', 'info', 'debug'];

/**
 * The shell configuration file. Contexts are kept raw here and validated one by one, so that a broken entry does not
 * invalidate the others.
 */
@Exclude()
export class ShellConfig {
  @Expose()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  public refreshIntervalSeconds: number = constants.DEFAULT_REFRESH_INTERVAL.toSeconds();

  /** defaults to twice the refresh interval */
  @Expose()
  @Type(() => Number)
  @IsOptional()
  @IsInt()
  @Min(1)
  public staleAfterSeconds?: number;

  @Expose()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  public cancelGraceSeconds: number = constants.DEFAULT_CANCEL_GRACE_PERIOD.toSeconds();

  @Expose()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  public retryAttempts: number = constants.DEFAULT_RETRY_ATTEMPTS;

  @Expose()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  public retryBackoffMillis: number = constants.DEFAULT_RETRY_BACKOFF.toMillis();

  @Expose()
  @IsOptional()
  @IsIn(LOG_LEVELS)
  public logLevel?: string;

  @Expose()
  @IsArray()
  public contexts: unknown[] = [];
}

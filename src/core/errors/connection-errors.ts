// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

/**
 * A network level failure talking to the API server. Transient failures of idempotent reads are retried before this
 * error reaches a caller.
 */
export class ConnectionError extends KubewalkError {
  public constructor(
    message: string,
    public readonly transient: boolean,
    cause: unknown = {},
    meta: Record<string, unknown> = {},
  ) {
    super(message, cause, {...meta, transient});
  }
}

/**
 * The API server answered with a failing HTTP status.
 */
export class RequestFailedError extends KubewalkError {
  public override readonly statusCode: number;

  public constructor(
    message: string,
    statusCode: number,
    public readonly body: unknown = undefined,
    cause: unknown = {},
  ) {
    super(`${message}, statusCode: ${statusCode}`, cause, {statusCode});
    this.statusCode = statusCode;
  }
}

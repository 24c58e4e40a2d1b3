// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

export class ConfigurationError extends KubewalkError {
  public constructor(message: string, cause: unknown = {}, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}

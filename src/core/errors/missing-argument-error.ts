// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

export class MissingArgumentError extends KubewalkError {
  /**
   * Create a custom error for missing argument scenario
   *
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(message: string, cause: unknown = {}) {
    super(message, cause);
  }
}

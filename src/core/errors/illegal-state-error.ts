// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

export class IllegalStateError extends KubewalkError {
  /**
   * Raised when an object is asked to do something its current state does not allow.
   *
   * @param message - error message
   * @param state - the state the object was in
   */
  public constructor(message: string, state: string) {
    super(message, {}, {state});
  }
}

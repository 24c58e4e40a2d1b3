// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

export class UnknownCommandError extends KubewalkError {
  public constructor(public readonly verb: string) {
    super(`unknown command '${verb}', try 'help'`, {}, {verb});
  }
}

export class InvalidArgumentError extends KubewalkError {
  public constructor(message: string, argument?: string) {
    super(message, {}, {argument});
  }
}

export class NoSelectionError extends KubewalkError {
  /**
   * @param command - the command that needed a selection
   * @param required - the level that has to be selected first
   */
  public constructor(command: string, required: string) {
    super(`'${command}' needs a selected ${required}`, {}, {command, required});
  }
}

export class CancelledError extends KubewalkError {
  public constructor(message: string = 'cancelled') {
    super(message);
  }
}

export type NavigationFailure = 'not-selectable' | 'at-root' | 'unknown-context';

/**
 * A navigation request that could not be honoured. The path is unchanged.
 */
export class NavigationError extends KubewalkError {
  public constructor(
    message: string,
    public readonly failure: NavigationFailure,
  ) {
    super(message, {}, {failure});
  }
}

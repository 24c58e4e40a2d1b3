// SPDX-License-Identifier: Apache-2.0

import {CancelledError} from '../core/errors/command-errors.js';

/**
 * A one-shot cancellation flag shared by the foreground loop and the running command. Flipping it does nothing else;
 * the command reacts on its own schedule through {@link whenCancelled} or {@link signal}.
 */
export class CancellationToken {
  public readonly whenCancelled: Promise<void>;
  private readonly controller = new AbortController();

  public constructor() {
    this.whenCancelled = new Promise<void>(resolve => {
      this.controller.signal.addEventListener('abort', () => resolve(), {once: true});
    });
  }

  public get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * @returns true if this call cancelled the token, false if it was already cancelled
   */
  public cancel(): boolean {
    if (this.controller.signal.aborted) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  public throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError();
    }
  }
}

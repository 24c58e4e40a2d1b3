// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {v4 as uuid4} from 'uuid';
import {type StreamHandle} from '../integration/kube/connection/stream-handle.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../core/logging/kubewalk-logger.js';
import {errorMessage} from '../core/helpers.js';
import {type CancellationToken} from './cancellation-token.js';
import {type CommandInvocation} from './command-invocation.js';
import {type CommandResult} from './command-definition.js';
import {CommandOutcome} from './command-outcome.js';
import {type OutputWriter} from './output-writer.js';

export type TaskState = 'running' | 'completed' | 'failed' | 'cancelled';

const CANCELLED: unique symbol = Symbol('cancelled');

/**
 * The command currently executing in the foreground. At most one exists at a time; it owns the cancellation token the
 * interrupt handler flips and, for streaming commands, the stream handle.
 */
export class RunningTask {
  public readonly id: string = uuid4();
  private readonly logger: KubewalkLogger;
  private _state: TaskState = 'running';
  private _handle?: StreamHandle;

  public constructor(
    public readonly invocation: CommandInvocation,
    public readonly token: CancellationToken,
    private readonly interruptible: boolean = true,
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  public get state(): TaskState {
    return this._state;
  }

  public get handle(): StreamHandle | undefined {
    return this._handle;
  }

  /**
   * Requests cancellation. Only the first request of a running, interruptible task has an effect.
   */
  public cancel(): boolean {
    if (!this.interruptible) {
      this.logger.showUser(`'${this.invocation.verb}' cannot be interrupted, waiting for it to finish`);
      return false;
    }
    if (this._state !== 'running') {
      return false;
    }
    return this.token.cancel();
  }

  public async run(start: () => Promise<CommandResult>, writer: OutputWriter): Promise<CommandOutcome> {
    this.invocation.transition('running');

    let result: CommandResult | typeof CANCELLED;
    try {
      result = this.interruptible ? await this.untilCancelled(start()) : await start();
    } catch (error) {
      return this.settle(this.token.isCancelled ? CommandOutcome.cancelled() : CommandOutcome.fromError(error));
    }

    if (result === CANCELLED) {
      return this.settle(CommandOutcome.cancelled());
    }
    if (result.type === 'stream') {
      return this.settle(await this.consume(result.handle, writer));
    }
    return this.settle(CommandOutcome.ok(result));
  }

  private async consume(handle: StreamHandle, writer: OutputWriter): Promise<CommandOutcome> {
    this._handle = handle;
    const cancelling = this.token.whenCancelled.then(() => handle.cancel());

    let chunks = 0;
    let drained = false;
    try {
      for await (const chunk of handle) {
        writer.write(chunk);
        chunks++;
      }
      drained = true;
    } catch (error) {
      if (!this.token.isCancelled) {
        return CommandOutcome.fromError(error);
      }
    } finally {
      // left before the stream ended, e.g. because the writer threw
      if (!drained && !this.token.isCancelled) {
        await handle.cancel();
      }
    }

    if (this.token.isCancelled) {
      const confirmed = await cancelling;
      this.logger.debug(`task ${this.id}: stream ${handle.id} cancelled, closure confirmed: ${confirmed}`);
      return CommandOutcome.cancelled();
    }
    return CommandOutcome.ok({type: 'stream', chunks});
  }

  /**
   * Settles with the command's result, or with {@link CANCELLED} as soon as the token is cancelled. A stream that
   * opens after the task was cancelled is cancelled in turn.
   */
  private async untilCancelled(pending: Promise<CommandResult>): Promise<CommandResult | typeof CANCELLED> {
    const outcome = await Promise.race([pending, this.token.whenCancelled.then((): typeof CANCELLED => CANCELLED)]);
    if (outcome === CANCELLED) {
      pending
        .then(late => (late.type === 'stream' ? late.handle.cancel() : undefined))
        .catch(error => this.logger.debug(`task ${this.id}: cancelled command failed late: ${errorMessage(error)}`));
    }
    return outcome;
  }

  private settle(outcome: CommandOutcome): CommandOutcome {
    this._state = outcome.status === 'ok' ? 'completed' : outcome.status;
    this.invocation.transition(this._state);
    return outcome;
  }
}

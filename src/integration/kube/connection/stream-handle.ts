// SPDX-License-Identifier: Apache-2.0

import {PassThrough, Writable} from 'node:stream';
import {StringDecoder} from 'node:string_decoder';
import {container} from 'tsyringe-neo';
import {type StreamConnection} from './cluster-api.js';
import {type Duration} from '../../../core/time/duration.js';
import {withTimeout} from '../../../core/helpers.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../../../core/logging/kubewalk-logger.js';

export type OutputChannel = 'stdout' | 'stderr';

export interface OutputChunk {
  readonly channel: OutputChannel;
  readonly text: string;
}

export type StreamState = 'open' | 'ended' | 'failed' | 'cancelled';

/** Chunks waiting for the consumer before the sinks stop acknowledging writes. */
export const QUEUE_HIGH_WATER_MARK = 64;

/**
 * One open log or exec stream. Output is consumed with `for await`; iteration ends when the server ends the stream or
 * the handle is cancelled, and throws when the transport fails.
 */
export class StreamHandle implements AsyncIterable<OutputChunk> {
  public readonly stdout: Writable;
  public readonly stderr: Writable;
  /** input of the remote command, for exec streams opened to forward it */
  public readonly stdin?: PassThrough;

  private readonly logger: KubewalkLogger;
  private readonly queue: OutputChunk[] = [];
  private readonly releaseListeners: Array<() => void> = [];
  /** write callbacks held back until the consumer catches up */
  private readonly held: Array<() => void> = [];
  private waiter?: () => void;
  private connection?: StreamConnection;
  private failure?: unknown;
  private _state: StreamState = 'open';
  private released: boolean = false;

  public constructor(
    public readonly id: string,
    private readonly gracePeriod: Duration,
    forwardsInput: boolean = false,
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
    this.stdout = this.sink('stdout', true);
    this.stderr = this.sink('stderr', false);
    this.stdin = forwardsInput ? new PassThrough() : undefined;
  }

  public get state(): StreamState {
    return this._state;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  /**
   * Binds the transport once it is open. A handle cancelled while the transport was opening aborts it immediately.
   */
  public attach(connection: StreamConnection): void {
    this.connection = connection;
    if (this._state === 'cancelled') {
      connection.abort();
    }
  }

  public get acceptsInput(): boolean {
    return this.stdin !== undefined && !this.stdin.writableEnded && this._state === 'open';
  }

  /**
   * Sends text to the remote command.
   *
   * @returns false when the stream takes no input, or no longer does
   */
  public sendInput(text: string): boolean {
    const stdin = this.stdin;
    if (!stdin || stdin.writableEnded || this._state !== 'open') {
      return false;
    }
    stdin.write(text);
    return true;
  }

  /** Signals the end of input to the remote command. */
  public endInput(): void {
    if (this.stdin && !this.stdin.writableEnded) {
      this.stdin.end();
    }
  }

  public onReleased(listener: () => void): void {
    if (this.released) {
      listener();
    } else {
      this.releaseListeners.push(listener);
    }
  }

  /**
   * Stops the stream. Waits at most the grace period for the transport to confirm it closed, then releases the handle
   * either way.
   *
   * @returns whether the transport confirmed closure within the grace period
   */
  public async cancel(): Promise<boolean> {
    if (this.released) {
      return true;
    }
    if (this._state === 'open') {
      this._state = 'cancelled';
      this.queue.length = 0;
      this.notify();
      this.resume();
    }

    let confirmed = true;
    const connection = this.connection;
    if (connection) {
      try {
        connection.abort();
      } catch (error) {
        this.logger.warn(`stream ${this.id}: abort failed`, error);
      }
      confirmed = await withTimeout(
        connection.closed.then(() => true),
        this.gracePeriod,
        () => false,
      );
      if (!confirmed) {
        this.logger.warn(`stream ${this.id} did not close within ${this.gracePeriod}, releasing it`);
      }
    }

    this.release();
    return confirmed;
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<OutputChunk, void, undefined> {
    while (true) {
      const chunk = this.queue.shift();
      if (chunk) {
        this.resume();
        yield chunk;
        continue;
      }
      if (this._state === 'failed') {
        throw this.failure;
      }
      if (this._state !== 'open') {
        return;
      }
      await new Promise<void>(resolve => {
        this.waiter = resolve;
      });
    }
  }

  /** Marks the stream failed, e.g. when the transport could not be opened. */
  public fail(error: unknown): void {
    if (this._state !== 'open') {
      return;
    }
    this.logger.debug(`stream ${this.id} failed`, error);
    this.failure = error;
    this._state = 'failed';
    this.notify();
    this.resume();
    this.release();
  }

  private finish(): void {
    if (this._state !== 'open') {
      return;
    }
    this._state = 'ended';
    this.notify();
    this.release();
  }

  private push(chunk: OutputChunk): void {
    if (this._state !== 'open' || chunk.text.length === 0) {
      return;
    }
    this.queue.push(chunk);
    this.notify();
  }

  private notify(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }

  /** Acknowledges held writes once the queue is below the high-water mark, or for good once the stream is over. */
  private resume(): void {
    if (this.queue.length >= QUEUE_HIGH_WATER_MARK && this._state === 'open') {
      return;
    }
    for (const callback of this.held.splice(0)) {
      callback();
    }
  }

  private release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.resume();
    this.endInput();
    for (const listener of this.releaseListeners.splice(0)) {
      listener();
    }
  }

  private sink(channel: OutputChannel, primary: boolean): Writable {
    const decoder = new StringDecoder('utf8');
    const sink = new Writable({
      write: (chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) => {
        this.push({channel, text: Buffer.isBuffer(chunk) ? decoder.write(chunk) : chunk});
        if (this.queue.length >= QUEUE_HIGH_WATER_MARK && this._state === 'open') {
          this.held.push(() => callback());
        } else {
          callback();
        }
      },
      final: callback => {
        this.push({channel, text: decoder.end()});
        callback();
      },
    });

    sink.on('error', error => this.fail(error));
    if (primary) {
      sink.on('finish', () => this.finish());
      sink.on('close', () => this.finish());
    }
    return sink;
  }
}

// SPDX-License-Identifier: Apache-2.0

import {type OutputChunk} from '../integration/kube/connection/stream-handle.js';

/**
 * Receives streamed output as it arrives.
 */
export interface OutputWriter {
  write(chunk: OutputChunk): void;
}

export const DISCARDING_WRITER: OutputWriter = Object.freeze({
  write: (): void => undefined,
});

/** Keeps every chunk, mostly for tests and scripted use. */
export class BufferedOutputWriter implements OutputWriter {
  public readonly chunks: OutputChunk[] = [];

  public write(chunk: OutputChunk): void {
    this.chunks.push(chunk);
  }

  public text(channel?: OutputChunk['channel']): string {
    return this.chunks
      .filter(chunk => channel === undefined || chunk.channel === channel)
      .map(chunk => chunk.text)
      .join('');
  }
}

// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import sinon from 'sinon';

import {type OutputChunk, QUEUE_HIGH_WATER_MARK, StreamHandle} from '../../../../../src/integration/kube/connection/stream-handle.js';
import {type StreamConnection} from '../../../../../src/integration/kube/connection/cluster-api.js';
import {Duration} from '../../../../../src/core/time/duration.js';

async function collect(handle: StreamHandle): Promise<OutputChunk[]> {
  const chunks: OutputChunk[] = [];
  for await (const chunk of handle) {
    chunks.push(chunk);
  }
  return chunks;
}

function connection(closed: Promise<void> = Promise.resolve()): StreamConnection & {abort: sinon.SinonSpy} {
  return {abort: sinon.spy(), closed};
}

describe('StreamHandle', () => {
  it('should deliver output of both channels until the stream ends', async () => {
    const handle = new StreamHandle('logs-1', Duration.ofMillis(100));
    handle.attach(connection());
    const output = collect(handle);

    handle.stdout.write('line 1\n');
    handle.stderr.write('warning\n');
    handle.stdout.end('line 2\n');

    expect(await output).to.deep.equal([
      {channel: 'stdout', text: 'line 1\n'},
      {channel: 'stderr', text: 'warning\n'},
      {channel: 'stdout', text: 'line 2\n'},
    ]);
    expect(handle.state).to.equal('ended');
    expect(handle.isReleased).to.be.true;
  });

  it('should decode multi-byte characters split across chunks', async () => {
    const handle = new StreamHandle('logs-2', Duration.ofMillis(100));
    const bytes = Buffer.from('é', 'utf8');
    handle.stdout.write(bytes.subarray(0, 1));
    handle.stdout.end(bytes.subarray(1));

    const text = (await collect(handle)).map(chunk => chunk.text).join('');
    expect(text).to.equal('é');
  });

  it('should end iteration and abort the transport when cancelled', async () => {
    const handle = new StreamHandle('logs-3', Duration.ofMillis(100));
    const transport = connection();
    handle.attach(transport);
    const output = collect(handle);

    handle.stdout.write('before\n');
    await new Promise(resolve => setImmediate(resolve));
    const confirmed = await handle.cancel();
    handle.stdout.write('after\n');

    expect(confirmed).to.be.true;
    expect(transport.abort).to.have.been.calledOnce;
    expect(await output).to.deep.equal([{channel: 'stdout', text: 'before\n'}]);
    expect(handle.state).to.equal('cancelled');
  });

  it('should release the handle when the transport does not confirm closure within the grace period', async () => {
    const handle = new StreamHandle('exec-1', Duration.ofMillis(20));
    handle.attach(connection(new Promise<void>(() => {})));
    const released = sinon.spy();
    handle.onReleased(released);

    expect(await handle.cancel()).to.be.false;
    expect(handle.isReleased).to.be.true;
    expect(released).to.have.been.calledOnce;
  });

  it('should abort a transport attached after cancellation', async () => {
    const handle = new StreamHandle('logs-4', Duration.ofMillis(100));
    await handle.cancel();

    const transport = connection();
    handle.attach(transport);
    expect(transport.abort).to.have.been.calledOnce;
  });

  it('should throw from iteration when the transport fails', async () => {
    const handle = new StreamHandle('logs-5', Duration.ofMillis(100));
    handle.attach(connection());
    const output = collect(handle);

    handle.stdout.destroy(new Error('connection reset'));

    await expect(output).to.be.rejectedWith('connection reset');
    expect(handle.state).to.equal('failed');
    expect(handle.isReleased).to.be.true;
  });

  it('should stop acknowledging writes while the consumer lags behind', async () => {
    const handle = new StreamHandle('logs-6', Duration.ofMillis(100));
    handle.attach(connection());
    const lines = Array.from({length: QUEUE_HIGH_WATER_MARK + 16}, (_, index) => `line ${index}\n`);
    for (const line of lines) {
      handle.stdout.write(line);
    }
    handle.stdout.end();
    await new Promise(resolve => setImmediate(resolve));

    expect(handle.stdout.writableLength).to.be.greaterThan(0);
    expect(handle.state).to.equal('open');

    const text = (await collect(handle)).map(chunk => chunk.text).join('');
    expect(text).to.equal(lines.join(''));
    expect(handle.state).to.equal('ended');
  });

  it('should let held writes through once cancelled', async () => {
    const handle = new StreamHandle('logs-7', Duration.ofMillis(100));
    handle.attach(connection());
    for (let index = 0; index < QUEUE_HIGH_WATER_MARK + 4; index++) {
      handle.stdout.write(`line ${index}\n`);
    }
    await new Promise(resolve => setImmediate(resolve));
    expect(handle.stdout.writableLength).to.be.greaterThan(0);

    await handle.cancel();
    await new Promise(resolve => setImmediate(resolve));
    expect(handle.stdout.writableLength).to.equal(0);
    expect(await collect(handle)).to.deep.equal([]);
  });

  it('should forward input until the stream is over', async () => {
    const handle = new StreamHandle('exec-2', Duration.ofMillis(100), true);
    const received: string[] = [];
    handle.stdin?.on('data', (chunk: Buffer) => received.push(chunk.toString('utf8')));

    expect(handle.acceptsInput).to.be.true;
    expect(handle.sendInput('ls\n')).to.be.true;
    handle.stdout.end();
    await collect(handle);

    expect(handle.acceptsInput).to.be.false;
    expect(handle.sendInput('pwd\n')).to.be.false;
    expect(received).to.deep.equal(['ls\n']);
    expect(handle.stdin?.writableEnded).to.be.true;
  });

  it('should take no input unless opened to forward it', () => {
    const handle = new StreamHandle('exec-3', Duration.ofMillis(100));
    expect(handle.stdin).to.be.undefined;
    expect(handle.acceptsInput).to.be.false;
    expect(handle.sendInput('ls\n')).to.be.false;
  });
});

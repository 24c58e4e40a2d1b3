// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {CancellationToken} from '../../../src/commands/cancellation-token.js';
import {CancelledError} from '../../../src/core/errors/command-errors.js';

describe('CancellationToken', () => {
  it('should cancel only once', async () => {
    const token = new CancellationToken();
    expect(token.isCancelled).to.be.false;
    expect(() => token.throwIfCancelled()).to.not.throw();

    expect(token.cancel()).to.be.true;
    expect(token.cancel()).to.be.false;
    expect(token.isCancelled).to.be.true;
    expect(token.signal.aborted).to.be.true;
    await token.whenCancelled;
  });

  it('should throw once cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).to.throw(CancelledError, 'cancelled');
  });
});

// SPDX-License-Identifier: Apache-2.0

import sinon from 'sinon';
import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';

import {ErrorHandler} from '../../../src/core/error-handler.js';
import {type KubewalkLogger} from '../../../src/core/logging/kubewalk-logger.js';
import {ConfigurationError} from '../../../src/core/errors/configuration-error.js';
import {KubewalkError} from '../../../src/core/errors/kubewalk-error.js';

describe('ErrorHandler', () => {
  let showUser: sinon.SinonStub;
  let showUserError: sinon.SinonStub;
  let handler: ErrorHandler;

  beforeEach(() => {
    showUser = sinon.stub();
    showUserError = sinon.stub();
    const logger: KubewalkLogger = {
      nextTraceId: sinon.stub(),
      prepMeta: sinon.stub().returns({}),
      showUser,
      showUserError,
      error: sinon.stub(),
      warn: sinon.stub(),
      info: sinon.stub(),
      debug: sinon.stub(),
    };
    handler = new ErrorHandler(logger);
  });

  it('should print configuration errors as a single line', () => {
    handler.handle(new ConfigurationError('no contexts configured'));

    expect(showUser).to.have.been.calledOnce;
    expect(String(showUser.firstCall.args[0])).to.include('no contexts configured');
    expect(showUserError).to.not.have.been.called;
  });

  it('should find a configuration error among the causes', () => {
    handler.handle(new KubewalkError('startup failed', new ConfigurationError("kubeconfig 'x' does not exist")));

    expect(String(showUser.firstCall.args[0])).to.include("kubeconfig 'x' does not exist");
  });

  it('should give any other error the full report', () => {
    const error = new KubewalkError('Error initializing container');
    handler.handle(error);

    expect(showUserError).to.have.been.calledOnceWith(error);
    expect(showUser).to.not.have.been.called;
  });
});

// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {KubewalkError} from '../../../src/core/errors/kubewalk-error.js';
import {NotFoundError} from '../../../src/core/errors/not-found-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {ConnectionError, RequestFailedError} from '../../../src/core/errors/connection-errors.js';
import {
  InvalidPassphraseError,
  MissingTrustPolicyError,
  UnsupportedCredentialFormatError,
} from '../../../src/core/errors/credential-errors.js';
import {NoSelectionError, UnknownCommandError} from '../../../src/core/errors/command-errors.js';

describe('Errors', () => {
  const message = 'errorMessage';
  const cause = new Error('cause');

  it('should construct correct KubewalkError', () => {
    const error = new KubewalkError(message, cause);
    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('KubewalkError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.deep.equal(cause);
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.contain('Caused by: Error: cause');
  });

  it('should take the status code of its cause', () => {
    const error = new KubewalkError(message, {statusCode: 503});
    expect(error.statusCode).to.equal(503);
  });

  it('should construct correct NotFoundError', () => {
    const error = new NotFoundError('pod', 'web-0', 'default');
    expect(error).to.be.instanceof(KubewalkError);
    expect(error.name).to.equal('NotFoundError');
    expect(error.resourceName).to.equal('web-0');
    expect(error.message).to.equal("pod 'web-0' not found in 'default'");
    expect(String(error)).to.equal("NotFoundError: pod 'web-0' not found in 'default'");
    expect(error.meta).to.deep.equal({kind: 'pod', name: 'web-0', parentPath: 'default'});
  });

  it('should omit the parent path of cluster scoped resources', () => {
    expect(new NotFoundError('namespace', 'kube-system').message).to.equal("namespace 'kube-system' not found");
  });

  it('should construct correct IllegalArgumentError', () => {
    const value = 'invalid argument';
    const error = new IllegalArgumentError(message, value);
    expect(error).to.be.instanceof(KubewalkError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.cause).to.deep.equal({});
    expect(error.meta).to.deep.equal({value});
  });

  it('should construct correct ConnectionError', () => {
    const error = new ConnectionError(message, true, cause, {code: 'ECONNRESET'});
    expect(error.transient).to.be.true;
    expect(error.meta).to.deep.equal({code: 'ECONNRESET', transient: true});
  });

  it('should construct correct RequestFailedError', () => {
    const error = new RequestFailedError('forbidden', 403, {reason: 'Forbidden'});
    expect(error.message).to.equal('forbidden, statusCode: 403');
    expect(error.statusCode).to.equal(403);
    expect(error.body).to.deep.equal({reason: 'Forbidden'});
  });

  it('should name the credential source in credential errors', () => {
    expect(new UnsupportedCredentialFormatError('client.bin', ['pem', 'pkcs12'], 'prod').message).to.equal(
      "unsupported credential format for 'client.bin' (tried pem, pkcs12)",
    );
    expect(new InvalidPassphraseError('client.p12', true, 'prod').message).to.equal(
      "invalid passphrase for PKCS#12 credential 'client.p12'",
    );
    expect(new InvalidPassphraseError('client.p12', false).message).to.equal(
      "PKCS#12 credential 'client.p12' requires a passphrase",
    );
    expect(new MissingTrustPolicyError('prod').context).to.equal('prod');
  });

  it('should construct command errors', () => {
    expect(new UnknownCommandError('frobnicate').message).to.equal("unknown command 'frobnicate', try 'help'");
    expect(new NoSelectionError('logs', 'pod').message).to.equal("'logs' needs a selected pod");
  });
});

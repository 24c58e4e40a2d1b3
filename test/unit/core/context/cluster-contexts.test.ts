// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, before, describe, it} from 'mocha';

import {type ContextConfig} from '../../../../src/core/context/context-config.js';
import {ResourceKind} from '../../../../src/integration/kube/resources/resource-kind.js';
import {InvalidPassphraseError} from '../../../../src/core/errors/credential-errors.js';
import {ConfigurationError} from '../../../../src/core/errors/configuration-error.js';
import {ConnectionError} from '../../../../src/core/errors/connection-errors.js';
import {NotFoundError} from '../../../../src/core/errors/not-found-error.js';
import {networkError} from '../../../helpers/fake-cluster-api.js';
import {pemContext, testSession, type TestSession} from '../../../helpers/test-session.js';
import {TEST_PASSPHRASE, testCredentials} from '../../../helpers/credentials.js';

function pkcs12Context(name: string, passphrase: string): ContextConfig {
  const credentials = testCredentials();
  return {
    name,
    server: `https://${name}.example.test:6443`,
    credentials: [{data: credentials.pkcs12, passphrase, label: `${name}.p12`}],
    trust: {caBundle: credentials.caPem},
  };
}

describe('ClusterContexts', () => {
  let session: TestSession;

  before(function () {
    this.timeout(30_000);
    testCredentials();
  });

  afterEach(async () => {
    await session.contexts.close();
  });

  it('should activate a PKCS#12 context with the same identity as its PEM twin', async () => {
    session = testSession([pemContext('dev'), pkcs12Context('prod', TEST_PASSPHRASE)]);

    const dev = await session.contexts.activate('dev');
    const prod = await session.contexts.activate('prod');

    expect(prod.context.identity.equals(dev.context.identity)).to.be.true;
    expect(prod.context.server).to.equal('https://prod.example.test:6443');
    expect(prod.cache.isRunning).to.be.true;
    expect(session.contexts.status('prod')).to.equal('active');
  });

  it('should keep other contexts usable when one has a wrong passphrase', async () => {
    session = testSession([pemContext('dev'), pkcs12Context('prod', 'not-the-passphrase')]);

    await expect(session.contexts.activate('prod')).to.be.rejectedWith(InvalidPassphraseError);
    expect(session.contexts.status('prod')).to.equal('failed');
    expect(session.contexts.failure('prod')).to.be.instanceof(InvalidPassphraseError);
    expect(session.contexts.get('prod')).to.be.undefined;

    const dev = await session.contexts.activate('dev');
    expect(dev.cache.completions(ResourceKind.NAMESPACE, '')).to.deep.equal(['db', 'web']);
    expect(session.factory.created.map(context => context.name)).to.deep.equal(['dev']);
  });

  it('should list contexts whose configuration could not be read as failed', async () => {
    const error = new ConfigurationError("context 'broken': server must be a URL");
    session = testSession([pemContext('dev'), {name: 'broken', error}]);

    expect(session.contexts.names()).to.deep.equal(['broken', 'dev']);
    expect(session.contexts.status('broken')).to.equal('failed');
    expect(session.contexts.status('dev')).to.equal('configured');
    await expect(session.contexts.activate('broken')).to.be.rejectedWith(error);
  });

  it('should reject a context that is not configured', async () => {
    session = testSession();
    await expect(session.contexts.activate('nope')).to.be.rejectedWith(NotFoundError, "context 'nope' not found");
  });

  it('should share one activation between concurrent callers', async () => {
    session = testSession();

    const first = session.contexts.activate('dev');
    const second = session.contexts.activate('dev');
    expect(second).to.equal(first);

    const [a, b] = await Promise.all([first, second]);
    expect(a).to.equal(b);
    expect(session.factory.created).to.have.lengthOf(1);
    expect(session.api('dev').requestsFor(ResourceKind.NAMESPACE)).to.have.lengthOf(1);
  });

  it('should allow a failed activation to be retried', async () => {
    session = testSession();
    session.api('dev').failNext(networkError('ECONNREFUSED'), 2);

    await expect(session.contexts.activate('dev')).to.be.rejectedWith(ConnectionError);
    expect(session.contexts.status('dev')).to.equal('failed');

    const active = await session.contexts.activate('dev');
    expect(active.context.name).to.equal('dev');
    expect(session.contexts.status('dev')).to.equal('active');
  });

  it('should keep the first of two contexts with the same name', () => {
    const second = {...pemContext('dev'), server: 'https://other.example.test:6443'};
    session = testSession([pemContext('dev'), second]);

    expect(session.contexts.names()).to.deep.equal(['dev']);
    const entry = session.contexts.entry('dev');
    expect(entry && 'server' in entry ? entry.server : undefined).to.equal('https://dev.example.test:6443');
  });

  it('should stop refreshing and close connections on close', async () => {
    session = testSession();
    const active = await session.contexts.activate('dev');

    await session.contexts.close();

    expect(active.cache.isRunning).to.be.false;
    expect(session.api('dev').closed).to.be.true;
    expect(session.contexts.get('dev')).to.be.undefined;
  });
});

// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, before, beforeEach, describe, it} from 'mocha';

import {ResourceKind} from '../../../../src/integration/kube/resources/resource-kind.js';
import {ConnectionError} from '../../../../src/core/errors/connection-errors.js';
import {CancelledError} from '../../../../src/core/errors/command-errors.js';
import {networkError} from '../../../helpers/fake-cluster-api.js';
import {pemContext, testSession, type TestSession} from '../../../helpers/test-session.js';
import {testCredentials} from '../../../helpers/credentials.js';

describe('NavigationState', () => {
  let session: TestSession;

  before(function () {
    this.timeout(30_000);
    testCredentials();
  });

  beforeEach(() => {
    session = testSession([pemContext('dev'), pemContext('staging')]);
  });

  afterEach(async () => {
    await session.contexts.close();
  });

  it('should start at the root', () => {
    expect(session.navigation.snapshot().depth).to.equal(0);
    expect(session.navigation.activeContext()).to.be.undefined;
  });

  it('should activate a context on first switch and load its namespaces', async () => {
    const result = await session.navigation.switchContext('dev');

    expect(result.status).to.equal('ok');
    expect(session.navigation.snapshot().toString()).to.equal('dev');
    expect(session.navigation.activeContext()?.cache.completions(ResourceKind.NAMESPACE, '')).to.deep.equal(['db', 'web']);
    expect(session.api('dev').requestsFor(ResourceKind.NAMESPACE)).to.have.lengthOf(1);
  });

  it('should report an unknown context without moving', async () => {
    await session.navigation.switchContext('dev');
    const result = await session.navigation.switchContext('nope');

    expect(result).to.deep.equal({status: 'unknown-context', name: 'nope'});
    expect(session.navigation.snapshot().toString()).to.equal('dev');
  });

  it('should leave the path unchanged when activation fails', async () => {
    await session.navigation.switchContext('dev');
    session.api('staging').failNext(networkError('ECONNREFUSED'), 5);

    await expect(session.navigation.switchContext('staging')).to.be.rejectedWith(ConnectionError);
    expect(session.navigation.snapshot().toString()).to.equal('dev');
    expect(session.contexts.status('staging')).to.equal('failed');
  });

  it('should descend through namespace, pod and container', async () => {
    await session.navigation.switchContext('dev');
    expect((await session.navigation.descend(ResourceKind.NAMESPACE, 'web')).status).to.equal('ok');
    expect((await session.navigation.descend(ResourceKind.POD, 'web-0')).status).to.equal('ok');
    expect((await session.navigation.descend(ResourceKind.CONTAINER, 'app')).status).to.equal('ok');

    expect(session.navigation.snapshot().toString()).to.equal('dev/web/web-0/app');
  });

  it('should fetch a listing only the first time it is needed', async () => {
    await session.navigation.switchContext('dev');
    await session.navigation.descend(ResourceKind.NAMESPACE, 'web');
    await session.navigation.descend(ResourceKind.POD, 'web-0');
    await session.navigation.descend(ResourceKind.POD, 'web-1');

    expect(session.api('dev').requestsFor(ResourceKind.POD)).to.have.lengthOf(1);
    expect(session.navigation.snapshot().toString()).to.equal('dev/web/web-1');
  });

  it('should report a missing name without moving', async () => {
    await session.navigation.switchContext('dev');
    await session.navigation.descend(ResourceKind.NAMESPACE, 'web');

    const result = await session.navigation.descend(ResourceKind.POD, 'web-9');

    expect(result).to.deep.equal({status: 'not-found', kind: ResourceKind.POD, name: 'web-9', parentPath: 'web'});
    expect(session.navigation.snapshot().toString()).to.equal('dev/web');
  });

  it('should replace deeper selections when selecting a sibling namespace', async () => {
    await session.navigation.switchContext('dev');
    await session.navigation.descend(ResourceKind.NAMESPACE, 'web');
    await session.navigation.descend(ResourceKind.POD, 'web-0');

    await session.navigation.descend(ResourceKind.NAMESPACE, 'db');

    expect(session.navigation.snapshot().toString()).to.equal('dev/db');
  });

  it('should leave the path unchanged once the signal is aborted', async () => {
    await session.navigation.switchContext('dev');
    const controller = new AbortController();
    controller.abort();

    await expect(session.navigation.descend(ResourceKind.NAMESPACE, 'web', controller.signal)).to.be.rejectedWith(
      CancelledError,
    );
    await expect(session.navigation.switchContext('staging', controller.signal)).to.be.rejectedWith(CancelledError);
    expect(session.navigation.snapshot().toString()).to.equal('dev');
  });

  it('should refuse selections that skip a level or leave the hierarchy', async () => {
    expect(await session.navigation.descend(ResourceKind.NAMESPACE, 'web')).to.deep.equal({
      status: 'not-selectable',
      kind: ResourceKind.NAMESPACE,
      reason: 'select a context first',
    });

    await session.navigation.switchContext('dev');
    expect(await session.navigation.descend(ResourceKind.POD, 'web-0')).to.deep.include({reason: 'select a namespace first'});
    expect(await session.navigation.descend(ResourceKind.NODE, 'node-1')).to.deep.include({status: 'not-selectable'});
    expect(session.navigation.snapshot().toString()).to.equal('dev');
  });

  it('should ascend but never above the context', async () => {
    expect(session.navigation.ascend()).to.deep.equal({status: 'at-root'});

    await session.navigation.switchContext('dev');
    expect(session.navigation.ascend()).to.deep.equal({status: 'at-root'});

    await session.navigation.descend(ResourceKind.NAMESPACE, 'web');
    await session.navigation.descend(ResourceKind.POD, 'web-0');
    expect(session.navigation.ascend(10).status).to.equal('ok');
    expect(session.navigation.snapshot().toString()).to.equal('dev');
  });

  it('should drop the whole path when switching context', async () => {
    await session.navigation.switchContext('dev');
    await session.navigation.descend(ResourceKind.NAMESPACE, 'web');

    await session.navigation.switchContext('staging');

    expect(session.navigation.snapshot().toString()).to.equal('staging');
  });
});

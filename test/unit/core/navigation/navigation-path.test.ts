// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {NavigationPath} from '../../../../src/core/navigation/navigation-path.js';
import {ResourceKind} from '../../../../src/integration/kube/resources/resource-kind.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('NavigationPath', () => {
  const full = NavigationPath.of('dev', 'web', 'web-0', 'app');

  it('should expose each selected segment', () => {
    expect(full.context).to.equal('dev');
    expect(full.namespace).to.equal('web');
    expect(full.pod).to.equal('web-0');
    expect(full.container).to.equal('app');
    expect(full.depth).to.equal(4);
    expect(full.leaf).to.deep.equal({kind: ResourceKind.CONTAINER, name: 'app'});
    expect(full.toString()).to.equal('dev/web/web-0/app');
    expect(NavigationPath.ROOT.toString()).to.equal('/');
  });

  it('should drop deeper selections when selecting at a shallower depth', () => {
    const path = full.select(ResourceKind.NAMESPACE, 'db');
    expect(path.toString()).to.equal('dev/db');
    expect(path.has(ResourceKind.POD)).to.be.false;
    expect(full.toString()).to.equal('dev/web/web-0/app');
  });

  it('should refuse a selection whose parent is missing', () => {
    expect(() => NavigationPath.of('dev').select(ResourceKind.POD, 'web-0')).to.throw(
      IllegalArgumentError,
      "cannot select pod 'web-0' without a namespace",
    );
  });

  it('should ascend without going past the root', () => {
    expect(full.ascend().toString()).to.equal('dev/web/web-0');
    expect(full.ascend(3).toString()).to.equal('dev');
    expect(full.ascend(10)).to.satisfy((path: NavigationPath) => path.equals(NavigationPath.ROOT));
  });

  it('should compute the cache parent path for each kind', () => {
    expect(full.parentPathFor(ResourceKind.NAMESPACE)).to.equal('');
    expect(full.parentPathFor(ResourceKind.POD)).to.equal('web');
    expect(full.parentPathFor(ResourceKind.CONTAINER)).to.equal('web/web-0');
    expect(NavigationPath.of('dev').parentPathFor(ResourceKind.POD)).to.be.undefined;
    expect(NavigationPath.ROOT.parentPathFor(ResourceKind.NAMESPACE)).to.be.undefined;
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(full)).to.be.true;
    expect(Object.isFrozen(full.list())).to.be.true;
  });
});

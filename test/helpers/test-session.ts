// SPDX-License-Identifier: Apache-2.0

import {type ContextConfig, type ContextEntry, type ContextTunables} from '../../src/core/context/context-config.js';
import {ClusterContexts} from '../../src/core/context/cluster-contexts.js';
import {NavigationState} from '../../src/core/navigation/navigation-state.js';
import {CommandDispatcher} from '../../src/commands/command-dispatcher.js';
import {defaultRegistry} from '../../src/commands/definitions/index.js';
import {BufferedOutputWriter} from '../../src/commands/output-writer.js';
import {IdentityResolver} from '../../src/integration/kube/identity/identity-resolver.js';
import {ResourceKind} from '../../src/integration/kube/resources/resource-kind.js';
import {Duration} from '../../src/core/time/duration.js';
import {type FakeClusterApi, FakeClusterApiFactory, kubeObject} from './fake-cluster-api.js';
import {testCredentials} from './credentials.js';

export const TEST_TUNABLES: ContextTunables = Object.freeze({
  refreshInterval: Duration.ofSeconds(30),
  staleAfter: Duration.ofSeconds(60),
  cancelGracePeriod: Duration.ofMillis(50),
  retryAttempts: 2,
  retryBackoff: Duration.ofMillis(1),
});

/** A context authenticated with the shared PEM test credentials. */
export function pemContext(name: string): ContextConfig {
  const credentials = testCredentials();
  return {
    name,
    server: `https://${name}.example.test:6443`,
    credentials: [
      {data: credentials.certificatePem, label: `${name}.crt`},
      {data: credentials.keyPem, label: `${name}.key`},
    ],
    trust: {caBundle: credentials.caPem},
  };
}

/**
 * Namespaces `web` and `db`; pods `web-0` and `web-1` in `web`; an init container and two containers in `web-0`; one
 * node; two events for `web-0`.
 */
export function seedCluster(api: FakeClusterApi): FakeClusterApi {
  return api
    .set(ResourceKind.NAMESPACE, '', [kubeObject(ResourceKind.NAMESPACE, 'web'), kubeObject(ResourceKind.NAMESPACE, 'db')])
    .set(ResourceKind.POD, 'web', [
      kubeObject(ResourceKind.POD, 'web-0', {namespace: 'web', status: 'Running'}),
      kubeObject(ResourceKind.POD, 'web-1', {namespace: 'web', status: 'CrashLoopBackOff'}),
    ])
    .set(ResourceKind.POD, 'db', [kubeObject(ResourceKind.POD, 'db-0', {namespace: 'db', status: 'Running'})])
    .set(ResourceKind.CONTAINER, 'web/web-0', [
      kubeObject(ResourceKind.CONTAINER, 'migrate', {status: 'Pending', detail: 'migrate:1', object: {init: true}}),
      kubeObject(ResourceKind.CONTAINER, 'app', {status: 'Running', detail: 'app:1', object: {init: false}}),
      kubeObject(ResourceKind.CONTAINER, 'sidecar', {status: 'Running', detail: 'sidecar:1', object: {init: false}}),
    ])
    .set(ResourceKind.CONTAINER, 'web/web-1', [
      kubeObject(ResourceKind.CONTAINER, 'app', {status: 'CrashLoopBackOff', detail: 'app:1', object: {init: false}}),
    ])
    .set(ResourceKind.NODE, '', [kubeObject(ResourceKind.NODE, 'node-1', {status: 'Ready'})])
    .set(ResourceKind.EVENT, 'web/web-0', [
      kubeObject(ResourceKind.EVENT, 'web-0.1', {
        status: 'Normal',
        detail: 'Pulled: Container image "app:1" already present',
        createdAt: new Date(Date.now() - 120_000),
      }),
      kubeObject(ResourceKind.EVENT, 'web-0.2', {
        status: 'Warning',
        detail: 'Unhealthy: Readiness check failed',
        createdAt: new Date(Date.now() - 5000),
      }),
    ]);
}

export interface TestSession {
  readonly factory: FakeClusterApiFactory;
  readonly contexts: ClusterContexts;
  readonly navigation: NavigationState;
  readonly dispatcher: CommandDispatcher;
  readonly output: BufferedOutputWriter;
  /** the seeded cluster behind `name` */
  api(name: string): FakeClusterApi;
}

/**
 * A dispatcher over fake clusters, one per entry, each seeded with {@link seedCluster}.
 */
export function testSession(entries: readonly ContextEntry[] = [pemContext('dev')]): TestSession {
  const factory = new FakeClusterApiFactory();
  for (const entry of entries) {
    seedCluster(factory.api(entry.name));
  }
  const contexts = new ClusterContexts(entries, TEST_TUNABLES, new IdentityResolver(), factory);
  const navigation = new NavigationState(contexts);
  return {
    factory,
    contexts,
    navigation,
    dispatcher: new CommandDispatcher(defaultRegistry(), navigation, contexts),
    output: new BufferedOutputWriter(),
    api: (name: string) => factory.api(name),
  };
}

/** Lets pending callbacks run until `condition` holds, giving up after a bounded number of turns. */
export async function eventually(condition: () => boolean, turns: number = 200): Promise<boolean> {
  for (let turn = 0; turn < turns && !condition(); turn++) {
    await new Promise(resolve => setImmediate(resolve));
  }
  return condition();
}

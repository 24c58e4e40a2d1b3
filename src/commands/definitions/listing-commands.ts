// SPDX-License-Identifier: Apache-2.0

import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {type ResourceEntry} from '../../core/cache/cache-slice.js';
import {errorMessage} from '../../core/helpers.js';
import {type CommandDefinition, type SelectionLevel} from '../command-definition.js';
import {type CommandInvocation} from '../command-invocation.js';
import {formatAge, formatTable, stalenessWarning} from '../output-format.js';
import {activeContextOf, lines, loadedListing} from './support.js';

interface ListingSpec {
  readonly name: string;
  readonly kind: ResourceKind;
  readonly requires: SelectionLevel;
  readonly parentPath: (invocation: CommandInvocation) => string;
  readonly headers: readonly string[];
  readonly row: (entry: ResourceEntry, now: Date) => readonly string[];
}

const defaultRow = (entry: ResourceEntry, now: Date): readonly string[] => [
  entry.name,
  entry.status,
  formatAge(entry.createdAt, now),
];

function listingCommand(spec: ListingSpec): CommandDefinition {
  return {
    name: spec.name,
    summary: `list ${spec.name}`,
    usage: spec.name,
    requires: spec.requires,
    async run(invocation, environment) {
      const active = activeContextOf(invocation, environment);
      const listing = await loadedListing(active.cache, spec.kind, spec.parentPath(invocation));
      const now = new Date();
      const selected = invocation.path.list().find(segment => segment.kind === spec.kind)?.name;
      const rows = listing.entries.map(entry => {
        const [name, ...rest] = spec.row(entry, now);
        return [entry.name === selected ? `*${name}` : name, ...rest];
      });
      return lines([...formatTable(spec.headers, rows), ...stalenessWarning(listing)]);
    },
  };
}

export const namespacesCommand = listingCommand({
  name: 'namespaces',
  kind: ResourceKind.NAMESPACE,
  requires: 'context',
  parentPath: () => '',
  headers: ['NAME', 'STATUS', 'AGE'],
  row: defaultRow,
});

export const podsCommand = listingCommand({
  name: 'pods',
  kind: ResourceKind.POD,
  requires: 'namespace',
  parentPath: invocation => invocation.path.namespace ?? '',
  headers: ['NAME', 'STATUS', 'AGE'],
  row: defaultRow,
});

export const containersCommand = listingCommand({
  name: 'containers',
  kind: ResourceKind.CONTAINER,
  requires: 'pod',
  parentPath: invocation => `${invocation.path.namespace}/${invocation.path.pod}`,
  headers: ['NAME', 'STATUS', 'IMAGE'],
  row: entry => [entry.name, entry.status, entry.detail ?? ''],
});

export const nodesCommand = listingCommand({
  name: 'nodes',
  kind: ResourceKind.NODE,
  requires: 'context',
  parentPath: () => '',
  headers: ['NAME', 'STATUS', 'AGE'],
  row: defaultRow,
});

export const contextsCommand: CommandDefinition = {
  name: 'contexts',
  summary: 'list the configured cluster contexts',
  usage: 'contexts',
  async run(invocation, {contexts}) {
    const rows = contexts.names().map(name => {
      const entry = contexts.entry(name);
      const status = contexts.status(name);
      const failure = contexts.failure(name);
      const detail = failure === undefined ? (entry && 'server' in entry ? entry.server : '') : errorMessage(failure);
      return [name === invocation.path.context ? `*${name}` : name, status, detail];
    });
    return lines(formatTable(['NAME', 'STATUS', 'SERVER'], rows));
  },
};

/**
 * Re-fetches the listings along the current path: namespaces, then pods and containers where selected.
 */
export const refreshCommand: CommandDefinition = {
  name: 'refresh',
  summary: 'refresh the cached listings along the current path',
  usage: 'refresh',
  requires: 'context',
  async run(invocation, environment) {
    const active = activeContextOf(invocation, environment);
    const {namespace, pod} = invocation.path;
    const pairs: Array<[ResourceKind, string]> = [[ResourceKind.NAMESPACE, '']];
    if (namespace) {
      pairs.push([ResourceKind.POD, namespace]);
    }
    if (namespace && pod) {
      pairs.push([ResourceKind.CONTAINER, `${namespace}/${pod}`]);
    }

    const results = await Promise.allSettled(pairs.map(([kind, parentPath]) => active.cache.refresh(kind, parentPath)));
    const output: string[] = [];
    let firstFailure: unknown;
    for (const [index, result] of results.entries()) {
      const [kind, parentPath] = pairs[index];
      const where = parentPath ? ` in '${parentPath}'` : '';
      if (result.status === 'fulfilled') {
        output.push(`${kind}s${where}: ${result.value.entries.length} entries`);
      } else {
        firstFailure ??= result.reason;
        output.push(`${kind}s${where}: refresh failed, keeping the previous listing (${errorMessage(result.reason)})`);
      }
    }

    if (firstFailure !== undefined && results.every(result => result.status === 'rejected')) {
      throw firstFailure;
    }
    return lines(output);
  },
};

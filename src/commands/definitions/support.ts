// SPDX-License-Identifier: Apache-2.0

import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {type ActiveContext} from '../../core/context/cluster-contexts.js';
import {type CachedListing, type ResourceCache} from '../../core/cache/resource-cache.js';
import {InvalidArgumentError, NavigationError, NoSelectionError} from '../../core/errors/command-errors.js';
import {type NavigationResult} from '../../core/navigation/navigation-state.js';
import {NotFoundError} from '../../core/errors/not-found-error.js';
import {type CommandEnvironment, type CommandResult} from '../command-definition.js';
import {type CommandInvocation} from '../command-invocation.js';

export function lines(output: readonly string[] = []): CommandResult {
  return {type: 'lines', lines: output};
}

/**
 * An empty result for a successful move; anything else is thrown so that it becomes a failed outcome.
 */
export function navigated(result: NavigationResult): CommandResult {
  switch (result.status) {
    case 'ok': {
      return lines();
    }
    case 'not-found': {
      throw new NotFoundError(result.kind, result.name, result.parentPath);
    }
    case 'not-selectable': {
      throw new NavigationError(`cannot select ${result.kind}: ${result.reason}`, 'not-selectable');
    }
    case 'at-root': {
      throw new NavigationError('already at the top of the context', 'at-root');
    }
    case 'unknown-context': {
      throw new NavigationError(`unknown context '${result.name}', try 'contexts'`, 'unknown-context');
    }
  }
}

/**
 * The active context of the path the invocation was issued from.
 */
export function activeContextOf(invocation: CommandInvocation, environment: CommandEnvironment): ActiveContext {
  const active = environment.contexts.get(invocation.path.context);
  if (!active) {
    throw new NoSelectionError(invocation.verb, 'context');
  }
  return active;
}

export function selectedNamespace(invocation: CommandInvocation): string {
  const {namespace} = invocation.path;
  if (!namespace) {
    throw new NoSelectionError(invocation.verb, 'namespace');
  }
  return namespace;
}

export function selectedPod(invocation: CommandInvocation): {namespace: string; pod: string} {
  const namespace = selectedNamespace(invocation);
  const {pod} = invocation.path;
  if (!pod) {
    throw new NoSelectionError(invocation.verb, 'pod');
  }
  return {namespace, pod};
}

/** The cached listing, loading it first if it was never loaded. */
export async function loadedListing(
  cache: ResourceCache,
  kind: ResourceKind,
  parentPath: string,
): Promise<CachedListing> {
  if (!cache.isLoaded(kind, parentPath)) {
    await cache.refresh(kind, parentPath);
  }
  return cache.get(kind, parentPath);
}

function isInitContainer(object: object): boolean {
  return 'init' in object && object.init === true;
}

/**
 * The container a log or exec command targets: the `--container` option, else the selected container, else the only
 * regular container of the pod.
 *
 * @throws NotFoundError - the named container is not part of the pod
 * @throws InvalidArgumentError - no container named and the pod does not have exactly one
 */
export async function targetContainer(invocation: CommandInvocation, active: ActiveContext): Promise<string> {
  const {namespace, pod} = selectedPod(invocation);
  const parentPath = `${namespace}/${pod}`;
  const listing = await loadedListing(active.cache, ResourceKind.CONTAINER, parentPath);
  const requested = invocation.option('container') ?? invocation.path.container;

  if (requested) {
    if (!listing.entries.some(entry => entry.name === requested)) {
      throw new NotFoundError(ResourceKind.CONTAINER, requested, parentPath);
    }
    return requested;
  }

  const regular = listing.entries.filter(entry => !isInitContainer(entry.object)).map(entry => entry.name);
  if (regular.length === 1) {
    return regular[0];
  }
  throw new InvalidArgumentError(
    regular.length === 0
      ? `pod '${pod}' has no containers`
      : `pod '${pod}' has several containers (${regular.join(', ')}), select one or pass -c`,
    'container',
  );
}

// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {NavigationPath} from './navigation-path.js';
import {type ActiveContext, type ClusterContexts} from '../context/cluster-contexts.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {CancelledError} from '../errors/command-errors.js';

export type NavigationResult =
  | {readonly status: 'ok'; readonly path: NavigationPath}
  | {readonly status: 'not-found'; readonly kind: ResourceKind; readonly name: string; readonly parentPath: string}
  | {readonly status: 'not-selectable'; readonly kind: string; readonly reason: string}
  | {readonly status: 'at-root'}
  | {readonly status: 'unknown-context'; readonly name: string};

/**
 * Owns the current navigation path. Only the foreground loop calls into it, so each operation sees the path as the
 * previous one left it.
 */
export class NavigationState {
  private readonly logger: KubewalkLogger;
  private path: NavigationPath = NavigationPath.ROOT;

  public constructor(private readonly contexts: ClusterContexts) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  public snapshot(): NavigationPath {
    return this.path;
  }

  public activeContext(): ActiveContext | undefined {
    return this.contexts.get(this.path.context);
  }

  /**
   * Makes `name` the current context, activating it on first use. The path becomes the bare context.
   *
   * @param signal - once aborted, the path is left as it is and the call rejects with a CancelledError
   * @throws whatever activation throws (credential or connection errors); the path is then unchanged
   */
  public async switchContext(name: string, signal?: AbortSignal): Promise<NavigationResult> {
    if (!this.contexts.has(name)) {
      return {status: 'unknown-context', name};
    }
    await this.contexts.activate(name);
    return this.moveTo(NavigationPath.ROOT.select('context', name), signal);
  }

  /**
   * Selects a resource of `kind` below the current path, replacing any selection at that depth or deeper. The name is
   * looked up in the cache; a listing that was never loaded is fetched first.
   */
  public async descend(kind: ResourceKind, name: string, signal?: AbortSignal): Promise<NavigationResult> {
    if (kind === ResourceKind.NODE || kind === ResourceKind.EVENT) {
      return {status: 'not-selectable', kind, reason: `${kind}s are cluster resources outside the navigation path`};
    }

    const base = this.path;
    const active = this.contexts.get(base.context);
    const parentPath = base.parentPathFor(kind);
    if (!active || parentPath === undefined) {
      const missing = !active ? 'context' : kind === ResourceKind.CONTAINER ? 'pod' : 'namespace';
      return {status: 'not-selectable', kind, reason: `select a ${missing} first`};
    }

    if (!active.cache.isLoaded(kind, parentPath)) {
      await active.cache.refresh(kind, parentPath);
    }
    const entry = active.cache.get(kind, parentPath).entries.find(candidate => candidate.name === name);
    if (!entry) {
      return {status: 'not-found', kind, name, parentPath};
    }

    return this.moveTo(base.select(kind, name), signal);
  }

  /**
   * Drops up to `levels` selections, never the context itself.
   */
  public ascend(levels: number = 1): NavigationResult {
    if (this.path.depth <= 1) {
      return {status: 'at-root'};
    }
    const clamped = Math.min(levels, this.path.depth - 1);
    return this.moveTo(this.path.ascend(clamped));
  }

  private moveTo(path: NavigationPath, signal?: AbortSignal): NavigationResult {
    if (signal?.aborted) {
      this.logger.debug(`navigation to ${path} abandoned, staying at ${this.path}`);
      throw new CancelledError();
    }
    this.logger.debug(`navigation: ${this.path} -> ${path}`);
    this.path = path;
    return {status: 'ok', path};
  }
}

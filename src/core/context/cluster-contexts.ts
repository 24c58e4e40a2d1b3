// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {ClusterContext} from './cluster-context.js';
import {type ContextConfig, type ContextEntry, type ContextTunables, isLoadFailure} from './context-config.js';
import {type IdentityResolver} from '../../integration/kube/identity/identity-resolver.js';
import {type ClusterApiFactory} from '../../integration/kube/connection/cluster-api.js';
import {ClusterConnection} from '../../integration/kube/connection/cluster-connection.js';
import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {ResourceCache} from '../cache/resource-cache.js';
import {connectionLister} from '../cache/resource-lister.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {NotFoundError} from '../errors/not-found-error.js';
import {errorMessage} from '../helpers.js';

/**
 * A context that has been activated: its identity is resolved and its cache populated.
 */
export interface ActiveContext {
  readonly context: ClusterContext;
  readonly connection: ClusterConnection;
  readonly cache: ResourceCache;
}

export type ContextStatus = 'configured' | 'active' | 'failed';

/**
 * Every configured context, activated on first use. Contexts are independent: one that fails to load or activate
 * leaves the others usable.
 */
export class ClusterContexts {
  private readonly logger: KubewalkLogger;
  private readonly entries = new Map<string, ContextEntry>();
  private readonly activations = new Map<string, Promise<ActiveContext>>();
  private readonly activated = new Map<string, ActiveContext>();
  private readonly lastErrors = new Map<string, unknown>();

  public constructor(
    entries: readonly ContextEntry[],
    private readonly tunables: ContextTunables,
    private readonly identityResolver: IdentityResolver,
    private readonly apiFactory: ClusterApiFactory,
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
    for (const entry of entries) {
      if (this.entries.has(entry.name)) {
        this.logger.warn(`context '${entry.name}' is defined more than once, keeping the first definition`);
        continue;
      }
      this.entries.set(entry.name, entry);
    }
  }

  public names(): string[] {
    return [...this.entries.keys()].sort();
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public entry(name: string): ContextEntry | undefined {
    return this.entries.get(name);
  }

  public status(name: string): ContextStatus {
    const entry = this.entries.get(name);
    if (!entry || isLoadFailure(entry) || this.lastErrors.has(name)) {
      return 'failed';
    }
    return this.activated.has(name) ? 'active' : 'configured';
  }

  /** Why the context is unusable, if it is. */
  public failure(name: string): unknown {
    const entry = this.entries.get(name);
    if (entry && isLoadFailure(entry)) {
      return entry.error;
    }
    return this.lastErrors.get(name);
  }

  public get(name: string | undefined): ActiveContext | undefined {
    return name === undefined ? undefined : this.activated.get(name);
  }

  /**
   * Resolves the identity, opens the connection and populates the namespace listing. Concurrent calls share one
   * activation; a failed activation is forgotten so that it can be retried.
   *
   * @throws NotFoundError - the context is not configured
   */
  public activate(name: string): Promise<ActiveContext> {
    const active = this.activated.get(name);
    if (active) {
      return Promise.resolve(active);
    }
    const pending = this.activations.get(name);
    if (pending) {
      return pending;
    }

    const entry = this.entries.get(name);
    if (!entry) {
      return Promise.reject(new NotFoundError('context', name));
    }
    if (isLoadFailure(entry)) {
      return Promise.reject(entry.error);
    }

    const activation = this.doActivate(entry);
    this.activations.set(name, activation);
    return activation;
  }

  /**
   * Stops every refresh loop and closes every connection.
   */
  public async close(): Promise<void> {
    const active = [...this.activated.values()];
    this.activated.clear();
    for (const {cache} of active) {
      cache.stop();
    }
    await Promise.all(active.map(({connection}) => connection.close()));
  }

  private async doActivate(config: ContextConfig): Promise<ActiveContext> {
    const {name} = config;
    this.logger.debug(`activating context '${name}'`);

    const context = this.identityResolver
      .resolve({context: name, credentials: config.credentials, trust: config.trust})
      .then(resolved => new ClusterContext(name, config.server, resolved.identity, resolved.trustPolicy));
    const connection = new ClusterConnection(name, context, this.apiFactory, this.tunables);

    try {
      const cache = new ResourceCache(name, connectionLister(connection), this.tunables);
      const active: ActiveContext = {context: await context, connection, cache};
      await cache.refresh(ResourceKind.NAMESPACE, '');
      cache.start();

      this.activated.set(name, active);
      this.lastErrors.delete(name);
      this.logger.info(`context '${name}' active: ${active.context.identity}`);
      return active;
    } catch (error) {
      this.lastErrors.set(name, error);
      this.logger.warn(`activation of context '${name}' failed: ${errorMessage(error)}`);
      await connection.close();
      throw error;
    } finally {
      this.activations.delete(name);
    }
  }
}

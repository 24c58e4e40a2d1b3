// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {ResourceKind, splitParentPath} from '../../integration/kube/resources/resource-kind.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {Duration} from '../time/duration.js';
import {errorMessage} from '../helpers.js';
import {NotFoundError} from '../errors/not-found-error.js';
import {CacheSlice, type ResourceEntry, sliceKey} from './cache-slice.js';
import {CacheSnapshot} from './cache-snapshot.js';
import {type ResourceLister} from './resource-lister.js';

export interface CacheOptions {
  readonly refreshInterval: Duration;
  /** listings older than this are reported stale */
  readonly staleAfter: Duration;
}

export interface CachedListing {
  readonly entries: readonly ResourceEntry[];
  /** false when the pair has never been loaded */
  readonly loaded: boolean;
  readonly stale: boolean;
  readonly age?: Duration;
  readonly lastError?: unknown;
}

type Clock = () => Date;

/**
 * Per-context cache of resource listings. Reads never touch the network; refreshes of the same pair are coalesced, and a
 * background loop re-fetches every pair that has been loaded once, until its namespace or pod is gone.
 */
export class ResourceCache {
  private readonly logger: KubewalkLogger;
  private readonly inFlight = new Map<string, Promise<CacheSlice>>();
  private readonly tracked = new Map<string, {kind: ResourceKind; parentPath: string}>();
  private snapshot: CacheSnapshot = CacheSnapshot.empty();
  private timer?: NodeJS.Timeout;

  public constructor(
    public readonly contextName: string,
    private readonly lister: ResourceLister,
    private readonly options: CacheOptions,
    private readonly clock: Clock = () => new Date(),
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  public get isRunning(): boolean {
    return this.timer !== undefined;
  }

  public current(): CacheSnapshot {
    return this.snapshot;
  }

  public get(kind: ResourceKind, parentPath: string): CachedListing {
    const slice = this.snapshot.slice(kind, parentPath);
    if (!slice) {
      return {entries: [], loaded: false, stale: false};
    }

    const age = Duration.between(slice.refreshedAt, this.clock());
    return {
      entries: slice.entries,
      loaded: true,
      stale: slice.stale || age.compareTo(this.options.staleAfter) > 0,
      age,
      lastError: slice.lastError,
    };
  }

  public isLoaded(kind: ResourceKind, parentPath: string): boolean {
    return this.snapshot.slice(kind, parentPath) !== undefined;
  }

  /** Names in the pair's listing starting with `prefix`. */
  public completions(kind: ResourceKind, parentPath: string, prefix: string = ''): string[] {
    return this.get(kind, parentPath)
      .entries.map(entry => entry.name)
      .filter(name => name.startsWith(prefix));
  }

  /**
   * Fetches the listing and publishes it. A caller asking while a refresh of the same pair is in flight shares its
   * result. On failure the previous listing, if any, stays in place flagged stale and the error is rethrown.
   */
  public refresh(kind: ResourceKind, parentPath: string): Promise<CacheSlice> {
    const key = sliceKey(kind, parentPath);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const refresh = this.fetch(kind, parentPath).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, refresh);
    return refresh;
  }

  /** Re-fetches every pair loaded so far. Failures are logged and leave their listings stale. */
  public async refreshAll(): Promise<void> {
    const pairs = [...this.tracked.values()];
    const results = await Promise.allSettled(pairs.map(({kind, parentPath}) => this.refresh(kind, parentPath)));
    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        const {kind, parentPath} = pairs[index];
        this.logger.warn(
          `${this.contextName}: background refresh of ${kind}s in '${parentPath}' failed: ${errorMessage(result.reason)}`,
        );
      }
    }
  }

  public start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.refreshAll().catch(error => this.logger.error(`${this.contextName}: refresh loop failed`, error));
    }, this.options.refreshInterval.toMillis());
    this.timer.unref();
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Resolves once every refresh in flight has settled. */
  public async idle(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  private async fetch(kind: ResourceKind, parentPath: string): Promise<CacheSlice> {
    try {
      const objects = await this.lister(kind, parentPath);
      const slice = CacheSlice.fromObjects(kind, parentPath, objects, this.clock());
      this.publish(slice);
      this.tracked.set(slice.key, {kind, parentPath});
      this.untrackOrphans(slice);
      return slice;
    } catch (error) {
      const previous = this.snapshot.slice(kind, parentPath);
      if (previous) {
        this.publish(previous.withFailure(error));
      }
      if (error instanceof NotFoundError && this.tracked.delete(sliceKey(kind, parentPath))) {
        this.logger.debug(`${this.contextName}: no longer refreshing ${kind}s in '${parentPath}': ${error.message}`);
      }
      throw error;
    }
  }

  /** Stops refreshing the listings below namespaces or pods that have left `slice`. */
  private untrackOrphans(slice: CacheSlice): void {
    const present = new Set(slice.entries.map(entry => entry.name));
    for (const [key, pair] of this.tracked) {
      const {namespace, pod} = splitParentPath(pair.parentPath);
      let owner: string | undefined;
      if (slice.kind === ResourceKind.NAMESPACE) {
        owner = namespace;
      } else if (slice.kind === ResourceKind.POD && pair.kind === ResourceKind.CONTAINER && namespace === slice.parentPath) {
        owner = pod;
      }
      if (owner !== undefined && !present.has(owner)) {
        this.tracked.delete(key);
        this.logger.debug(`${this.contextName}: no longer refreshing ${pair.kind}s in '${pair.parentPath}', '${owner}' is gone`);
      }
    }
  }

  private publish(slice: CacheSlice): void {
    this.snapshot = this.snapshot.with(slice);
    this.logger.debug(
      `${this.contextName}: ${slice.kind}s in '${slice.parentPath}' ${slice.stale ? 'marked stale' : `refreshed (${slice.entries.length})`}, generation ${this.snapshot.generation}`,
    );
  }
}

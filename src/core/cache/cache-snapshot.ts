// SPDX-License-Identifier: Apache-2.0

import {type ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {type CacheSlice, sliceKey} from './cache-slice.js';

/**
 * An immutable view of every slice cached for a context. Refreshes publish a new snapshot; readers holding an older
 * one keep seeing it unchanged.
 */
export class CacheSnapshot {
  private static readonly EMPTY = new CacheSnapshot(0, new Map());

  private constructor(
    public readonly generation: number,
    private readonly slices: ReadonlyMap<string, CacheSlice>,
  ) {
    Object.freeze(this);
  }

  public static empty(): CacheSnapshot {
    return CacheSnapshot.EMPTY;
  }

  public slice(kind: ResourceKind, parentPath: string): CacheSlice | undefined {
    return this.slices.get(sliceKey(kind, parentPath));
  }

  public with(slice: CacheSlice): CacheSnapshot {
    const slices = new Map(this.slices);
    slices.set(slice.key, slice);
    return new CacheSnapshot(this.generation + 1, slices);
  }

  public get size(): number {
    return this.slices.size;
  }

  public list(): CacheSlice[] {
    return [...this.slices.values()];
  }
}

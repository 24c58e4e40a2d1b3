// SPDX-License-Identifier: Apache-2.0

import {type ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {type KubeObject} from '../../integration/kube/resources/kube-object.js';

export interface ResourceEntry {
  readonly kind: ResourceKind;
  readonly name: string;
  readonly parentPath: string;
  readonly status: string;
  readonly createdAt?: Date;
  readonly detail?: string;
  readonly refreshedAt: Date;
  readonly object: object;
}

export function sliceKey(kind: ResourceKind, parentPath: string): string {
  return `${kind}:${parentPath}`;
}

/**
 * The cached listing of one (kind, parent path) pair. Entries are unique by name and ordered by name.
 */
export class CacheSlice {
  public readonly entries: readonly ResourceEntry[];

  private constructor(
    public readonly kind: ResourceKind,
    public readonly parentPath: string,
    entries: readonly ResourceEntry[],
    public readonly refreshedAt: Date,
    public readonly stale: boolean,
    public readonly lastError?: unknown,
  ) {
    this.entries = Object.freeze([...entries]);
    Object.freeze(this);
  }

  public static fromObjects(
    kind: ResourceKind,
    parentPath: string,
    objects: readonly KubeObject[],
    refreshedAt: Date,
  ): CacheSlice {
    const byName = new Map<string, ResourceEntry>();
    for (const object of objects) {
      byName.set(object.name, {
        kind,
        name: object.name,
        parentPath,
        status: object.status,
        createdAt: object.createdAt,
        detail: object.detail,
        refreshedAt,
        object: object.object,
      });
    }
    const entries = [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return new CacheSlice(kind, parentPath, entries, refreshedAt, false);
  }

  public get key(): string {
    return sliceKey(this.kind, this.parentPath);
  }

  /** The same entries, flagged stale after a failed refresh. */
  public withFailure(error: unknown): CacheSlice {
    return new CacheSlice(this.kind, this.parentPath, this.entries, this.refreshedAt, true, error);
  }

  public find(name: string): ResourceEntry | undefined {
    return this.entries.find(entry => entry.name === name);
  }
}

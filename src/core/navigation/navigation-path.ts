// SPDX-License-Identifier: Apache-2.0

import {ResourceKind, parentPathOf} from '../../integration/kube/resources/resource-kind.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export type SegmentKind = 'context' | ResourceKind.NAMESPACE | ResourceKind.POD | ResourceKind.CONTAINER;

export interface PathSegment {
  readonly kind: SegmentKind;
  readonly name: string;
}

/** Segment kinds in hierarchy order, the index being the depth at which a kind is selected. */
export const SEGMENT_ORDER: readonly SegmentKind[] = Object.freeze([
  'context',
  ResourceKind.NAMESPACE,
  ResourceKind.POD,
  ResourceKind.CONTAINER,
]);

/**
 * The selected context, namespace, pod and container. A segment is only ever present together with all of its
 * ancestors. Instances are immutable.
 */
export class NavigationPath {
  public static readonly ROOT = new NavigationPath([]);

  private readonly segments: readonly PathSegment[];

  private constructor(segments: readonly PathSegment[]) {
    this.segments = Object.freeze(segments.map(segment => Object.freeze({...segment})));
    Object.freeze(this);
  }

  public static of(context?: string, namespace?: string, pod?: string, container?: string): NavigationPath {
    let path = NavigationPath.ROOT;
    const names = [context, namespace, pod, container];
    for (const [depth, name] of names.entries()) {
      if (name === undefined) {
        break;
      }
      path = path.select(SEGMENT_ORDER[depth], name);
    }
    return path;
  }

  public get context(): string | undefined {
    return this.nameAt(0);
  }

  public get namespace(): string | undefined {
    return this.nameAt(1);
  }

  public get pod(): string | undefined {
    return this.nameAt(2);
  }

  public get container(): string | undefined {
    return this.nameAt(3);
  }

  public get depth(): number {
    return this.segments.length;
  }

  public get leaf(): PathSegment | undefined {
    return this.segments.at(-1);
  }

  public list(): readonly PathSegment[] {
    return this.segments;
  }

  public has(kind: SegmentKind): boolean {
    return this.segments.some(segment => segment.kind === kind);
  }

  /**
   * Selects `name` at the depth of `kind`, dropping any deeper selection.
   *
   * @throws IllegalArgumentError - a required ancestor is not selected
   */
  public select(kind: SegmentKind, name: string): NavigationPath {
    const depth = SEGMENT_ORDER.indexOf(kind);
    if (depth > this.segments.length) {
      throw new IllegalArgumentError(`cannot select ${kind} '${name}' without a ${SEGMENT_ORDER[depth - 1]}`, name);
    }
    return new NavigationPath([...this.segments.slice(0, depth), {kind, name}]);
  }

  /** Drops up to `levels` trailing segments. */
  public ascend(levels: number = 1): NavigationPath {
    return new NavigationPath(this.segments.slice(0, Math.max(0, this.segments.length - levels)));
  }

  /**
   * The cache parent path under which listings of `kind` for this path live, or undefined when the path does not
   * select the required parent.
   */
  public parentPathFor(kind: ResourceKind): string | undefined {
    if (!this.context) {
      return undefined;
    }
    return parentPathOf(kind, this.namespace, this.pod);
  }

  public equals(other: NavigationPath): boolean {
    return (
      this.depth === other.depth &&
      this.segments.every((segment, index) => segment.name === other.segments[index].name)
    );
  }

  public toString(): string {
    return this.segments.length === 0 ? '/' : this.segments.map(segment => segment.name).join('/');
  }

  private nameAt(depth: number): string | undefined {
    return this.segments[depth]?.name;
  }
}

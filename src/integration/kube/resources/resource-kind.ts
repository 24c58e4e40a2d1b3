// SPDX-License-Identifier: Apache-2.0

export enum ResourceKind {
  NAMESPACE = 'namespace',
  POD = 'pod',
  NODE = 'node',
  CONTAINER = 'container',
  EVENT = 'event',
}

export enum ResourceOperation {
  LIST = 'list',
  READ = 'read',
  DELETE = 'delete',
  STREAM = 'stream',
}

/**
 * The parent path under which listings of `kind` are cached: empty for cluster scoped kinds, `<namespace>` for pods
 * and events, `<namespace>/<pod>` for containers. Undefined when a required parent is missing.
 */
export function parentPathOf(kind: ResourceKind, namespace?: string, pod?: string): string | undefined {
  switch (kind) {
    case ResourceKind.NAMESPACE:
    case ResourceKind.NODE: {
      return '';
    }
    case ResourceKind.POD:
    case ResourceKind.EVENT: {
      return namespace;
    }
    case ResourceKind.CONTAINER: {
      return namespace && pod ? `${namespace}/${pod}` : undefined;
    }
  }
}

/**
 * Inverse of {@link parentPathOf}: the namespace and pod a parent path names.
 */
export function splitParentPath(parentPath: string): {namespace?: string; pod?: string} {
  if (!parentPath) {
    return {};
  }
  const [namespace, pod] = parentPath.split('/', 2);
  return {namespace, pod};
}

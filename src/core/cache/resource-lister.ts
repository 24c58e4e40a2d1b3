// SPDX-License-Identifier: Apache-2.0

import {ResourceKind, splitParentPath} from '../../integration/kube/resources/resource-kind.js';
import {type KubeObject} from '../../integration/kube/resources/kube-object.js';
import {type ClusterConnection} from '../../integration/kube/connection/cluster-connection.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * Fetches the current listing of one (kind, parent path) pair.
 */
export type ResourceLister = (kind: ResourceKind, parentPath: string) => Promise<readonly KubeObject[]>;

export function connectionLister(connection: ClusterConnection): ResourceLister {
  return async (kind, parentPath) => {
    const {namespace, pod} = splitParentPath(parentPath);
    switch (kind) {
      case ResourceKind.NAMESPACE:
      case ResourceKind.NODE: {
        return connection.list(kind);
      }
      case ResourceKind.POD: {
        return connection.list(kind, namespace);
      }
      case ResourceKind.CONTAINER: {
        return connection.list(kind, namespace, pod);
      }
      case ResourceKind.EVENT: {
        throw new IllegalArgumentError('events are not cached', kind);
      }
    }
  };
}

// SPDX-License-Identifier: Apache-2.0

import {type ResourceKind} from './resource-kind.js';

/**
 * A resource as returned by the cluster API client: a few summary fields plus the full API representation.
 */
export interface KubeObject {
  readonly kind: ResourceKind;
  readonly name: string;
  readonly namespace?: string;
  /** short status such as `Running`, `Active` or `Ready` */
  readonly status: string;
  readonly createdAt?: Date;
  /** one line of extra detail, e.g. the message of an event */
  readonly detail?: string;
  readonly object: object;
}

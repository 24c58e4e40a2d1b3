// SPDX-License-Identifier: Apache-2.0

import {type ClientIdentity} from '../../integration/kube/identity/client-identity.js';
import {type TrustPolicy} from '../../integration/kube/identity/trust-policy.js';

/**
 * A named cluster with the identity and trust policy resolved for it. Immutable once created.
 */
export class ClusterContext {
  public constructor(
    public readonly name: string,
    public readonly server: string,
    public readonly identity: ClientIdentity,
    public readonly trustPolicy: TrustPolicy,
  ) {
    Object.freeze(this);
  }

  public toString(): string {
    return `${this.name} (${this.server})`;
  }
}

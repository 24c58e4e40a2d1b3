// SPDX-License-Identifier: Apache-2.0

import {type CredentialSource} from '../../integration/kube/identity/credential-source.js';
import {type TrustDirective} from '../../integration/kube/identity/trust-policy.js';
import {type KubewalkError} from '../errors/kubewalk-error.js';
import {type Duration} from '../time/duration.js';

/**
 * Everything needed to activate a context, as read from configuration.
 */
export interface ContextConfig {
  readonly name: string;
  readonly server: string;
  readonly credentials: readonly CredentialSource[];
  readonly trust?: TrustDirective;
  /** where the configuration came from, for messages */
  readonly origin?: string;
}

/**
 * A context whose configuration could not be read. It is listed but cannot be activated.
 */
export interface ContextLoadFailure {
  readonly name: string;
  readonly error: KubewalkError;
  readonly origin?: string;
}

export type ContextEntry = ContextConfig | ContextLoadFailure;

export function isLoadFailure(entry: ContextEntry): entry is ContextLoadFailure {
  return 'error' in entry;
}

export interface ContextTunables {
  readonly refreshInterval: Duration;
  readonly staleAfter: Duration;
  readonly cancelGracePeriod: Duration;
  readonly retryAttempts: number;
  readonly retryBackoff: Duration;
}

// SPDX-License-Identifier: Apache-2.0

import {type StreamHandle} from '../integration/kube/connection/stream-handle.js';
import {type NavigationState} from '../core/navigation/navigation-state.js';
import {type ClusterContexts} from '../core/context/cluster-contexts.js';
import {type KubewalkLogger} from '../core/logging/kubewalk-logger.js';
import {type CancellationToken} from './cancellation-token.js';
import {type CommandInvocation} from './command-invocation.js';
import {type CommandRegistry} from './command-registry.js';

/** The deepest selection a command needs before it can run. */
export type SelectionLevel = 'context' | 'namespace' | 'pod';

export type OptionType = 'boolean' | 'string' | 'number';

export interface OptionSpec {
  readonly name: string;
  readonly short?: string;
  readonly type: OptionType;
  readonly description: string;
}

export interface ArgumentArity {
  readonly min: number;
  readonly max: number;
}

export type CommandResult =
  | {readonly type: 'lines'; readonly lines: readonly string[]}
  | {readonly type: 'stream'; readonly handle: StreamHandle}
  | {readonly type: 'exit'};

export interface CommandEnvironment {
  readonly navigation: NavigationState;
  readonly contexts: ClusterContexts;
  readonly registry: CommandRegistry;
  readonly token: CancellationToken;
  readonly logger: KubewalkLogger;
}

export interface CommandDefinition {
  readonly name: string;
  readonly aliases?: readonly string[];
  readonly summary: string;
  readonly usage: string;
  readonly arguments?: ArgumentArity;
  readonly options?: readonly OptionSpec[];
  readonly requires?: SelectionLevel;
  /** false for mutating calls, which run to completion once started */
  readonly interruptible?: boolean;
  /** the first positional word ends option parsing and everything from it on is kept verbatim */
  readonly passthrough?: boolean;

  run(invocation: CommandInvocation, environment: CommandEnvironment): Promise<CommandResult>;
}

// SPDX-License-Identifier: Apache-2.0

import {type Readable, type Writable} from 'node:stream';
import {type ResourceKind} from '../resources/resource-kind.js';
import {type KubeObject} from '../resources/kube-object.js';
import {type ClusterContext} from '../../../core/context/cluster-context.js';

export type ApiMethod = 'GET' | 'DELETE';

export interface ResourcePath {
  readonly kind: ResourceKind;
  readonly namespace?: string;
  /** a single named resource; absent for listings */
  readonly name?: string;
  /** owning pod, for container listings */
  readonly pod?: string;
  readonly fieldSelector?: string;
}

export interface DeleteOptions {
  readonly gracePeriodSeconds?: number;
}

export interface ApiRequest {
  readonly method: ApiMethod;
  readonly path: ResourcePath;
  readonly body?: DeleteOptions;
}

export type ApiResponse =
  | {readonly type: 'list'; readonly statusCode: number; readonly items: readonly KubeObject[]}
  | {readonly type: 'object'; readonly statusCode: number; readonly item: KubeObject};

export interface LogStreamRequest {
  readonly type: 'logs';
  readonly namespace: string;
  readonly pod: string;
  readonly container: string;
  readonly follow: boolean;
  readonly tailLines?: number;
  readonly timestamps?: boolean;
  readonly previous?: boolean;
}

export interface ExecStreamRequest {
  readonly type: 'exec';
  readonly namespace: string;
  readonly pod: string;
  readonly container: string;
  readonly command: readonly string[];
  /** forward input to the command */
  readonly stdin?: boolean;
  /** allocate a terminal for the command */
  readonly tty?: boolean;
}

export type StreamRequest = LogStreamRequest | ExecStreamRequest;

/**
 * The transport side of an open stream. Data arrives on the writables given to {@link ClusterApi.openStream}; the
 * end of stream is signalled by ending `stdout`, a failure by destroying it with an error.
 */
export interface StreamConnection {
  abort(): void;
  /** settles once the underlying socket is closed */
  readonly closed: Promise<void>;
}

/**
 * The cluster API client for one context. Implementations translate transport failures into
 * {@link RequestFailedError} (HTTP status) or errors carrying a Node.js network error `code`.
 */
export interface ClusterApi {
  request(request: ApiRequest): Promise<ApiResponse>;

  /** `stdin` is given for exec requests that forward input */
  openStream(request: StreamRequest, stdout: Writable, stderr: Writable, stdin?: Readable): Promise<StreamConnection>;

  close(): void;
}

export interface ClusterApiFactory {
  create(context: ClusterContext): ClusterApi;
}

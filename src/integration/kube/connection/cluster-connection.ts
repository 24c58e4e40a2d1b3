// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {v4 as uuid4} from 'uuid';
import {
  type ApiRequest,
  type ApiResponse,
  type ClusterApi,
  type ClusterApiFactory,
  type DeleteOptions,
  type ResourcePath,
  type StreamRequest,
} from './cluster-api.js';
import {StreamHandle} from './stream-handle.js';
import {ResourceKind} from '../resources/resource-kind.js';
import {type KubeObject} from '../resources/kube-object.js';
import {type ClusterContext} from '../../../core/context/cluster-context.js';
import {type Duration} from '../../../core/time/duration.js';
import {errorMessage, sleep} from '../../../core/helpers.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../../../core/logging/kubewalk-logger.js';
import {KubewalkError} from '../../../core/errors/kubewalk-error.js';
import {ConnectionError} from '../../../core/errors/connection-errors.js';
import {IllegalStateError} from '../../../core/errors/illegal-state-error.js';
import * as constants from '../../../core/constants.js';

export interface ConnectionOptions {
  readonly retryAttempts: number;
  readonly retryBackoff: Duration;
  readonly cancelGracePeriod: Duration;
}

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = Object.freeze({
  retryAttempts: constants.DEFAULT_RETRY_ATTEMPTS,
  retryBackoff: constants.DEFAULT_RETRY_BACKOFF,
  cancelGracePeriod: constants.DEFAULT_CANCEL_GRACE_PERIOD,
});

/**
 * The only owner of a context's API client. Requests wait for the context's identity to be resolved, idempotent reads
 * are retried on transient network failures, and open streams are tracked so that {@link close} can release them.
 */
export class ClusterConnection {
  private readonly logger: KubewalkLogger;
  private readonly openStreams = new Set<StreamHandle>();
  private api?: Promise<ClusterApi>;
  private closed: boolean = false;

  public constructor(
    public readonly contextName: string,
    private readonly context: Promise<ClusterContext>,
    private readonly factory: ClusterApiFactory,
    private readonly options: ConnectionOptions = DEFAULT_CONNECTION_OPTIONS,
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  public get openStreamCount(): number {
    return this.openStreams.size;
  }

  /** Items of one listing, ordered by name. */
  public async list(kind: ResourceKind, namespace?: string, pod?: string): Promise<KubeObject[]> {
    const response = await this.request({method: 'GET', path: {kind, namespace, pod}});
    return ClusterConnection.itemsOf(response);
  }

  public async read(kind: ResourceKind, name: string, namespace?: string, pod?: string): Promise<KubeObject> {
    const response = await this.request({method: 'GET', path: {kind, name, namespace, pod}});
    if (response.type !== 'object') {
      throw new KubewalkError(`expected a single ${kind} but received a listing`);
    }
    return response.item;
  }

  /** Events whose involved object is the given pod, oldest first. */
  public async events(namespace: string, pod: string): Promise<KubeObject[]> {
    const response = await this.request({
      method: 'GET',
      path: {kind: ResourceKind.EVENT, namespace, fieldSelector: `involvedObject.name=${pod}`},
    });
    const items = response.type === 'list' ? [...response.items] : [response.item];
    return items.sort((a, b) => (a.createdAt?.getTime() ?? 0) - (b.createdAt?.getTime() ?? 0));
  }

  /** Never retried. */
  public async delete(kind: ResourceKind, name: string, namespace?: string, options: DeleteOptions = {}): Promise<KubeObject | undefined> {
    const response = await this.request({method: 'DELETE', path: {kind, name, namespace}, body: options});
    return response.type === 'object' ? response.item : undefined;
  }

  public async request(request: ApiRequest): Promise<ApiResponse> {
    const api = await this.client();
    const attempts = request.method === 'GET' ? Math.max(1, this.options.retryAttempts) : 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await api.request(request);
      } catch (error) {
        const classified = ClusterConnection.classify(error, request.path);
        if (!(classified instanceof ConnectionError && classified.transient) || attempt >= attempts) {
          throw classified;
        }
        const backoff = this.options.retryBackoff.multipliedBy(2 ** (attempt - 1));
        this.logger.debug(
          `${this.contextName}: ${request.method} ${request.path.kind} failed (${classified.message}), ` +
            `attempt ${attempt}/${attempts}, retrying in ${backoff}`,
        );
        await sleep(backoff);
      }
    }
  }

  /**
   * Opens a log or exec stream. Streams are never retried.
   */
  public async stream(request: StreamRequest): Promise<StreamHandle> {
    const api = await this.client();
    const handle = new StreamHandle(
      `${request.type}-${uuid4().slice(0, 8)}`,
      this.options.cancelGracePeriod,
      request.type === 'exec' && request.stdin === true,
    );
    this.openStreams.add(handle);
    handle.onReleased(() => this.openStreams.delete(handle));

    try {
      handle.attach(await api.openStream(request, handle.stdout, handle.stderr, handle.stdin));
    } catch (error) {
      const classified = ClusterConnection.classify(error, {
        kind: ResourceKind.POD,
        namespace: request.namespace,
        name: request.pod,
      });
      handle.fail(classified);
      throw classified;
    }
    this.logger.debug(`${this.contextName}: opened ${request.type} stream ${handle.id} for ${request.pod}`);
    return handle;
  }

  /**
   * Cancels every open stream and releases the API client. Further requests fail.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await Promise.all([...this.openStreams].map(handle => handle.cancel()));

    if (this.api) {
      try {
        (await this.api).close();
      } catch (error) {
        this.logger.debug(`${this.contextName}: no api client to close: ${errorMessage(error)}`);
      }
    }
  }

  private client(): Promise<ClusterApi> {
    if (this.closed) {
      return Promise.reject(new IllegalStateError(`connection to '${this.contextName}' is closed`, 'closed'));
    }
    if (!this.api) {
      this.api = this.context.then(context => this.factory.create(context));
      this.api.catch(() => {
        this.api = undefined;
      });
    }
    return this.api;
  }

  /**
   * Maps whatever the API client threw into the error taxonomy.
   */
  public static classify(error: unknown, path?: ResourcePath): KubewalkError {
    if (error instanceof KubewalkError) {
      return error;
    }

    const code = ClusterConnection.networkCode(error);
    const target = path ? ` (${path.kind}${path.name ? ` '${path.name}'` : 's'})` : '';
    if (code) {
      const transient = constants.TRANSIENT_NETWORK_ERROR_CODES.includes(code);
      return new ConnectionError(`connection failed: ${code}${target}`, transient, error, {code});
    }
    return new ConnectionError(`request failed${target}: ${errorMessage(error)}`, false, error);
  }

  private static networkCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return undefined;
  }

  private static itemsOf(response: ApiResponse): KubeObject[] {
    const items = response.type === 'list' ? [...response.items] : [response.item];
    return items.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}

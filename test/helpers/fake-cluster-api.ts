// SPDX-License-Identifier: Apache-2.0

import {type Readable, type Writable} from 'node:stream';
import {
  type ApiMethod,
  type ApiRequest,
  type ApiResponse,
  type ClusterApi,
  type ClusterApiFactory,
  type StreamConnection,
  type StreamRequest,
} from '../../src/integration/kube/connection/cluster-api.js';
import {ResourceKind, parentPathOf} from '../../src/integration/kube/resources/resource-kind.js';
import {type KubeObject} from '../../src/integration/kube/resources/kube-object.js';
import {ClusterContext} from '../../src/core/context/cluster-context.js';
import {ClientIdentity} from '../../src/integration/kube/identity/client-identity.js';
import {TrustPolicy} from '../../src/integration/kube/identity/trust-policy.js';
import {NotFoundError} from '../../src/core/errors/not-found-error.js';

export function kubeObject(kind: ResourceKind, name: string, fields: Partial<Omit<KubeObject, 'kind' | 'name'>> = {}): KubeObject {
  return {kind, name, status: 'Active', object: {metadata: {name}}, ...fields};
}

/** A context with a placeholder identity, for code that never looks inside it. */
export function testContext(name: string, server: string = `https://${name}.example.test:6443`): ClusterContext {
  const identity = new ClientIdentity(['test-certificate'], 'test-key', 'ab'.repeat(32), 'CN=test', new Date(Date.UTC(2099, 0, 1)));
  return new ClusterContext(name, server, identity, TrustPolicy.insecureSkipVerify());
}

/** A Node.js style network error, as thrown by the HTTP client. */
export function networkError(code: string): Error & {code: string} {
  return Object.assign(new Error(`connect ${code}`), {code});
}

/**
 * One fake log or exec transport. Tests push output through it and decide whether an abort is confirmed.
 */
export class FakeStream implements StreamConnection {
  public readonly closed: Promise<void>;
  public aborted: boolean = false;
  /** what the command received on its input */
  public received: string = '';
  public inputEnded: boolean = false;
  private resolveClosed: () => void = () => {};

  public constructor(
    public readonly request: StreamRequest,
    private readonly stdout: Writable,
    private readonly stderr: Writable,
    /** when false the transport never confirms that it closed */
    private readonly confirmsClose: boolean = true,
    public readonly stdin?: Readable,
  ) {
    this.closed = new Promise<void>(resolve => {
      this.resolveClosed = resolve;
    });
    stdin?.on('data', (chunk: Buffer) => {
      this.received += chunk.toString('utf8');
    });
    stdin?.on('end', () => {
      this.inputEnded = true;
    });
  }

  public emit(text: string, channel: 'stdout' | 'stderr' = 'stdout'): void {
    (channel === 'stdout' ? this.stdout : this.stderr).write(text);
  }

  public end(): void {
    this.stdout.end();
    this.resolveClosed();
  }

  public fail(error: Error): void {
    this.stdout.destroy(error);
    this.resolveClosed();
  }

  public abort(): void {
    this.aborted = true;
    if (this.confirmsClose) {
      this.resolveClosed();
    }
  }
}

interface ScriptedFailure {
  readonly method?: ApiMethod;
  readonly kind?: ResourceKind;
  readonly error: unknown;
  remaining: number;
}

/**
 * An in-process cluster: listings are kept per (kind, parent path) and requests are served from them.
 */
export class FakeClusterApi implements ClusterApi {
  public readonly requests: ApiRequest[] = [];
  public readonly streams: FakeStream[] = [];
  public closed: boolean = false;
  /** when false, streams opened from now on never confirm an abort */
  public streamsConfirmClose: boolean = true;
  /** when set, requests wait for this promise before they are served */
  public gate?: Promise<void>;

  private readonly listings = new Map<string, KubeObject[]>();
  private readonly failures: ScriptedFailure[] = [];
  private readonly streamWaiters: Array<(stream: FakeStream) => void> = [];

  public constructor(public readonly context?: ClusterContext) {}

  public set(kind: ResourceKind, parentPath: string, objects: readonly KubeObject[]): this {
    this.listings.set(`${kind}:${parentPath}`, [...objects]);
    return this;
  }

  /** Fails the next `times` matching requests with `error`. */
  public failNext(error: unknown, times: number = 1, filter: {method?: ApiMethod; kind?: ResourceKind} = {}): this {
    this.failures.push({...filter, error, remaining: times});
    return this;
  }

  public requestsFor(kind: ResourceKind, method: ApiMethod = 'GET'): ApiRequest[] {
    return this.requests.filter(request => request.path.kind === kind && request.method === method);
  }

  /** Resolves with the next stream opened. */
  public nextStream(): Promise<FakeStream> {
    return new Promise(resolve => this.streamWaiters.push(resolve));
  }

  public async request(request: ApiRequest): Promise<ApiResponse> {
    this.requests.push(request);
    if (this.gate) {
      await this.gate;
    }

    const failure = this.failures.find(
      f =>
        f.remaining > 0 &&
        (f.method === undefined || f.method === request.method) &&
        (f.kind === undefined || f.kind === request.path.kind),
    );
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }

    const {kind, name, namespace, pod, fieldSelector} = request.path;
    const eventPod = fieldSelector?.replace('involvedObject.name=', '');
    const parentPath =
      kind === ResourceKind.EVENT && eventPod ? `${namespace}/${eventPod}` : parentPathOf(kind, namespace, pod) ?? '';
    const listing = this.listings.get(`${kind}:${parentPath}`) ?? [];

    if (name === undefined) {
      return {type: 'list', statusCode: 200, items: [...listing]};
    }

    const item = listing.find(object => object.name === name);
    if (!item) {
      throw new NotFoundError(kind, name, parentPath);
    }
    if (request.method === 'DELETE') {
      this.listings.set(
        `${kind}:${parentPath}`,
        listing.filter(object => object !== item),
      );
      return {type: 'object', statusCode: 200, item: {...item, status: 'Terminating'}};
    }
    return {type: 'object', statusCode: 200, item};
  }

  public async openStream(
    request: StreamRequest,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable,
  ): Promise<StreamConnection> {
    if (this.gate) {
      await this.gate;
    }
    const stream = new FakeStream(request, stdout, stderr, this.streamsConfirmClose, stdin);
    this.streams.push(stream);
    for (const waiter of this.streamWaiters.splice(0)) {
      waiter(stream);
    }
    return stream;
  }

  public close(): void {
    this.closed = true;
  }
}

/**
 * Hands out one {@link FakeClusterApi} per context name, creating empty ones on demand.
 */
export class FakeClusterApiFactory implements ClusterApiFactory {
  public readonly created: ClusterContext[] = [];

  public constructor(private readonly apis: Map<string, FakeClusterApi> = new Map()) {}

  public api(name: string): FakeClusterApi {
    let api = this.apis.get(name);
    if (!api) {
      api = new FakeClusterApi();
      this.apis.set(name, api);
    }
    return api;
  }

  public create(context: ClusterContext): ClusterApi {
    this.created.push(context);
    return this.api(context.name);
  }
}

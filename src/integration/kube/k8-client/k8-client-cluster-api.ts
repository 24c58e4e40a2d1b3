// SPDX-License-Identifier: Apache-2.0

import type http from 'node:http';
import {type Readable, type Writable} from 'node:stream';
import {CoreV1Api, Exec, KubeConfig, Log, type V1Status} from '@kubernetes/client-node';
import {container} from 'tsyringe-neo';
import {
  type ApiRequest,
  type ApiResponse,
  type ClusterApi,
  type DeleteOptions,
  type ExecStreamRequest,
  type LogStreamRequest,
  type ResourcePath,
  type StreamConnection,
  type StreamRequest,
} from '../connection/cluster-api.js';
import {ResourceKind, ResourceOperation} from '../resources/resource-kind.js';
import {KubeApiResponse} from '../kube-api-response.js';
import {
  containerObjects,
  eventObject,
  namespaceObject,
  nodeObject,
  podObject,
} from './k8-client-object-mapper.js';
import {type ClusterContext} from '../../../core/context/cluster-context.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../../../core/logging/kubewalk-logger.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {IllegalStateError} from '../../../core/errors/illegal-state-error.js';
import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';
import {NotFoundError} from '../../../core/errors/not-found-error.js';
import {KubewalkError} from '../../../core/errors/kubewalk-error.js';

/**
 * {@link ClusterApi} on top of the official Kubernetes client, using one {@link KubeConfig} built from the resolved
 * identity of a single context.
 */
export class K8ClientClusterApi implements ClusterApi {
  private readonly logger: KubewalkLogger;
  private readonly kubeConfig: KubeConfig;
  private readonly coreApi: CoreV1Api;
  private closed: boolean = false;

  public constructor(private readonly context: ClusterContext) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
    this.kubeConfig = K8ClientClusterApi.kubeConfigFor(context);
    this.coreApi = this.kubeConfig.makeApiClient(CoreV1Api);
  }

  public static kubeConfigFor(context: ClusterContext): KubeConfig {
    const {identity, trustPolicy} = context;
    const base64 = (text: string): string => Buffer.from(text, 'utf8').toString('base64');

    const kubeConfig = new KubeConfig();
    kubeConfig.loadFromOptions({
      clusters: [
        {
          name: context.name,
          server: context.server,
          skipTLSVerify: trustPolicy.type === 'InsecureSkipVerify',
          caData: trustPolicy.type === 'StrictCA' ? base64(trustPolicy.caBundle) : undefined,
        },
      ],
      users: [{name: context.name, certData: base64(identity.certificatePem), keyData: base64(identity.privateKey)}],
      contexts: [{name: context.name, cluster: context.name, user: context.name}],
      currentContext: context.name,
    });
    return kubeConfig;
  }

  public async request(request: ApiRequest): Promise<ApiResponse> {
    this.assertOpen();
    const {method, path} = request;
    this.logger.debug(`${this.context.name}: ${method} ${path.kind} ${path.namespace ?? ''}/${path.name ?? ''}`);

    if (method === 'DELETE') {
      return this.delete(path, request.body ?? {});
    }
    return path.name === undefined ? this.list(path) : this.read(path);
  }

  public async openStream(
    request: StreamRequest,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable,
  ): Promise<StreamConnection> {
    this.assertOpen();
    return request.type === 'logs' ? this.openLogs(request, stdout) : this.openExec(request, stdout, stderr, stdin);
  }

  public close(): void {
    if (!this.closed) {
      this.closed = true;
      this.logger.debug(`closed cluster api client of context '${this.context.name}'`);
    }
  }

  private async list(path: ResourcePath): Promise<ApiResponse> {
    const operation = ResourceOperation.LIST;
    switch (path.kind) {
      case ResourceKind.NAMESPACE: {
        const {statusCode, body} = await this.invoke(operation, path, () => this.coreApi.listNamespace());
        return {type: 'list', statusCode, items: body.items.map(namespaceObject)};
      }
      case ResourceKind.NODE: {
        const {statusCode, body} = await this.invoke(operation, path, () => this.coreApi.listNode());
        return {type: 'list', statusCode, items: body.items.map(nodeObject)};
      }
      case ResourceKind.POD: {
        const namespace = K8ClientClusterApi.namespaceOf(path);
        const {statusCode, body} = await this.invoke(operation, path, () =>
          this.coreApi.listNamespacedPod(namespace),
        );
        return {type: 'list', statusCode, items: body.items.map(podObject)};
      }
      case ResourceKind.EVENT: {
        const namespace = K8ClientClusterApi.namespaceOf(path);
        const {statusCode, body} = await this.invoke(operation, path, () =>
          this.coreApi.listNamespacedEvent(namespace, undefined, undefined, undefined, path.fieldSelector),
        );
        return {type: 'list', statusCode, items: body.items.map(eventObject)};
      }
      case ResourceKind.CONTAINER: {
        const namespace = K8ClientClusterApi.namespaceOf(path);
        if (!path.pod) {
          throw new MissingArgumentError('container listings need a pod');
        }
        const pod = path.pod;
        const {statusCode, body} = await this.invoke(operation, path, () =>
          this.coreApi.readNamespacedPod(pod, namespace),
        );
        return {type: 'list', statusCode, items: containerObjects(body)};
      }
    }
  }

  private async read(path: ResourcePath): Promise<ApiResponse> {
    const operation = ResourceOperation.READ;
    const name = path.name ?? '';

    switch (path.kind) {
      case ResourceKind.NAMESPACE: {
        const {statusCode, body} = await this.invoke(operation, path, () => this.coreApi.readNamespace(name));
        return {type: 'object', statusCode, item: namespaceObject(body)};
      }
      case ResourceKind.NODE: {
        const {statusCode, body} = await this.invoke(operation, path, () => this.coreApi.readNode(name));
        return {type: 'object', statusCode, item: nodeObject(body)};
      }
      case ResourceKind.POD: {
        const namespace = K8ClientClusterApi.namespaceOf(path);
        const {statusCode, body} = await this.invoke(operation, path, () =>
          this.coreApi.readNamespacedPod(name, namespace),
        );
        return {type: 'object', statusCode, item: podObject(body)};
      }
      case ResourceKind.CONTAINER: {
        const listing = await this.list({...path, name: undefined});
        const item = listing.type === 'list' ? listing.items.find(object => object.name === name) : undefined;
        if (!item) {
          throw new NotFoundError(path.kind, name, `${path.namespace}/${path.pod}`);
        }
        return {type: 'object', statusCode: listing.statusCode, item};
      }
      case ResourceKind.EVENT: {
        throw new IllegalArgumentError('events can only be listed', path.kind);
      }
    }
  }

  private async delete(path: ResourcePath, options: DeleteOptions): Promise<ApiResponse> {
    const operation = ResourceOperation.DELETE;
    const name = path.name;
    if (name === undefined) {
      throw new MissingArgumentError('delete needs a resource name');
    }
    const grace = options.gracePeriodSeconds;

    let statusCode: number;
    let object: object;
    switch (path.kind) {
      case ResourceKind.POD: {
        const namespace = K8ClientClusterApi.namespaceOf(path);
        ({statusCode, body: object} = await this.invoke(operation, path, () =>
          this.coreApi.deleteNamespacedPod(name, namespace, undefined, undefined, grace),
        ));
        break;
      }
      case ResourceKind.NAMESPACE: {
        ({statusCode, body: object} = await this.invoke(operation, path, () =>
          this.coreApi.deleteNamespace(name, undefined, undefined, grace),
        ));
        break;
      }
      default: {
        throw new IllegalArgumentError(`${path.kind} resources cannot be deleted`, path.kind);
      }
    }

    return {
      type: 'object',
      statusCode,
      item: {kind: path.kind, name, namespace: path.namespace, status: 'Terminating', object},
    };
  }

  private async openLogs(request: LogStreamRequest, stdout: Writable): Promise<StreamConnection> {
    const path: ResourcePath = {kind: ResourceKind.POD, namespace: request.namespace, name: request.pod};
    const log = new Log(this.kubeConfig);
    const closed = K8ClientClusterApi.settledOnEnd(stdout);

    const transfer = await this.invoke(ResourceOperation.STREAM, path, async () => ({
      response: undefined,
      body: await log.log(request.namespace, request.pod, request.container, stdout, {
        follow: request.follow,
        tailLines: request.tailLines,
        timestamps: request.timestamps,
        previous: request.previous,
        pretty: false,
      }),
    }));

    return {
      abort: () => {
        transfer.body.abort();
        if (!stdout.writableEnded) {
          stdout.end();
        }
      },
      closed,
    };
  }

  private async openExec(
    request: ExecStreamRequest,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable,
  ): Promise<StreamConnection> {
    const path: ResourcePath = {kind: ResourceKind.POD, namespace: request.namespace, name: request.pod};
    const exec = new Exec(this.kubeConfig);
    const messagePrefix = `exec[${request.pod}/${request.container}]`;

    const onStatus = (status: V1Status): void => {
      this.logger.debug(`${messagePrefix} status: ${status.status} ${status.message ?? ''}`);
      if (status.status === 'Failure') {
        stdout.destroy(new KubewalkError(`${messagePrefix} ${status.message ?? status.reason ?? 'failed'}`, status));
      } else {
        stdout.end();
      }
      stderr.end();
    };

    const socket = (
      await this.invoke(ResourceOperation.STREAM, path, async () => ({
        response: undefined,
        body: await exec.exec(
          request.namespace,
          request.pod,
          request.container,
          [...request.command],
          stdout,
          stderr,
          request.stdin && stdin ? stdin : null,
          request.tty ?? false,
          onStatus,
        ),
      }))
    ).body;

    const closed = new Promise<void>(resolve => {
      socket.on('close', (code: number) => {
        this.logger.debug(`${messagePrefix} connection closed, code=${code}`);
        if (!stdout.writableEnded && !stdout.destroyed) {
          stdout.end();
        }
        resolve();
      });
    });

    return {abort: () => socket.close(), closed};
  }

  private async invoke<B>(
    operation: ResourceOperation,
    path: ResourcePath,
    call: () => Promise<{response: http.IncomingMessage | undefined; body: B}>,
  ): Promise<{statusCode: number; body: B}> {
    let result: {response: http.IncomingMessage | undefined; body: B};
    try {
      result = await call();
    } catch (error) {
      throw KubeApiResponse.translate(error, operation, path);
    }

    if (result.response) {
      KubeApiResponse.check(result.response, operation, path);
      return {statusCode: result.response.statusCode ?? 200, body: result.body};
    }
    return {statusCode: 200, body: result.body};
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new IllegalStateError(`cluster api client of context '${this.context.name}' is closed`, 'closed');
    }
  }

  private static namespaceOf(path: ResourcePath): string {
    if (!path.namespace) {
      throw new MissingArgumentError(`${path.kind} requests need a namespace`);
    }
    return path.namespace;
  }

  private static settledOnEnd(stream: Writable): Promise<void> {
    return new Promise<void>(resolve => {
      stream.once('finish', () => resolve());
      stream.once('close', () => resolve());
    });
  }
}

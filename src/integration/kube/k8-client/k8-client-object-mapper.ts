// SPDX-License-Identifier: Apache-2.0

import {
  type CoreV1Event,
  type V1Container,
  type V1ContainerStatus,
  type V1Namespace,
  type V1Node,
  type V1Pod,
} from '@kubernetes/client-node';
import {ResourceKind} from '../resources/resource-kind.js';
import {type KubeObject} from '../resources/kube-object.js';
import * as constants from '../../../core/constants.js';

/**
 * The API representation carried by container objects, which have no resource of their own.
 */
export interface ContainerObject {
  readonly spec: V1Container;
  readonly status?: V1ContainerStatus;
  readonly init: boolean;
}

export function namespaceObject(namespace: V1Namespace): KubeObject {
  return {
    kind: ResourceKind.NAMESPACE,
    name: namespace.metadata?.name ?? '',
    status: namespace.status?.phase ?? constants.POD_PHASE_UNKNOWN,
    createdAt: namespace.metadata?.creationTimestamp,
    object: namespace,
  };
}

export function podObject(pod: V1Pod): KubeObject {
  return {
    kind: ResourceKind.POD,
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace,
    status: podStatus(pod),
    createdAt: pod.metadata?.creationTimestamp,
    object: pod,
  };
}

export function nodeObject(node: V1Node): KubeObject {
  return {
    kind: ResourceKind.NODE,
    name: node.metadata?.name ?? '',
    status: nodeStatus(node),
    createdAt: node.metadata?.creationTimestamp,
    object: node,
  };
}

export function eventObject(event: CoreV1Event): KubeObject {
  return {
    kind: ResourceKind.EVENT,
    name: event.metadata?.name ?? '',
    namespace: event.metadata?.namespace,
    status: event.type ?? 'Normal',
    createdAt: event.lastTimestamp ?? event.firstTimestamp ?? event.metadata?.creationTimestamp,
    detail: `${event.reason ?? ''}: ${event.message ?? ''}`,
    object: event,
  };
}

/**
 * Init containers first, then the regular ones, each paired with its reported status.
 */
export function containerObjects(pod: V1Pod): KubeObject[] {
  const statuses = new Map<string, V1ContainerStatus>();
  for (const status of [...(pod.status?.initContainerStatuses ?? []), ...(pod.status?.containerStatuses ?? [])]) {
    statuses.set(status.name, status);
  }

  const toObject = (spec: V1Container, init: boolean): KubeObject => {
    const status = statuses.get(spec.name);
    const object: ContainerObject = {spec, status, init};
    return {
      kind: ResourceKind.CONTAINER,
      name: spec.name,
      namespace: pod.metadata?.namespace,
      status: containerStatus(status),
      createdAt: status?.state?.running?.startedAt,
      detail: spec.image,
      object,
    };
  };

  return [
    ...(pod.spec?.initContainers ?? []).map(spec => toObject(spec, true)),
    ...(pod.spec?.containers ?? []).map(spec => toObject(spec, false)),
  ];
}

/**
 * Status as `kubectl get pods` reports it: a waiting or failed container's reason wins over the pod phase.
 */
export function podStatus(pod: V1Pod): string {
  if (pod.metadata?.deletionTimestamp) {
    return 'Terminating';
  }
  for (const status of pod.status?.containerStatuses ?? []) {
    const reason = status.state?.waiting?.reason ?? status.state?.terminated?.reason;
    if (reason && reason !== 'Completed') {
      return reason;
    }
  }
  return pod.status?.phase ?? constants.POD_PHASE_UNKNOWN;
}

export function nodeStatus(node: V1Node): string {
  const ready = node.status?.conditions?.find(condition => condition.type === constants.NODE_CONDITION_READY);
  const status = ready?.status === constants.CONDITION_STATUS_TRUE ? 'Ready' : 'NotReady';
  return node.spec?.unschedulable ? `${status},SchedulingDisabled` : status;
}

export function containerStatus(status: V1ContainerStatus | undefined): string {
  if (status?.state?.running) {
    return status.ready ? constants.POD_PHASE_RUNNING : `${constants.POD_PHASE_RUNNING},NotReady`;
  }
  if (status?.state?.waiting) {
    return status.state.waiting.reason ?? 'Waiting';
  }
  if (status?.state?.terminated) {
    return status.state.terminated.reason ?? 'Terminated';
  }
  return 'Pending';
}

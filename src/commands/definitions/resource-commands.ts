// SPDX-License-Identifier: Apache-2.0

import {stringify} from 'yaml';
import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {InvalidArgumentError} from '../../core/errors/command-errors.js';
import {errorMessage} from '../../core/helpers.js';
import {type CommandDefinition} from '../command-definition.js';
import {formatAge, formatTable} from '../output-format.js';
import {activeContextOf, lines, selectedNamespace, selectedPod} from './support.js';

/**
 * Prints the full API representation of the deepest selection as YAML, fetched fresh from the cluster.
 */
export const describeCommand: CommandDefinition = {
  name: 'describe',
  summary: 'show the selected namespace, pod or container in full',
  usage: 'describe',
  requires: 'namespace',
  async run(invocation, environment) {
    const {connection} = activeContextOf(invocation, environment);
    const namespace = selectedNamespace(invocation);
    const {pod, container} = invocation.path;

    const object = container
      ? await connection.read(ResourceKind.CONTAINER, container, namespace, pod)
      : pod
        ? await connection.read(ResourceKind.POD, pod, namespace)
        : await connection.read(ResourceKind.NAMESPACE, namespace);

    return lines(stringify(object.object).trimEnd().split('\n'));
  },
};

export const eventsCommand: CommandDefinition = {
  name: 'events',
  summary: 'show the events recorded for the selected pod',
  usage: 'events',
  requires: 'pod',
  async run(invocation, environment) {
    const {connection} = activeContextOf(invocation, environment);
    const {namespace, pod} = selectedPod(invocation);
    const events = await connection.events(namespace, pod);
    if (events.length === 0) {
      return lines([`no events for pod '${pod}'`]);
    }
    const now = new Date();
    const rows = events.map(event => [formatAge(event.createdAt, now), event.status, event.detail ?? '']);
    return lines(formatTable(['AGE', 'TYPE', 'MESSAGE'], rows));
  },
};

/**
 * Deletes the selected pod. Requires `--yes`; never retried and never interrupted once sent.
 */
export const deleteCommand: CommandDefinition = {
  name: 'delete',
  summary: 'delete the selected pod',
  usage: 'delete --yes [--grace <seconds>] [--now]',
  requires: 'pod',
  interruptible: false,
  options: [
    {name: 'yes', short: 'y', type: 'boolean', description: 'confirm the deletion'},
    {name: 'grace', type: 'number', description: 'termination grace period in seconds'},
    {name: 'now', type: 'boolean', description: 'same as --grace 0'},
  ],
  async run(invocation, environment) {
    const {namespace, pod} = selectedPod(invocation);
    if (!invocation.flag('yes')) {
      throw new InvalidArgumentError(`refusing to delete pod '${pod}' without --yes`, 'yes');
    }
    const grace = invocation.flag('now') ? 0 : invocation.numberOption('grace');

    const {connection, cache} = activeContextOf(invocation, environment);
    await connection.delete(ResourceKind.POD, pod, namespace, {gracePeriodSeconds: grace});
    environment.logger.info(`deleted pod '${pod}' in namespace '${namespace}' (grace: ${grace ?? 'default'})`);

    try {
      await cache.refresh(ResourceKind.POD, namespace);
    } catch (error) {
      environment.logger.warn(`refresh of pods in '${namespace}' after delete failed: ${errorMessage(error)}`);
    }
    return lines([`pod '${pod}' deleted`]);
  },
};

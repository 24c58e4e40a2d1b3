// SPDX-License-Identifier: Apache-2.0

import {ResourceKind} from '../../integration/kube/resources/resource-kind.js';
import {InvalidArgumentError} from '../../core/errors/command-errors.js';
import {type CommandDefinition} from '../command-definition.js';
import {lines, navigated} from './support.js';

function descendCommand(kind: ResourceKind, aliases: readonly string[] = []): CommandDefinition {
  return {
    name: kind,
    aliases,
    summary: `select a ${kind}`,
    usage: `${kind} <name>`,
    arguments: {min: 1, max: 1},
    async run(invocation, {navigation, token}) {
      return navigated(await navigation.descend(kind, invocation.positionals[0], token.signal));
    },
  };
}

export const contextCommand: CommandDefinition = {
  name: 'context',
  aliases: ['ctx'],
  summary: 'switch to a cluster context, activating it on first use',
  usage: 'context <name>',
  arguments: {min: 1, max: 1},
  async run(invocation, {navigation, token}) {
    return navigated(await navigation.switchContext(invocation.positionals[0], token.signal));
  },
};

export const namespaceCommand = descendCommand(ResourceKind.NAMESPACE, ['ns']);
export const podCommand = descendCommand(ResourceKind.POD);
export const containerCommand = descendCommand(ResourceKind.CONTAINER);

export const upCommand: CommandDefinition = {
  name: 'up',
  summary: 'deselect the last selection, or the last <levels> selections',
  usage: 'up [levels]',
  arguments: {min: 0, max: 1},
  requires: 'context',
  async run(invocation, {navigation}) {
    const [raw] = invocation.positionals;
    let levels = 1;
    if (raw !== undefined) {
      if (!/^[1-9]\d*$/.test(raw)) {
        throw new InvalidArgumentError(`levels must be a positive integer, got '${raw}'`, raw);
      }
      levels = Number.parseInt(raw, 10);
    }
    return navigated(navigation.ascend(levels));
  },
};

export const clearCommand: CommandDefinition = {
  name: 'clear',
  summary: 'deselect everything below the context',
  usage: 'clear',
  requires: 'context',
  async run(_invocation, {navigation}) {
    const depth = navigation.snapshot().depth;
    return depth > 1 ? navigated(navigation.ascend(depth - 1)) : lines();
  },
};

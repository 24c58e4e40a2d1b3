// SPDX-License-Identifier: Apache-2.0

import {type CommandDefinition} from '../command-definition.js';
import {activeContextOf, selectedPod, targetContainer} from './support.js';

export const logsCommand: CommandDefinition = {
  name: 'logs',
  summary: 'print the logs of the selected pod, -f to keep following',
  usage: 'logs [-f] [-c <container>] [--tail <lines>] [--timestamps] [--previous]',
  requires: 'pod',
  options: [
    {name: 'follow', short: 'f', type: 'boolean', description: 'keep streaming until interrupted'},
    {name: 'container', short: 'c', type: 'string', description: 'container to read from'},
    {name: 'tail', type: 'number', description: 'only the last <lines> lines'},
    {name: 'timestamps', short: 't', type: 'boolean', description: 'prefix each line with its timestamp'},
    {name: 'previous', short: 'p', type: 'boolean', description: 'logs of the previous container instance'},
  ],
  async run(invocation, environment) {
    const active = activeContextOf(invocation, environment);
    const {namespace, pod} = selectedPod(invocation);
    const container = await targetContainer(invocation, active);
    environment.token.throwIfCancelled();

    const handle = await active.connection.stream({
      type: 'logs',
      namespace,
      pod,
      container,
      follow: invocation.flag('follow'),
      tailLines: invocation.numberOption('tail'),
      timestamps: invocation.flag('timestamps'),
      previous: invocation.flag('previous'),
    });
    return {type: 'stream', handle};
  },
};

export const execCommand: CommandDefinition = {
  name: 'exec',
  summary: 'run a command in the selected pod and print its output, -i to send it the lines you type',
  usage: 'exec [-i] [-t] [-c <container>] [--] <command> [args...]',
  requires: 'pod',
  passthrough: true,
  arguments: {min: 1, max: Number.POSITIVE_INFINITY},
  options: [
    {name: 'container', short: 'c', type: 'string', description: 'container to run in'},
    {name: 'stdin', short: 'i', type: 'boolean', description: 'forward the lines typed while it runs to the command'},
    {name: 'tty', short: 't', type: 'boolean', description: 'allocate a terminal for the command'},
  ],
  async run(invocation, environment) {
    const active = activeContextOf(invocation, environment);
    const {namespace, pod} = selectedPod(invocation);
    const container = await targetContainer(invocation, active);
    environment.token.throwIfCancelled();

    const handle = await active.connection.stream({
      type: 'exec',
      namespace,
      pod,
      container,
      command: invocation.positionals,
      stdin: invocation.flag('stdin'),
      tty: invocation.flag('tty'),
    });
    return {type: 'stream', handle};
  },
};

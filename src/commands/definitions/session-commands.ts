// SPDX-License-Identifier: Apache-2.0

import {UnknownCommandError} from '../../core/errors/command-errors.js';
import {type CommandDefinition} from '../command-definition.js';
import {formatTable} from '../output-format.js';
import {activeContextOf, lines} from './support.js';

export const helpCommand: CommandDefinition = {
  name: 'help',
  aliases: ['?'],
  summary: 'list the commands, or describe one',
  usage: 'help [command]',
  arguments: {min: 0, max: 1},
  async run(invocation, {registry}) {
    const [verb] = invocation.positionals;
    if (verb === undefined) {
      const rows = registry.list().map(definition => [definition.usage, definition.summary]);
      return lines(formatTable(['COMMAND', 'DESCRIPTION'], rows));
    }

    const definition = registry.find(verb);
    if (!definition) {
      throw new UnknownCommandError(verb);
    }
    const output = [`usage: ${definition.usage}`, `  ${definition.summary}`];
    if (definition.aliases?.length) {
      output.push(`  aliases: ${definition.aliases.join(', ')}`);
    }
    if (definition.requires) {
      output.push(`  needs a selected ${definition.requires}`);
    }
    for (const option of definition.options ?? []) {
      const flags = option.short ? `-${option.short}, --${option.name}` : `    --${option.name}`;
      output.push(`  ${flags.padEnd(18)} ${option.description}`);
    }
    return lines(output);
  },
};

/**
 * Shows the current path, the identity in use and the state of the cache.
 */
export const envCommand: CommandDefinition = {
  name: 'env',
  summary: 'show the current selection, identity and cache state',
  usage: 'env',
  requires: 'context',
  async run(invocation, environment) {
    const {context, cache} = activeContextOf(invocation, environment);
    const {path} = invocation;
    const output = [
      `context:   ${context}`,
      `namespace: ${path.namespace ?? '-'}`,
      `pod:       ${path.pod ?? '-'}`,
      `container: ${path.container ?? '-'}`,
      `identity:  ${context.identity}`,
      `trust:     ${context.trustPolicy.type}`,
    ];

    const rows = cache
      .current()
      .list()
      .map(slice => {
        const listing = cache.get(slice.kind, slice.parentPath);
        return [
          `${slice.kind}s`,
          slice.parentPath || '-',
          String(listing.entries.length),
          listing.age ? listing.age.toString() : '-',
          listing.stale ? 'stale' : 'fresh',
        ];
      });
    output.push('', ...formatTable(['CACHED', 'IN', 'ENTRIES', 'AGE', 'STATE'], rows));
    return lines(output);
  },
};

export const quitCommand: CommandDefinition = {
  name: 'quit',
  aliases: ['exit'],
  summary: 'leave the shell',
  usage: 'quit',
  async run() {
    return {type: 'exit'};
  },
};


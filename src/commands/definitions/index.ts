// SPDX-License-Identifier: Apache-2.0

import {type CommandDefinition} from '../command-definition.js';
import {CommandRegistry} from '../command-registry.js';
import {clearCommand, containerCommand, contextCommand, namespaceCommand, podCommand, upCommand} from './navigation-commands.js';
import {
  containersCommand,
  contextsCommand,
  namespacesCommand,
  nodesCommand,
  podsCommand,
  refreshCommand,
} from './listing-commands.js';
import {deleteCommand, describeCommand, eventsCommand} from './resource-commands.js';
import {execCommand, logsCommand} from './stream-commands.js';
import {envCommand, helpCommand, quitCommand} from './session-commands.js';

export const DEFAULT_COMMANDS: readonly CommandDefinition[] = Object.freeze([
  helpCommand,
  contextsCommand,
  contextCommand,
  namespacesCommand,
  namespaceCommand,
  podsCommand,
  podCommand,
  containersCommand,
  containerCommand,
  nodesCommand,
  upCommand,
  clearCommand,
  envCommand,
  refreshCommand,
  describeCommand,
  eventsCommand,
  logsCommand,
  execCommand,
  deleteCommand,
  quitCommand,
]);

export function defaultRegistry(): CommandRegistry {
  return new CommandRegistry(DEFAULT_COMMANDS);
}
